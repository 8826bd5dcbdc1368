import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileVectorIndexRepository } from './FileVectorIndexRepository';
import { StoragePaths } from './StoragePaths';
import { FlatL2Index } from '../../domain/services/VectorIndex';
import { createIndexMetadata, type IndexMetadata } from '../../domain/entities/IndexMetadata';
import { CorruptStateError, NotFoundError } from '../../domain/errors';

function metadataFor(meetingId: string, texts: string[], vectors: number[][]): IndexMetadata {
  return createIndexMetadata({
    meetingId,
    projectId: 'demo_project',
    chunkSizeWords: 500,
    overlapWords: 50,
    embeddingModel: 'fake-embedding',
    dimension: vectors[0]?.length ?? 0,
    vectors: texts.map((text, chunkId) => ({ chunkId, text, embedding: vectors[chunkId] })),
  });
}

describe('FileVectorIndexRepository', () => {
  let root: string;
  let paths: StoragePaths;
  let repository: FileVectorIndexRepository;

  const vectors = [
    [1, 0],
    [0, 1],
  ];

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'meeting-index-'));
    paths = new StoragePaths(root);
    repository = new FileVectorIndexRepository(paths);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('writes the index and snake_case metadata side by side', async () => {
    const location = await repository.save(
      'standup',
      FlatL2Index.fromVectors(vectors),
      metadataFor('standup', ['first chunk', 'second chunk'], vectors)
    );

    expect(location).toEqual({
      vectorIndexPath: join(root, 'vectors', 'standup.index'),
      metaPath: join(root, 'vectors', 'standup_meta.json'),
    });

    const json = JSON.parse(await readFile(location.metaPath, 'utf-8'));
    expect(json).toMatchObject({
      meeting_id: 'standup',
      num_chunks: 2,
      chunk_size_words: 500,
      overlap_words: 50,
      embedding_model: 'fake-embedding',
      index_type: 'FlatL2',
      dimension: 2,
      vectors: [
        { chunk_id: 0, text: 'first chunk', embedding: [1, 0] },
        { chunk_id: 1, text: 'second chunk', embedding: [0, 1] },
      ],
    });
  });

  it('loads what it saved', async () => {
    const metadata = metadataFor('standup', ['first chunk', 'second chunk'], vectors);
    await repository.save('standup', FlatL2Index.fromVectors(vectors), metadata);

    const stored = await repository.load('standup');

    expect(stored.metadata).toEqual(metadata);
    expect(stored.index.size).toBe(2);
    expect(stored.index.vectorAt(1)).toEqual([0, 1]);
    expect(await repository.findMetadata('standup')).toEqual(metadata);
  });

  it('reports a missing index', async () => {
    await expect(repository.load('standup')).rejects.toThrow(NotFoundError);
    expect(await repository.findMetadata('standup')).toBeNull();
  });

  it('treats metadata without an index file as not indexed', async () => {
    await repository.save('standup', FlatL2Index.fromVectors(vectors), metadataFor('standup', ['a', 'b'], vectors));
    await rm(paths.vectorIndex('standup'));

    await expect(repository.load('standup')).rejects.toThrow(NotFoundError);
    expect(await repository.findMetadata('standup')).toBeNull();
  });

  it('rejects metadata that disagrees with the index', async () => {
    await repository.save(
      'standup',
      FlatL2Index.fromVectors(vectors),
      metadataFor('standup', ['only one chunk'], [[1, 0]])
    );

    await expect(repository.load('standup')).rejects.toThrow(CorruptStateError);
  });

  it('rejects an index that was replaced without its metadata', async () => {
    await repository.save(
      'standup',
      FlatL2Index.fromVectors(vectors),
      metadataFor('standup', ['river killer', 'budget quarter'], vectors)
    );
    // Same chunk count, swapped order: what an interrupted rebuild leaves behind
    await writeFile(paths.vectorIndex('standup'), FlatL2Index.fromVectors([[0, 1], [1, 0]]).serialize());

    await expect(repository.load('standup')).rejects.toThrow(
      'Index vector at position 0 does not match chunk 0 in metadata for standup'
    );
  });

  it('accepts metadata embeddings that only differ by float32 rounding', async () => {
    const precise = [[0.1, 0.2]];
    await repository.save('standup', FlatL2Index.fromVectors(precise), metadataFor('standup', ['a'], precise));

    const stored = await repository.load('standup');
    expect(stored.metadata.vectors[0].embedding).toEqual([0.1, 0.2]);
  });

  it('rejects unreadable metadata', async () => {
    await repository.save('standup', FlatL2Index.fromVectors(vectors), metadataFor('standup', ['a', 'b'], vectors));
    await writeFile(paths.indexMetadata('standup'), '{ not json');

    await expect(repository.load('standup')).rejects.toThrow(CorruptStateError);
  });
});
