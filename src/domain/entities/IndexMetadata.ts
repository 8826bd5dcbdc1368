export const INDEX_TYPE = 'FlatL2';

export interface TranscriptChunk {
  chunkId: number;
  text: string;
  embedding: number[];
}

/**
 * Build-time description of a meeting's vector index. `vectors[i]` is the chunk
 * stored at index position `i`; the whole record is replaced on every rebuild.
 */
export interface IndexMetadata {
  meetingId: string;
  projectId: string;
  createdAt: string;
  numChunks: number;
  chunkSizeWords: number;
  overlapWords: number;
  embeddingModel: string;
  indexType: string;
  dimension: number;
  vectors: TranscriptChunk[];
}

export interface CreateIndexMetadataInput {
  meetingId: string;
  projectId: string;
  chunkSizeWords: number;
  overlapWords: number;
  embeddingModel: string;
  dimension: number;
  vectors: TranscriptChunk[];
}

export function createIndexMetadata(input: CreateIndexMetadataInput): IndexMetadata {
  return {
    meetingId: input.meetingId,
    projectId: input.projectId,
    createdAt: new Date().toISOString(),
    numChunks: input.vectors.length,
    chunkSizeWords: input.chunkSizeWords,
    overlapWords: input.overlapWords,
    embeddingModel: input.embeddingModel,
    indexType: INDEX_TYPE,
    dimension: input.dimension,
    vectors: input.vectors,
  };
}
