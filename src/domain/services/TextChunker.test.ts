import { describe, expect, it } from 'vitest';
import { WordWindowChunker, chunkTranscript, splitWords } from './TextChunker';
import { ValidationError } from '../errors';

function words(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `w${i}`);
}

describe('WordWindowChunker', () => {
  it('returns no chunks for empty or whitespace-only text', () => {
    expect(chunkTranscript('')).toEqual([]);
    expect(chunkTranscript('   \n\t ')).toEqual([]);
  });

  it('returns text that fits in one window unchanged', () => {
    const chunker = new WordWindowChunker({ chunkSizeWords: 5, overlapWords: 2 });
    expect(chunker.split('hello   world\nagain')).toEqual(['hello   world\nagain']);
  });

  it('slides overlapping windows and joins words with single spaces', () => {
    const chunker = new WordWindowChunker({ chunkSizeWords: 5, overlapWords: 2 });
    const chunks = chunker.split(words(12).join('  '));

    expect(chunks).toEqual([
      'w0 w1 w2 w3 w4',
      'w3 w4 w5 w6 w7',
      'w6 w7 w8 w9 w10',
      'w9 w10 w11',
    ]);
  });

  it('produces contiguous windows when overlap is zero', () => {
    const chunks = chunkTranscript(words(6).join(' '), 3, 0);
    expect(chunks).toEqual(['w0 w1 w2', 'w3 w4 w5']);
  });

  it('splits a 520-word transcript into two chunks with the defaults', () => {
    const all = words(520);
    const chunks = chunkTranscript(all.join(' '));

    expect(chunks).toHaveLength(2);
    expect(chunks[0]).toBe(all.slice(0, 500).join(' '));
    expect(chunks[1]).toBe(all.slice(450).join(' '));
    expect(splitWords(chunks[1])).toHaveLength(70);
  });

  it('keeps every word in at least one chunk', () => {
    const all = words(37);
    const covered = new Set(chunkTranscript(all.join(' '), 8, 3).flatMap(splitWords));
    expect(covered.size).toBe(37);
  });

  it('rejects invalid window settings', () => {
    expect(() => new WordWindowChunker({ chunkSizeWords: 0, overlapWords: 0 })).toThrow(ValidationError);
    expect(() => new WordWindowChunker({ chunkSizeWords: 10, overlapWords: 10 })).toThrow(ValidationError);
    expect(() => new WordWindowChunker({ chunkSizeWords: 10, overlapWords: -1 })).toThrow(ValidationError);
  });
});
