import { ValidationError } from '../errors';

export interface ChunkerConfig {
  chunkSizeWords: number;
  overlapWords: number;
}

export const DEFAULT_CHUNKER_CONFIG: ChunkerConfig = {
  chunkSizeWords: 500,
  overlapWords: 50,
};

/**
 * Splits a transcript into overlapping windows of whole words.
 *
 * Consecutive chunks share `overlapWords` words; the final chunk may be shorter
 * than `chunkSizeWords`. A transcript that fits in one window is returned as is.
 */
export class WordWindowChunker {
  readonly chunkSizeWords: number;
  readonly overlapWords: number;

  constructor(config: ChunkerConfig = DEFAULT_CHUNKER_CONFIG) {
    const { chunkSizeWords, overlapWords } = config;

    if (!Number.isInteger(chunkSizeWords) || chunkSizeWords < 1) {
      throw new ValidationError(`chunkSizeWords must be a positive integer, got ${chunkSizeWords}`);
    }
    // overlap >= size would never advance the window
    if (!Number.isInteger(overlapWords) || overlapWords < 0 || overlapWords >= chunkSizeWords) {
      throw new ValidationError(
        `overlapWords must be an integer in [0, ${chunkSizeWords}), got ${overlapWords}`
      );
    }

    this.chunkSizeWords = chunkSizeWords;
    this.overlapWords = overlapWords;
  }

  split(text: string): string[] {
    const words = splitWords(text);

    if (words.length === 0) {
      return [];
    }
    if (words.length <= this.chunkSizeWords) {
      return [text];
    }

    const chunks: string[] = [];
    let start = 0;

    while (start < words.length) {
      const end = Math.min(start + this.chunkSizeWords, words.length);
      chunks.push(words.slice(start, end).join(' '));

      if (end >= words.length) {
        break;
      }
      start = end - this.overlapWords;
    }

    return chunks;
  }
}

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

export function chunkTranscript(
  text: string,
  chunkSizeWords: number = DEFAULT_CHUNKER_CONFIG.chunkSizeWords,
  overlapWords: number = DEFAULT_CHUNKER_CONFIG.overlapWords
): string[] {
  return new WordWindowChunker({ chunkSizeWords, overlapWords }).split(text);
}
