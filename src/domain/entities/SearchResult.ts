export interface SearchResult {
  rank: number;
  chunkId: number;
  text: string;
  similarityScore: number;
  distance: number;
}

// 1 / (1 + d) over squared L2 distance; identical vectors score exactly 1
export function similarityFromDistance(distance: number): number {
  return 1 / (1 + distance);
}
