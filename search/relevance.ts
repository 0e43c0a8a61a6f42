/**
 * Maps a raw L2 distance onto (0, 100]. Distance 0 scores 100 and the score falls
 * monotonically as distance grows. This is a display heuristic, not a probability.
 */
export function distanceToRelevance(distance: number): number {
  return 100 / (1 + Math.max(0, distance));
}

/** `92.3456` -> `"92.3%"` */
export function formatRelevance(relevance: number): string {
  return `${relevance.toFixed(1)}%`;
}
