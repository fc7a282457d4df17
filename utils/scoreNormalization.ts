/**
 * Utility for normalizing similarity scores across different metrics.
 * Shared by SemanticScoringService and DuplicateDetectionService.
 */
export function normalizeScore(
  rawScore: number,
  metric: 'cosine' | 'jaccard' = 'cosine',
  floor: number = 0
): number {
  if (!Number.isFinite(rawScore)) return 0;

  if (metric === 'cosine') {
    // floor 0 clamps anti-correlated vectors to 0; floor -1 maps [-1,1] onto [0,1]
    return clamp01((rawScore - floor) / (1 - floor));
  }
  return clamp01(rawScore);
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

export function cosineSimilarity(vec1: number[], vec2: number[]): number {
  if (vec1.length !== vec2.length) {
    throw new Error(`Vector dimension mismatch: ${vec1.length} vs ${vec2.length}`);
  }

  let dotProduct = 0;
  let norm1 = 0;
  let norm2 = 0;

  for (let i = 0; i < vec1.length; i++) {
    dotProduct += vec1[i] * vec2[i];
    norm1 += vec1[i] * vec1[i];
    norm2 += vec2[i] * vec2[i];
  }

  const denominator = Math.sqrt(norm1) * Math.sqrt(norm2);
  if (denominator === 0) return 0;

  return dotProduct / denominator;
}

export function jaccard<T>(left: Set<T>, right: Set<T>): number {
  if (left.size === 0 || right.size === 0) return 0;
  let intersection = 0;
  for (const item of left) {
    if (right.has(item)) intersection++;
  }
  const union = left.size + right.size - intersection;
  return union > 0 ? intersection / union : 0;
}

export function toPercent(score: number): number {
  return Math.round(clamp01(score) * 1000) / 10;
}
