export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  if (n === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < n; i++) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (denom === 0) return 0;
  return dot / denom;
}

/**
 * Incremental mean: `mean + (sample - mean) / count`, where `count` already
 * includes the new sample.
 */
export function updateRunningMean(
  mean: readonly number[],
  sample: readonly number[],
  count: number,
): number[] {
  if (mean.length !== sample.length) {
    throw new Error(`vector length mismatch: ${mean.length} vs ${sample.length}`);
  }
  if (count < 1) throw new Error(`running mean count must be >= 1, got ${count}`);
  return mean.map((m, i) => m + ((sample[i] ?? 0) - m) / count);
}
