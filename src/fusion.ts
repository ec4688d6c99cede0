export const DEFAULT_RRF_K = 60;

export interface FusedCandidate {
  id: string;
  score: number;
  /** 1-based, null when absent from that list */
  denseRank: number | null;
  sparseRank: number | null;
}

function rankMap(ids: readonly string[]): Map<string, number> {
  const ranks = new Map<string, number>();
  ids.forEach((id, i) => {
    // Duplicates keep their best position.
    if (!ranks.has(id)) ranks.set(id, i + 1);
  });
  return ranks;
}

/**
 * Reciprocal rank fusion of a dense and a sparse ranking:
 * `score = 1/(k + rankDense) + 1/(k + rankSparse)`, an absent id contributing
 * nothing for that list.
 *
 * Order: score desc, then combined rank sum asc (absent counts as one past the
 * end of that list), then id asc.
 */
export function fuseRankings(
  dense: readonly string[],
  sparse: readonly string[],
  k: number = DEFAULT_RRF_K,
): FusedCandidate[] {
  const denseRanks = rankMap(dense);
  const sparseRanks = rankMap(sparse);
  const denseMissing = denseRanks.size + 1;
  const sparseMissing = sparseRanks.size + 1;

  const ids = new Set<string>([...denseRanks.keys(), ...sparseRanks.keys()]);
  const fused: Array<FusedCandidate & { rankSum: number }> = [];
  for (const id of ids) {
    const denseRank = denseRanks.get(id) ?? null;
    const sparseRank = sparseRanks.get(id) ?? null;
    let score = 0;
    if (denseRank !== null) score += 1 / (k + denseRank);
    if (sparseRank !== null) score += 1 / (k + sparseRank);
    fused.push({
      id,
      score,
      denseRank,
      sparseRank,
      rankSum: (denseRank ?? denseMissing) + (sparseRank ?? sparseMissing),
    });
  }

  fused.sort((a, b) => {
    if (b.score !== a.score) return b.score - a.score;
    if (a.rankSum !== b.rankSum) return a.rankSum - b.rankSum;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  });

  return fused.map(({ rankSum: _rankSum, ...rest }) => rest);
}
