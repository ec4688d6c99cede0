import { randomUUID } from "node:crypto";
import { log } from "./logger.js";
import type { MemoryUnit, ThematicCluster } from "./types.js";
import { cosineSimilarity, updateRunningMean } from "./vector.js";

export const DEFAULT_CLUSTER_THRESHOLD = 0.7;

export interface ClusterAssignment {
  cluster: ThematicCluster;
  created: boolean;
  similarity: number;
}

/**
 * Find the closest centroid among `clusters` (iterated in creation order; the
 * first one wins a tie). Returns null when there are no clusters.
 */
export function nearestCluster(
  embedding: readonly number[],
  clusters: readonly ThematicCluster[],
): { cluster: ThematicCluster; similarity: number } | null {
  let best: ThematicCluster | null = null;
  let bestSimilarity = -Infinity;
  for (const cluster of clusters) {
    if (cluster.centroid.length === 0) continue;
    const similarity = cosineSimilarity(embedding, cluster.centroid);
    if (similarity > bestSimilarity) {
      best = cluster;
      bestSimilarity = similarity;
    }
  }
  return best ? { cluster: best, similarity: bestSimilarity } : null;
}

/**
 * Online clustering step. The unit joins the nearest cluster when similarity
 * strictly exceeds `threshold`, moving its centroid by the running mean;
 * otherwise a new cluster is appended to `clusters` with the unit as its only
 * member. Clusters only grow. Mutates `unit.clusterId`, the chosen cluster and
 * (on creation) the `clusters` array.
 */
export function assignToCluster(
  unit: MemoryUnit,
  clusters: ThematicCluster[],
  threshold: number = DEFAULT_CLUSTER_THRESHOLD,
  now: Date = new Date(),
): ClusterAssignment {
  if (unit.embedding.length === 0) {
    throw new Error(`memory unit ${unit.id} has no embedding`);
  }
  if (unit.clusterId !== null) {
    throw new Error(`memory unit ${unit.id} is already assigned to cluster ${unit.clusterId}`);
  }

  const nearest = nearestCluster(unit.embedding, clusters);
  if (nearest && nearest.similarity > threshold) {
    const { cluster } = nearest;
    cluster.memberIds.push(unit.id);
    cluster.centroid = updateRunningMean(cluster.centroid, unit.embedding, cluster.memberIds.length);
    cluster.updatedAt = now;
    unit.clusterId = cluster.id;
    log.debug(
      `clustering: unit ${unit.id} -> cluster ${cluster.id} (similarity=${nearest.similarity.toFixed(3)}, members=${cluster.memberIds.length})`,
    );
    return { cluster, created: false, similarity: nearest.similarity };
  }

  const cluster: ThematicCluster = {
    id: randomUUID(),
    userId: unit.userId,
    themeLabel: "",
    summary: unit.narrative,
    memberIds: [unit.id],
    centroid: [...unit.embedding],
    createdAt: now,
    updatedAt: now,
  };
  clusters.push(cluster);
  unit.clusterId = cluster.id;
  log.debug(
    `clustering: unit ${unit.id} opened cluster ${cluster.id} (best similarity=${nearest ? nearest.similarity.toFixed(3) : "n/a"})`,
  );
  return { cluster, created: true, similarity: nearest ? nearest.similarity : 0 };
}
