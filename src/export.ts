import path from "node:path";
import { mkdir, writeFile } from "node:fs/promises";
import type { MemoryUnit, ThematicCluster, UserProfile } from "./types.js";

export const EXPORT_FORMAT = "strata-memory-export" as const;
export const EXPORT_SCHEMA_VERSION = 1 as const;

export interface ExportOptions {
  /** Embeddings and centroids are large; left out unless asked for. */
  includeEmbeddings?: boolean;
}

export interface ExportedForesight {
  id: string;
  content: string;
  tStart: string;
  tEnd: string | null;
  confidence: number;
}

export interface ExportedUnit {
  id: string;
  narrative: string;
  atomicFacts: string[];
  foresights: ExportedForesight[];
  createdAt: string;
  clusterId: string | null;
  embedding?: number[];
}

export interface ExportedCluster {
  id: string;
  themeLabel: string;
  summary: string;
  memberIds: string[];
  createdAt: string;
  updatedAt: string;
  centroid?: number[];
}

export interface MemoryExportV1 {
  format: typeof EXPORT_FORMAT;
  schemaVersion: typeof EXPORT_SCHEMA_VERSION;
  exportedAt: string;
  userId: string;
  units: ExportedUnit[];
  clusters: ExportedCluster[];
  profile: {
    explicitAttributes: Array<{
      attributeName: string;
      value: string;
      timestamp: string;
      sourceUnitId: string;
      confidence: number;
    }>;
    implicitTraits: Array<{
      traitType: string;
      description: string;
      strength: number;
      evidence: string[];
      lastUpdated: string;
    }>;
    conflictHistory: Array<{
      id: string;
      attributeName: string;
      oldValue: string;
      newValue: string;
      oldTimestamp: string;
      newTimestamp: string;
      resolutionStrategy: string;
      outcome: string;
      detectedAt: string;
    }>;
    sourceClusterIds: string[];
    updatedAt: string;
  } | null;
}

export function buildExport(
  userId: string,
  data: { units: MemoryUnit[]; clusters: ThematicCluster[]; profile: UserProfile | null },
  options: ExportOptions = {},
  now: Date = new Date(),
): MemoryExportV1 {
  const withVectors = options.includeEmbeddings === true;
  const { profile } = data;

  return {
    format: EXPORT_FORMAT,
    schemaVersion: EXPORT_SCHEMA_VERSION,
    exportedAt: now.toISOString(),
    userId,
    units: data.units.map((u) => ({
      id: u.id,
      narrative: u.narrative,
      atomicFacts: [...u.atomicFacts],
      foresights: u.foresights.map((f) => ({
        id: f.id,
        content: f.content,
        tStart: f.tStart.toISOString(),
        tEnd: f.tEnd ? f.tEnd.toISOString() : null,
        confidence: f.confidence,
      })),
      createdAt: u.createdAt.toISOString(),
      clusterId: u.clusterId,
      ...(withVectors ? { embedding: [...u.embedding] } : {}),
    })),
    clusters: data.clusters.map((c) => ({
      id: c.id,
      themeLabel: c.themeLabel,
      summary: c.summary,
      memberIds: [...c.memberIds],
      createdAt: c.createdAt.toISOString(),
      updatedAt: c.updatedAt.toISOString(),
      ...(withVectors ? { centroid: [...c.centroid] } : {}),
    })),
    profile: profile
      ? {
          explicitAttributes: Object.values(profile.explicitAttributes).map((a) => ({
            ...a,
            timestamp: a.timestamp.toISOString(),
          })),
          implicitTraits: profile.implicitTraits.map((t) => ({
            ...t,
            evidence: [...t.evidence],
            lastUpdated: t.lastUpdated.toISOString(),
          })),
          conflictHistory: profile.conflictHistory.map((c) => ({
            id: c.id,
            attributeName: c.attributeName,
            oldValue: c.oldValue,
            newValue: c.newValue,
            oldTimestamp: c.oldTimestamp.toISOString(),
            newTimestamp: c.newTimestamp.toISOString(),
            resolutionStrategy: c.resolutionStrategy,
            outcome: c.outcome,
            detectedAt: c.detectedAt.toISOString(),
          })),
          sourceClusterIds: [...profile.sourceClusterIds],
          updatedAt: profile.updatedAt.toISOString(),
        }
      : null,
  };
}

export async function writeExportFile(filePath: string, data: MemoryExportV1): Promise<void> {
  await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await writeFile(filePath, JSON.stringify(data, null, 2) + "\n", "utf-8");
}
