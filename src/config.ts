import path from "node:path";
import type { EngineConfig, ReasoningEffort } from "./types.js";
import { log } from "./logger.js";

const DEFAULT_DATABASE_PATH = path.join(process.env.HOME ?? "~", ".strata-memory", "memory.db");

function resolveEnvVars(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
    const envValue = process.env[envVar];
    if (!envValue) {
      throw new Error(`Environment variable ${envVar} is not set`);
    }
    return envValue;
  });
}

function normalizeOpenaiBaseUrl(value: string | undefined, source: "config" | "env"): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    log.warn(`ignoring invalid openaiBaseUrl from ${source}: not a valid URL`);
    return undefined;
  }

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    log.warn(
      `ignoring openaiBaseUrl from ${source}: unsupported URL scheme (${parsed.protocol.replace(":", "")})`,
    );
    return undefined;
  }

  if (parsed.protocol === "http:") {
    log.warn(`openaiBaseUrl from ${source} is using insecure http; prefer https`);
  }

  return parsed.toString().replace(/\/+$/, "");
}

const VALID_EFFORTS: readonly ReasoningEffort[] = ["none", "low", "medium", "high"];

function isEffort(value: unknown): value is ReasoningEffort {
  return VALID_EFFORTS.some((e) => e === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : fallback;
}

function clampNumber(value: unknown, fallback: number, min: number, max: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, value));
}

function clampInt(value: unknown, fallback: number, min: number, max: number): number {
  return Math.floor(clampNumber(value, fallback, min, max));
}

export function parseConfig(raw: unknown): EngineConfig {
  const cfg = isRecord(raw) ? raw : {};

  let apiKey: string | undefined;
  if (typeof cfg.openaiApiKey === "string" && cfg.openaiApiKey.length > 0) {
    apiKey = resolveEnvVars(cfg.openaiApiKey);
  } else {
    apiKey = process.env.OPENAI_API_KEY;
  }
  // A missing key is not fatal here; the LLM-backed services complain on first use.

  const openaiBaseUrl =
    normalizeOpenaiBaseUrl(typeof cfg.openaiBaseUrl === "string" ? cfg.openaiBaseUrl : undefined, "config") ??
    normalizeOpenaiBaseUrl(process.env.OPENAI_BASE_URL, "env");

  const reasoningEffort: ReasoningEffort = isEffort(cfg.reasoningEffort) ? cfg.reasoningEffort : "low";

  const databasePath =
    typeof cfg.databasePath === "string" && cfg.databasePath.length > 0
      ? cfg.databasePath
      : DEFAULT_DATABASE_PATH;

  return {
    openaiApiKey: apiKey,
    openaiBaseUrl,
    model: nonEmptyString(cfg.model, "gpt-5.2"),
    reasoningEffort,
    embeddingModel: nonEmptyString(cfg.embeddingModel, "text-embedding-3-small"),
    embeddingDimensions: clampInt(cfg.embeddingDimensions, 1536, 1, 8192),
    databasePath,
    debug: cfg.debug === true,
    clusterSimilarityThreshold: clampNumber(cfg.clusterSimilarityThreshold, 0.7, 0, 1),
    ongoingForesightDays: clampInt(cfg.ongoingForesightDays, 30, 1, 3650),
    rrfK: clampInt(cfg.rrfK, 60, 1, 1000),
    searchTopK: clampInt(cfg.searchTopK, 10, 1, 200),
    maxContextUnits: clampInt(cfg.maxContextUnits, 8, 1, 100),
    clusterSelectionTopK: clampInt(cfg.clusterSelectionTopK, 5, 0, 100),
    maxQueryRewrites: clampInt(cfg.maxQueryRewrites, 3, 0, 10),
    recallTimeoutMs: clampInt(cfg.recallTimeoutMs, 60_000, 1_000, 600_000),
    llmTimeoutMs: clampInt(cfg.llmTimeoutMs, 30_000, 1_000, 300_000),
  };
}
