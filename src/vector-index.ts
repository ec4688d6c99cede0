import type Database from "better-sqlite3";
import { z } from "zod";
import { log } from "./logger.js";
import type { VectorIndex, VectorPayload } from "./types.js";
import { cosineSimilarity } from "./vector.js";

const VectorSchema = z.array(z.number());

function parseVector(raw: string): number[] | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = VectorSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

/**
 * Nearest-neighbour search by cosine similarity over vectors kept in SQLite.
 * A full scan per query; adequate for per-user memory sizes.
 */
export class SqliteVectorIndex implements VectorIndex {
  constructor(private readonly db: Database.Database) {}

  async upsert(id: string, vector: readonly number[], payload: VectorPayload): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO unit_vectors(id, user_id, cluster_id, created_at, vector) VALUES (?,?,?,?,?)
         ON CONFLICT(id) DO UPDATE SET user_id = excluded.user_id, cluster_id = excluded.cluster_id,
           created_at = excluded.created_at, vector = excluded.vector`,
      )
      .run(id, payload.userId, payload.clusterId, payload.createdAt, JSON.stringify(vector));
  }

  async search(userId: string, vector: readonly number[], topK: number): Promise<string[]> {
    const rows = this.db
      .prepare("SELECT id, vector FROM unit_vectors WHERE user_id = ? ORDER BY rowid")
      .all(userId) as Array<{ id: string; vector: string }>;

    const scored: Array<{ id: string; score: number }> = [];
    for (const row of rows) {
      const stored = parseVector(row.vector);
      if (!stored) {
        log.warn(`vector index: skipping unreadable vector for ${row.id}`);
        continue;
      }
      const score = cosineSimilarity(vector, stored);
      if (Number.isFinite(score)) scored.push({ id: row.id, score });
    }

    // Array.prototype.sort is stable: equal scores keep insertion order.
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, Math.max(0, topK)).map((s) => s.id);
  }

  async clear(userId: string): Promise<void> {
    this.db.prepare("DELETE FROM unit_vectors WHERE user_id = ?").run(userId);
  }
}
