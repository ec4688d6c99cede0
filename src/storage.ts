import path from "node:path";
import { mkdirSync } from "node:fs";
import Database from "better-sqlite3";
import { z } from "zod";
import { log } from "./logger.js";
import { SQLITE_SCHEMA_VERSION, SQLITE_TABLES_SQL } from "./sqlite-schema.js";
import type {
  ConflictRecord,
  Foresight,
  MemoryUnit,
  ProfileAttribute,
  ThematicCluster,
  UserProfile,
} from "./types.js";

const ForesightJsonSchema = z.object({
  id: z.string(),
  content: z.string(),
  tStart: z.string(),
  tEnd: z.string().nullable(),
  confidence: z.number(),
});

const StringArraySchema = z.array(z.string());
const NumberArraySchema = z.array(z.number());

const AttributeJsonSchema = z.object({
  attributeName: z.string(),
  value: z.string(),
  timestamp: z.string(),
  sourceUnitId: z.string(),
  confidence: z.number(),
});

const TraitJsonSchema = z.object({
  traitType: z.enum(["preference", "habit", "personality"]),
  description: z.string(),
  strength: z.number(),
  evidence: z.array(z.string()),
  lastUpdated: z.string(),
});

interface UnitRow {
  id: string;
  user_id: string;
  narrative: string;
  atomic_facts: string;
  foresights: string;
  created_at: string;
  cluster_id: string | null;
  embedding: string;
}

interface ClusterRow {
  id: string;
  user_id: string;
  theme_label: string;
  summary: string;
  member_ids: string;
  centroid: string;
  created_at: string;
  updated_at: string;
}

interface ProfileRow {
  user_id: string;
  explicit_attributes: string;
  implicit_traits: string;
  source_cluster_ids: string;
  updated_at: string;
}

interface ConflictRow {
  id: string;
  attribute_name: string;
  old_value: string;
  new_value: string;
  old_timestamp: string;
  new_timestamp: string;
  old_source_unit_id: string;
  new_source_unit_id: string;
  outcome: string;
  detected_at: string;
}

function parseJson<T>(raw: string, schema: z.ZodType<T>, what: string): T {
  const parsed = schema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`corrupt ${what} column: ${parsed.error.message}`);
  }
  return parsed.data;
}

function foresightToJson(f: Foresight): z.infer<typeof ForesightJsonSchema> {
  return {
    id: f.id,
    content: f.content,
    tStart: f.tStart.toISOString(),
    tEnd: f.tEnd ? f.tEnd.toISOString() : null,
    confidence: f.confidence,
  };
}

function rowToUnit(row: UnitRow): MemoryUnit {
  return {
    id: row.id,
    userId: row.user_id,
    narrative: row.narrative,
    atomicFacts: parseJson(row.atomic_facts, StringArraySchema, "atomic_facts"),
    foresights: parseJson(row.foresights, z.array(ForesightJsonSchema), "foresights").map((f) => ({
      id: f.id,
      content: f.content,
      tStart: new Date(f.tStart),
      tEnd: f.tEnd === null ? null : new Date(f.tEnd),
      confidence: f.confidence,
    })),
    createdAt: new Date(row.created_at),
    clusterId: row.cluster_id,
    embedding: parseJson(row.embedding, NumberArraySchema, "embedding"),
  };
}

function rowToCluster(row: ClusterRow): ThematicCluster {
  return {
    id: row.id,
    userId: row.user_id,
    themeLabel: row.theme_label,
    summary: row.summary,
    memberIds: parseJson(row.member_ids, StringArraySchema, "member_ids"),
    centroid: parseJson(row.centroid, NumberArraySchema, "centroid"),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function rowToConflict(row: ConflictRow): ConflictRecord {
  return {
    id: row.id,
    attributeName: row.attribute_name,
    oldValue: row.old_value,
    newValue: row.new_value,
    oldTimestamp: new Date(row.old_timestamp),
    newTimestamp: new Date(row.new_timestamp),
    oldSourceUnitId: row.old_source_unit_id,
    newSourceUnitId: row.new_source_unit_id,
    resolutionStrategy: "recency",
    outcome: row.outcome === "retain" ? "retain" : "override",
    detectedAt: new Date(row.detected_at),
  };
}

export interface IngestBatch {
  units: MemoryUnit[];
  clusters: ThematicCluster[];
  profile: UserProfile;
  /** Only the records produced by this batch; history rows are insert-only. */
  newConflicts: ConflictRecord[];
}

export interface StoreStats {
  units: number;
  clusters: number;
  conflicts: number;
}

/**
 * SQLite persistence for memory units, clusters and profiles.
 * Pass ":memory:" for an ephemeral database.
 */
export class MemoryStore {
  readonly db: Database.Database;

  constructor(filename: string) {
    if (filename !== ":memory:") {
      mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
    }
    this.db = new Database(filename);
    this.db.pragma("journal_mode = WAL");
    try {
      this.db.exec(SQLITE_TABLES_SQL);
      this.checkSchemaVersion();
    } catch (err) {
      this.db.close();
      throw err;
    }
  }

  private checkSchemaVersion(): void {
    const row = this.db.prepare("SELECT value FROM meta WHERE key = 'schemaVersion'").get() as
      | { value: string }
      | undefined;
    if (!row) {
      this.db
        .prepare("INSERT INTO meta(key, value) VALUES ('schemaVersion', ?)")
        .run(String(SQLITE_SCHEMA_VERSION));
      return;
    }
    if (row.value !== String(SQLITE_SCHEMA_VERSION)) {
      throw new Error(`unsupported sqlite schemaVersion: ${row.value}`);
    }
  }

  close(): void {
    this.db.close();
  }

  /** Writes units, touched clusters, the profile and new conflict records in one transaction. */
  saveBatch(batch: IngestBatch): void {
    const insertUnit = this.db.prepare(
      `INSERT OR REPLACE INTO memory_units(id, user_id, narrative, atomic_facts, foresights, created_at, cluster_id, embedding)
       VALUES (?,?,?,?,?,?,?,?)`,
    );
    const upsertCluster = this.db.prepare(
      `INSERT INTO clusters(id, user_id, theme_label, summary, member_ids, centroid, created_at, updated_at)
       VALUES (?,?,?,?,?,?,?,?)
       ON CONFLICT(id) DO UPDATE SET
         theme_label = excluded.theme_label,
         summary = excluded.summary,
         member_ids = excluded.member_ids,
         centroid = excluded.centroid,
         updated_at = excluded.updated_at`,
    );
    const upsertProfile = this.db.prepare(
      `INSERT OR REPLACE INTO profiles(user_id, explicit_attributes, implicit_traits, source_cluster_ids, updated_at)
       VALUES (?,?,?,?,?)`,
    );
    const insertConflict = this.db.prepare(
      `INSERT OR IGNORE INTO conflict_records(id, user_id, attribute_name, old_value, new_value, old_timestamp,
         new_timestamp, old_source_unit_id, new_source_unit_id, resolution_strategy, outcome, detected_at)
       VALUES (?,?,?,?,?,?,?,?,?,?,?,?)`,
    );

    const tx = this.db.transaction((b: IngestBatch) => {
      for (const u of b.units) {
        insertUnit.run(
          u.id,
          u.userId,
          u.narrative,
          JSON.stringify(u.atomicFacts),
          JSON.stringify(u.foresights.map(foresightToJson)),
          u.createdAt.toISOString(),
          u.clusterId,
          JSON.stringify(u.embedding),
        );
      }
      for (const c of b.clusters) {
        upsertCluster.run(
          c.id,
          c.userId,
          c.themeLabel,
          c.summary,
          JSON.stringify(c.memberIds),
          JSON.stringify(c.centroid),
          c.createdAt.toISOString(),
          c.updatedAt.toISOString(),
        );
      }
      const p = b.profile;
      const attributes = Object.fromEntries(
        Object.entries(p.explicitAttributes).map(([name, a]) => [
          name,
          { ...a, timestamp: a.timestamp.toISOString() },
        ]),
      );
      upsertProfile.run(
        p.userId,
        JSON.stringify(attributes),
        JSON.stringify(p.implicitTraits.map((t) => ({ ...t, lastUpdated: t.lastUpdated.toISOString() }))),
        JSON.stringify(p.sourceClusterIds),
        p.updatedAt.toISOString(),
      );
      for (const c of b.newConflicts) {
        insertConflict.run(
          c.id,
          p.userId,
          c.attributeName,
          c.oldValue,
          c.newValue,
          c.oldTimestamp.toISOString(),
          c.newTimestamp.toISOString(),
          c.oldSourceUnitId,
          c.newSourceUnitId,
          c.resolutionStrategy,
          c.outcome,
          c.detectedAt.toISOString(),
        );
      }
    });

    tx(batch);
    log.debug(
      `store: saved ${batch.units.length} units, ${batch.clusters.length} clusters, ${batch.newConflicts.length} conflicts for ${batch.profile.userId}`,
    );
  }

  getUnit(id: string): MemoryUnit | null {
    const row = this.db.prepare("SELECT * FROM memory_units WHERE id = ?").get(id) as UnitRow | undefined;
    return row ? rowToUnit(row) : null;
  }

  /** Units in the order of `ids`; unknown ids are skipped. */
  getUnits(ids: readonly string[]): MemoryUnit[] {
    if (ids.length === 0) return [];
    const placeholders = ids.map(() => "?").join(",");
    const rows = this.db
      .prepare(`SELECT * FROM memory_units WHERE id IN (${placeholders})`)
      .all(...ids) as UnitRow[];
    const byId = new Map(rows.map((r) => [r.id, rowToUnit(r)]));
    const out: MemoryUnit[] = [];
    for (const id of ids) {
      const unit = byId.get(id);
      if (unit) out.push(unit);
    }
    return out;
  }

  listUnits(userId: string): MemoryUnit[] {
    const rows = this.db
      .prepare("SELECT * FROM memory_units WHERE user_id = ? ORDER BY created_at, rowid")
      .all(userId) as UnitRow[];
    return rows.map(rowToUnit);
  }

  listUserIds(): string[] {
    const rows = this.db
      .prepare(
        "SELECT user_id FROM memory_units UNION SELECT user_id FROM profiles ORDER BY user_id",
      )
      .all() as Array<{ user_id: string }>;
    return rows.map((r) => r.user_id);
  }

  /** Clusters in creation order. */
  listClusters(userId: string): ThematicCluster[] {
    const rows = this.db
      .prepare("SELECT * FROM clusters WHERE user_id = ? ORDER BY seq")
      .all(userId) as ClusterRow[];
    return rows.map(rowToCluster);
  }

  getCluster(id: string): ThematicCluster | null {
    const row = this.db.prepare("SELECT * FROM clusters WHERE id = ?").get(id) as ClusterRow | undefined;
    return row ? rowToCluster(row) : null;
  }

  loadProfile(userId: string): UserProfile | null {
    const row = this.db.prepare("SELECT * FROM profiles WHERE user_id = ?").get(userId) as
      | ProfileRow
      | undefined;
    if (!row) return null;

    const rawAttributes = parseJson(
      row.explicit_attributes,
      z.record(z.string(), AttributeJsonSchema),
      "explicit_attributes",
    );
    const explicitAttributes: Record<string, ProfileAttribute> = Object.fromEntries(
      Object.entries(rawAttributes).map(([name, a]) => [name, { ...a, timestamp: new Date(a.timestamp) }]),
    );

    const conflictRows = this.db
      .prepare("SELECT * FROM conflict_records WHERE user_id = ? ORDER BY seq")
      .all(userId) as ConflictRow[];

    return {
      userId: row.user_id,
      explicitAttributes,
      implicitTraits: parseJson(row.implicit_traits, z.array(TraitJsonSchema), "implicit_traits").map((t) => ({
        ...t,
        lastUpdated: new Date(t.lastUpdated),
      })),
      conflictHistory: conflictRows.map(rowToConflict),
      sourceClusterIds: parseJson(row.source_cluster_ids, StringArraySchema, "source_cluster_ids"),
      updatedAt: new Date(row.updated_at),
    };
  }

  stats(userId: string): StoreStats {
    const count = (sql: string): number => {
      const row = this.db.prepare(sql).get(userId) as { n: number } | undefined;
      return row?.n ?? 0;
    };
    return {
      units: count("SELECT COUNT(*) AS n FROM memory_units WHERE user_id = ?"),
      clusters: count("SELECT COUNT(*) AS n FROM clusters WHERE user_id = ?"),
      conflicts: count("SELECT COUNT(*) AS n FROM conflict_records WHERE user_id = ?"),
    };
  }

  /** Deletes everything held for `userId`, including the conflict audit trail. */
  clearUser(userId: string): void {
    const tx = this.db.transaction((id: string) => {
      for (const table of ["memory_units", "clusters", "profiles", "conflict_records"]) {
        this.db.prepare(`DELETE FROM ${table} WHERE user_id = ?`).run(id);
      }
    });
    tx(userId);
  }
}
