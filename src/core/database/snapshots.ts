/**
 * Snapshot persistence
 */

import Database from "better-sqlite3";
import { DB_CONSTANTS } from "../constants/index";
import type { SnapshotStore } from "../history/store";
import type {
  Product,
  SequenceVerdict,
  Snapshot,
  SnapshotEntry,
  SnapshotRow,
} from "../types";

const isRecord = (v: unknown): v is Record<string, unknown> =>
  !!v && typeof v === "object" && !Array.isArray(v);

const isNullableNumber = (v: unknown) => v === null || typeof v === "number";

function isProduct(v: unknown): v is Product {
  return (
    isRecord(v) &&
    typeof v.id === "string" &&
    typeof v.title === "string" &&
    (v.handle === null || typeof v.handle === "string") &&
    typeof v.priceMinor === "number" &&
    isNullableNumber(v.originalPriceMinor) &&
    isNullableNumber(v.discountAmountMinor) &&
    isNullableNumber(v.discountPercent) &&
    typeof v.sizeType === "string" &&
    Array.isArray(v.sizes) &&
    v.sizes.every((s) => typeof s === "string") &&
    typeof v.description === "string"
  );
}

function isVerdict(v: unknown): v is SequenceVerdict {
  if (!isRecord(v)) return false;
  switch (v.kind) {
    case "sequential":
      return true;
    case "non_sequential":
      return typeof v.reason === "string" && typeof v.index === "number";
    case "not_applicable":
      return typeof v.reason === "string";
    default:
      return false;
  }
}

export function serializeSnapshot(snapshot: Snapshot): string {
  return JSON.stringify({
    takenAt: snapshot.takenAt,
    entries: Array.from(snapshot.entries.values()),
  });
}

/**
 * Rebuilds a snapshot from its stored JSON; entries that do not match the
 * current shape are dropped.
 */
export function deserializeSnapshot(payload: string): Snapshot {
  const parsed: unknown = JSON.parse(payload);
  if (!isRecord(parsed) || typeof parsed.takenAt !== "string") {
    throw new Error("Stored snapshot is not a snapshot object");
  }
  const entries = new Map<string, SnapshotEntry>();
  const list = Array.isArray(parsed.entries) ? parsed.entries : [];
  for (const e of list) {
    if (!isRecord(e) || !isProduct(e.product) || !isVerdict(e.verdict)) continue;
    if (entries.has(e.product.id)) continue;
    entries.set(e.product.id, Object.freeze({ product: e.product, verdict: e.verdict }));
  }
  return Object.freeze({ takenAt: parsed.takenAt, entries });
}

/**
 * Stores snapshots in SQLite and prunes to the retention limit in the same
 * transaction as the insert.
 */
export class SqliteSnapshotStore implements SnapshotStore {
  constructor(
    private readonly db: Database.Database,
    private readonly retention: number = DB_CONSTANTS.SNAPSHOT_RETENTION,
  ) {}

  latest(): Snapshot | null {
    const row = this.db
      .prepare<[], SnapshotRow>(
        `SELECT * FROM snapshots ORDER BY id DESC LIMIT 1`,
      )
      .get();
    return row ? deserializeSnapshot(row.payload) : null;
  }

  list(): Snapshot[] {
    return this.db
      .prepare<[], SnapshotRow>(`SELECT * FROM snapshots ORDER BY id ASC`)
      .all()
      .map((row) => deserializeSnapshot(row.payload));
  }

  save(snapshot: Snapshot): void {
    const insert = this.db.prepare(
      `INSERT INTO snapshots (taken_at, product_count, payload) VALUES (?, ?, ?)`,
    );
    const prune = this.db.prepare(
      `DELETE FROM snapshots WHERE id NOT IN (SELECT id FROM snapshots ORDER BY id DESC LIMIT ?)`,
    );
    const tx = this.db.transaction(() => {
      insert.run(
        snapshot.takenAt,
        snapshot.entries.size,
        serializeSnapshot(snapshot),
      );
      prune.run(this.retention);
    });
    tx();
  }

  count(): number {
    const row = this.db
      .prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM snapshots`)
      .get();
    return row?.n ?? 0;
  }
}
