/**
 * Snapshot retention
 */

import { DB_CONSTANTS } from "../constants/index";
import type { Snapshot } from "../types";
import { Ring } from "./ring";

export interface SnapshotStore {
  /** Newest saved snapshot, the baseline for the next diff */
  latest(): Snapshot | null;
  save(snapshot: Snapshot): void;
  /** Retained snapshots, oldest first */
  list(): Snapshot[];
}

/** Keeps the two most recent snapshots in process memory */
export class MemorySnapshotStore implements SnapshotStore {
  private readonly ring = new Ring<Snapshot>(DB_CONSTANTS.SNAPSHOT_RETENTION);

  latest(): Snapshot | null {
    return this.ring.latest() ?? null;
  }

  save(snapshot: Snapshot): void {
    this.ring.push(snapshot);
  }

  list(): Snapshot[] {
    return this.ring.toArray();
  }
}
