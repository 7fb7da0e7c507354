/**
 * Database-related types
 */

import Database from "better-sqlite3";

export interface DbHandles {
  db: Database.Database;
}

export interface SnapshotRow {
  id: number;
  taken_at: string;
  product_count: number;
  payload: string;
}

export interface SubscriberRow {
  chat_id: number;
  subscribed_at: string;
}
