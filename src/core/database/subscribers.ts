/**
 * Subscriber persistence
 */

import Database from "better-sqlite3";
import type { SubscriberRow } from "../types";

export interface SubscriberStore {
  list(): number[];
  has(chatId: number): boolean;
  /** @returns false when the chat was already subscribed */
  add(chatId: number): boolean;
  /** @returns false when the chat was not subscribed */
  remove(chatId: number): boolean;
}

export class SqliteSubscriberStore implements SubscriberStore {
  constructor(private readonly db: Database.Database) {}

  list(): number[] {
    return this.db
      .prepare<[], SubscriberRow>(
        `SELECT chat_id, subscribed_at FROM subscribers ORDER BY subscribed_at, chat_id`,
      )
      .all()
      .map((r) => Number(r.chat_id));
  }

  has(chatId: number): boolean {
    return (
      this.db
        .prepare<[number], SubscriberRow>(
          `SELECT chat_id, subscribed_at FROM subscribers WHERE chat_id = ?`,
        )
        .get(chatId) !== undefined
    );
  }

  add(chatId: number): boolean {
    const info = this.db
      .prepare(`INSERT OR IGNORE INTO subscribers (chat_id) VALUES (?)`)
      .run(chatId);
    return info.changes > 0;
  }

  remove(chatId: number): boolean {
    const info = this.db
      .prepare(`DELETE FROM subscribers WHERE chat_id = ?`)
      .run(chatId);
    return info.changes > 0;
  }
}
