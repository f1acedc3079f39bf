/**
 * Feedback Store
 *
 * Append-only log of confirm/reject actions.
 */

import type Database from 'better-sqlite3';
import type { FeedbackAction, FeedbackEvent } from '@cmdrecall/common';

export class FeedbackStore {
  constructor(private db: Database.Database) {}

  append(event: Omit<FeedbackEvent, 'id'>): FeedbackEvent {
    const result = this.db.prepare(`
      INSERT INTO feedback_events (query_hash, command, action, timestamp)
      VALUES (?, ?, ?, ?)
    `).run(event.queryHash, event.command, event.action, event.timestamp);

    return {
      id: Number(result.lastInsertRowid),
      ...event,
    };
  }

  /**
   * Newest events first
   */
  listByHash(queryHash: string, limit: number = 50): FeedbackEvent[] {
    const rows = this.db
      .prepare(`
        SELECT * FROM feedback_events
        WHERE query_hash = ?
        ORDER BY timestamp DESC, id DESC
        LIMIT ?
      `)
      .all(queryHash, limit) as FeedbackRow[];

    return rows.map((row) => this.rowToEvent(row));
  }

  count(): number {
    const row = this.db
      .prepare('SELECT COUNT(*) as count FROM feedback_events')
      .get() as { count: number };
    return row.count;
  }

  clear(): number {
    return this.db.prepare('DELETE FROM feedback_events').run().changes;
  }

  private rowToEvent(row: FeedbackRow): FeedbackEvent {
    return {
      id: row.id,
      queryHash: row.query_hash,
      command: row.command,
      action: row.action,
      timestamp: row.timestamp,
    };
  }
}

interface FeedbackRow {
  id: number;
  query_hash: string;
  command: string;
  action: FeedbackAction;
  timestamp: number;
}
