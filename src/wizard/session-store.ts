/**
 * Session store for wizard runs
 *
 * One row per user holding the step they are on and the answers accepted so
 * far. Every write is a single SQL statement, so a crash leaves either the
 * old row or the new one, never a mix.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { DebugLogger } from '../debug-logger.js';
import { PersistenceError } from '../errors.js';
import type { AnswerValue, Session, StoredSession } from './types.js';

const logger = new DebugLogger('store');

/**
 * Durable per-user session storage
 */
export interface SessionStore {
  get(userId: string): Session | null;
  /** Insert or replace the session for `userId` */
  put(userId: string, session: Session): void;
  /** Remove the session for `userId`; nothing happens if there is none */
  delete(userId: string): void;
}

// ============================================================================
// Database row types
// ============================================================================

interface SessionRow {
  user_id: string;
  current_step: number;
  answers: string;
  created_at: number;
  updated_at: number;
}

/**
 * Open (or create) a session database file with durable write settings
 */
export function openSessionDatabase(path: string): Database.Database {
  try {
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true });
    }
    const db = new Database(path);
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = FULL');
    db.pragma('busy_timeout = 5000');
    return db;
  } catch (error) {
    throw new PersistenceError('open', describe(error), { path });
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isAnswerValue(value: unknown): value is AnswerValue {
  return (typeof value === 'number' && Number.isFinite(value)) || typeof value === 'string';
}

function checkShape(session: Session): string | null {
  if (!Number.isInteger(session.currentStep) || session.currentStep < 0) {
    return `invalid step ${session.currentStep}`;
  }
  if (session.answers.length !== session.currentStep) {
    return `${session.answers.length} answers recorded at step ${session.currentStep}`;
  }
  return null;
}

// ============================================================================
// SqliteSessionStore Class
// ============================================================================

/**
 * SQLite-backed session store
 */
export class SqliteSessionStore implements SessionStore {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.runMigration();
  }

  private runMigration(): void {
    try {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS wizard_sessions (
          user_id TEXT PRIMARY KEY,
          current_step INTEGER NOT NULL,
          answers TEXT NOT NULL,
          created_at INTEGER NOT NULL,
          updated_at INTEGER NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_wizard_sessions_updated
          ON wizard_sessions(updated_at);
      `);
    } catch (error) {
      throw new PersistenceError('migrate', describe(error));
    }
  }

  get(userId: string): Session | null {
    const row = this.run('get', userId, () =>
      this.db
        .prepare<[string], SessionRow>('SELECT * FROM wizard_sessions WHERE user_id = ?')
        .get(userId)
    );

    return row ? this.rowToSession(row) : null;
  }

  put(userId: string, session: Session): void {
    const problem = session.userId === userId ? checkShape(session) : 'user id mismatch';
    if (problem) {
      throw new PersistenceError('put', `refusing to store malformed session: ${problem}`, {
        userId,
      });
    }

    const now = Date.now();
    // A step-0 write only comes from a fresh start, so it restarts created_at too
    this.run('put', userId, () =>
      this.db
        .prepare(
          `
        INSERT INTO wizard_sessions (user_id, current_step, answers, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(user_id) DO UPDATE SET
          current_step = excluded.current_step,
          answers = excluded.answers,
          created_at = CASE WHEN excluded.current_step = 0 THEN excluded.created_at ELSE created_at END,
          updated_at = excluded.updated_at
      `
        )
        .run(userId, session.currentStep, JSON.stringify(session.answers), now, now)
    );
    logger.debug(`put user=${userId} step=${session.currentStep}`);
  }

  delete(userId: string): void {
    const result = this.run('delete', userId, () =>
      this.db.prepare('DELETE FROM wizard_sessions WHERE user_id = ?').run(userId)
    );
    logger.debug(`delete user=${userId} removed=${result.changes}`);
  }

  /**
   * All sessions in progress, most recently updated first
   */
  list(): StoredSession[] {
    const rows = this.run('list', undefined, () =>
      this.db
        .prepare<[], SessionRow>('SELECT * FROM wizard_sessions ORDER BY updated_at DESC')
        .all()
    );

    return rows.map((row) => ({
      ...this.rowToSession(row),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    }));
  }

  count(): number {
    const row = this.run('count', undefined, () =>
      this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM wizard_sessions').get()
    );
    return row?.total ?? 0;
  }

  /**
   * Close database connection
   */
  close(): void {
    this.db.close();
  }

  private run<T>(operation: string, userId: string | undefined, statement: () => T): T {
    try {
      return statement();
    } catch (error) {
      throw new PersistenceError(operation, describe(error), userId ? { userId } : {});
    }
  }

  /**
   * Convert database row to Session object
   */
  private rowToSession(row: SessionRow): Session {
    let answers: unknown;
    try {
      answers = JSON.parse(row.answers);
    } catch {
      throw new PersistenceError('get', 'answers column is not valid JSON', {
        userId: row.user_id,
      });
    }
    if (!Array.isArray(answers) || !answers.every(isAnswerValue)) {
      throw new PersistenceError('get', 'answers column is not a list of values', {
        userId: row.user_id,
      });
    }

    const session: Session = {
      userId: row.user_id,
      currentStep: row.current_step,
      answers,
    };
    const problem = checkShape(session);
    if (problem) {
      throw new PersistenceError('get', `stored session is inconsistent: ${problem}`, {
        userId: row.user_id,
      });
    }
    return session;
  }
}
