import Database from 'better-sqlite3';
import type { RunResult } from 'better-sqlite3';
import { drizzle, BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import { mkdirSync, readFileSync } from 'fs';
import path from 'path';
import { ValidatedConfiguration } from '../../config';
import { createLogger } from '../../lib/logger';
import { DatabaseError } from '../../shared/errors';
import * as schema from './schema';

const logger = createLogger('database');

const SQL_DIR = path.resolve(__dirname, '../../../sql');

export const IN_MEMORY = ':memory:';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

/**
 * Anything queries can run on: a session's database or an open transaction
 */
export type Executor = BaseSQLiteDatabase<'sync', RunResult, typeof schema>;

export interface Session {
  readonly db: AppDatabase;
  readonly connection: Database.Database;
}

function openSession(databasePath: string): Session {
  if (databasePath !== IN_MEMORY) {
    mkdirSync(path.dirname(databasePath), { recursive: true });
  }

  const connection = new Database(databasePath);
  connection.pragma('foreign_keys = ON');
  if (databasePath !== IN_MEMORY) {
    connection.pragma('journal_mode = WAL');
    connection.pragma('busy_timeout = 5000');
  }

  return { connection, db: drizzle(connection, { schema }) };
}

/**
 * Bounded pool of database sessions. Sessions are handed out one task at a
 * time and always come back through `withSession`.
 */
export class SessionPool {
  private readonly idle: Session[] = [];
  private readonly waiters: Array<(session: Session) => void> = [];
  private created = 0;
  private closed = false;

  constructor(
    private readonly factory: () => Session,
    private readonly size: number,
    /** False when the factory hands out a connection owned elsewhere */
    private readonly ownsSessions: boolean = true
  ) {
    if (size < 1) {
      throw new Error(`Session pool size must be at least 1, got ${size}`);
    }
  }

  async acquire(): Promise<Session> {
    if (this.closed) {
      throw new DatabaseError('Session pool is closed', 'query');
    }

    const idle = this.idle.pop();
    if (idle) return idle;

    if (this.created < this.size) {
      this.created++;
      return this.factory();
    }

    return new Promise<Session>(resolve => this.waiters.push(resolve));
  }

  release(session: Session): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(session);
      return;
    }

    if (this.closed) {
      this.dispose(session);
      return;
    }
    this.idle.push(session);
  }

  /**
   * Run `task` with a session of its own, releasing it whatever happens
   */
  async withSession<T>(task: (session: Session) => Promise<T> | T): Promise<T> {
    const session = await this.acquire();
    try {
      return await task(session);
    } finally {
      this.release(session);
    }
  }

  close(): void {
    this.closed = true;
    this.idle.splice(0).forEach(session => this.dispose(session));
  }

  private dispose(session: Session): void {
    if (this.ownsSessions) {
      session.connection.close();
    }
  }
}

export interface DatabaseClientOptions {
  path?: string;
  sessionPoolSize?: number;
}

/**
 * Primary session plus the pool that worker tasks draw from. An in-memory
 * database exists only on its own connection, so there every pooled session
 * shares the primary one.
 */
export class DatabaseClient {
  readonly path: string;
  readonly primary: Session;
  readonly pool: SessionPool;

  private constructor(databasePath: string, sessionPoolSize: number) {
    this.path = databasePath;
    this.primary = openSession(databasePath);
    this.pool =
      databasePath === IN_MEMORY
        ? new SessionPool(() => this.primary, sessionPoolSize, false)
        : new SessionPool(() => openSession(databasePath), sessionPoolSize);
  }

  static open(options: DatabaseClientOptions = {}): DatabaseClient {
    const databasePath = options.path ?? ValidatedConfiguration.database.path;
    const client = new DatabaseClient(
      databasePath,
      options.sessionPoolSize ?? ValidatedConfiguration.database.sessionPoolSize
    );
    client.applySchema();
    logger.debug({ path: databasePath }, 'Database opened');
    return client;
  }

  get db(): AppDatabase {
    return this.primary.db;
  }

  withSession<T>(task: (session: Session) => Promise<T> | T): Promise<T> {
    return this.pool.withSession(task);
  }

  /**
   * Create missing tables; with `drop`, recreate every table from scratch
   */
  applySchema(options: { drop?: boolean } = {}): void {
    try {
      if (options.drop) {
        this.primary.connection.exec(readFileSync(path.join(SQL_DIR, 'drop.sql'), 'utf8'));
        logger.warn({ path: this.path }, 'Dropped all tables');
      }
      this.primary.connection.exec(readFileSync(path.join(SQL_DIR, 'schema.sql'), 'utf8'));
    } catch (error) {
      throw new DatabaseError(
        'Failed to apply database schema',
        'query',
        undefined,
        { operation: 'applySchema' },
        error instanceof Error ? error : undefined
      );
    }
  }

  close(): void {
    this.pool.close();
    this.primary.connection.close();
  }
}
