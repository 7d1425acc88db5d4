import fs from 'fs';
import path from 'path';
import initSqlJs, { Database as SqlJsDatabase, SqlValue } from 'sql.js';
import { AggregateQuery, AlertRecord, Chain, Mention, WindowAggregate, parseChain } from '../types/mentions';
import { TrendingToken } from '../types/trending';
import { AppError, ErrorSeverity, createErrorContext } from '../utils/errorHandler';
import { logger } from '../utils/logger';

/**
 * Read/write contract the trending engine and its collaborators rely on.
 * Timestamps are epoch milliseconds.
 */
export interface MentionStore {
  /** Returns false when (contract, sourceId, occurrenceId) was already stored. */
  recordMention(mention: Mention): Promise<boolean>;
  aggregateWindow(query: AggregateQuery): Promise<WindowAggregate[]>;
  /** Mentions of `contract` with since <= observedAt < until. */
  countInRange(contract: string, since: number, until: number): Promise<number>;
  deleteOlderThan(before: number): Promise<number>;
  recordAlertHistory(token: TrendingToken, alertedAt: number): Promise<void>;
  getRecentAlerts(limit: number): Promise<AlertRecord[]>;
  isConnected(): boolean;
  close(): Promise<void>;
}

export const IN_MEMORY_PATH = ':memory:';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS contract_mentions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    contract TEXT NOT NULL,
    chain TEXT NOT NULL,
    chat_id INTEGER NOT NULL,
    message_id INTEGER NOT NULL,
    mentioned_at INTEGER NOT NULL,
    UNIQUE (contract, chat_id, message_id)
  );

  CREATE INDEX IF NOT EXISTS idx_mentions_contract_time ON contract_mentions (contract, mentioned_at);
  CREATE INDEX IF NOT EXISTS idx_mentions_chain_time ON contract_mentions (chain, mentioned_at);
  CREATE INDEX IF NOT EXISTS idx_mentions_time ON contract_mentions (mentioned_at);

  CREATE TABLE IF NOT EXISTS alert_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    contract TEXT NOT NULL,
    chain TEXT NOT NULL,
    score REAL NOT NULL,
    mention_count INTEGER NOT NULL,
    unique_sources INTEGER NOT NULL,
    velocity REAL NOT NULL,
    alerted_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_alert_history_time ON alert_history (alerted_at);
`;

export interface SqliteStoreOptions {
  saveIntervalMs?: number;
}

function toNumber(value: SqlValue | undefined, column: string): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && !isNaN(Number(value))) return Number(value);
  throw new AppError(
    `Unexpected value in column ${column}`,
    'STORE_ERROR',
    ErrorSeverity.HIGH,
    createErrorContext('read_row', { additionalData: { column } })
  );
}

function toText(value: SqlValue | undefined, column: string): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  throw new AppError(
    `Unexpected value in column ${column}`,
    'STORE_ERROR',
    ErrorSeverity.HIGH,
    createErrorContext('read_row', { additionalData: { column } })
  );
}

function toChain(value: SqlValue | undefined): Chain {
  const chain = parseChain(toText(value, 'chain'));
  if (!chain) {
    throw new AppError(
      `Unknown chain in store: ${String(value)}`,
      'STORE_ERROR',
      ErrorSeverity.HIGH,
      createErrorContext('read_row')
    );
  }
  return chain;
}

/**
 * Mention log on SQLite compiled to WebAssembly (sql.js). The whole database
 * lives in memory and is written back to `dbPath` when dirty.
 */
export class SqliteMentionStore implements MentionStore {
  private db: SqlJsDatabase | null;
  private readonly dbPath: string;
  private saveInterval: NodeJS.Timeout | null = null;
  private dirty = false;

  private constructor(db: SqlJsDatabase, dbPath: string) {
    this.db = db;
    this.dbPath = dbPath;
  }

  static async open(dbPath: string, options: SqliteStoreOptions = {}): Promise<SqliteMentionStore> {
    try {
      const SQL = await initSqlJs();
      const persistent = dbPath !== IN_MEMORY_PATH;

      let db: SqlJsDatabase;
      if (persistent && fs.existsSync(dbPath)) {
        db = new SQL.Database(fs.readFileSync(dbPath));
        logger.info(`Loaded mention database from ${dbPath}`);
      } else {
        if (persistent) {
          fs.mkdirSync(path.dirname(dbPath), { recursive: true });
        }
        db = new SQL.Database();
        logger.info(`Created mention database at ${dbPath}`);
      }

      db.exec(SCHEMA);

      const store = new SqliteMentionStore(db, dbPath);
      if (persistent) {
        store.startAutoSave(options.saveIntervalMs ?? 30000);
      }
      return store;
    } catch (error) {
      logger.error('Failed to open mention database:', error);
      throw new AppError(
        `Failed to open mention database: ${error instanceof Error ? error.message : String(error)}`,
        'STORE_ERROR',
        ErrorSeverity.CRITICAL,
        createErrorContext('open_store', { additionalData: { dbPath } }),
        false
      );
    }
  }

  private startAutoSave(intervalMs: number): void {
    this.saveInterval = setInterval(() => {
      if (this.dirty) {
        this.saveToDisk();
      }
    }, intervalMs);
    this.saveInterval.unref();
  }

  private saveToDisk(): void {
    if (!this.db || this.dbPath === IN_MEMORY_PATH) return;

    try {
      fs.writeFileSync(this.dbPath, Buffer.from(this.db.export()));
      this.dirty = false;
      logger.debug('Mention database saved to disk');
    } catch (error) {
      logger.error('Failed to save mention database:', error);
    }
  }

  private requireDb(operation: string): SqlJsDatabase {
    if (!this.db) {
      throw new AppError(
        'Mention store is closed',
        'STORE_NOT_READY',
        ErrorSeverity.HIGH,
        createErrorContext(operation)
      );
    }
    return this.db;
  }

  private query(operation: string, sql: string, params: SqlValue[]): SqlValue[][] {
    const db = this.requireDb(operation);
    const rows: SqlValue[][] = [];
    const stmt = db.prepare(sql);
    try {
      stmt.bind(params);
      while (stmt.step()) {
        rows.push(stmt.get());
      }
    } finally {
      stmt.free();
    }
    return rows;
  }

  private execute(operation: string, sql: string, params: SqlValue[]): number {
    const db = this.requireDb(operation);
    db.run(sql, params);
    const changed = db.getRowsModified();
    if (changed > 0) {
      this.dirty = true;
    }
    return changed;
  }

  async recordMention(mention: Mention): Promise<boolean> {
    const inserted = this.execute(
      'record_mention',
      `INSERT OR IGNORE INTO contract_mentions (contract, chain, chat_id, message_id, mentioned_at)
       VALUES (?, ?, ?, ?, ?)`,
      [mention.contract, mention.chain, mention.sourceId, mention.occurrenceId, mention.observedAt]
    );
    return inserted > 0;
  }

  async aggregateWindow(query: AggregateQuery): Promise<WindowAggregate[]> {
    const params: SqlValue[] = [query.since];
    let chainFilter = '';
    if (query.chain) {
      chainFilter = 'AND chain = ?';
      params.push(query.chain);
    }
    params.push(query.minMentions, query.minUniqueSources);

    const rows = this.query(
      'aggregate_window',
      `SELECT contract, chain, COUNT(*) AS mention_count, COUNT(DISTINCT chat_id) AS unique_sources
       FROM contract_mentions
       WHERE mentioned_at >= ? ${chainFilter}
       GROUP BY contract, chain
       HAVING COUNT(*) >= ? AND COUNT(DISTINCT chat_id) >= ?`,
      params
    );

    return rows.map(row => ({
      contract: toText(row[0], 'contract'),
      chain: toChain(row[1]),
      mentionCount: toNumber(row[2], 'mention_count'),
      uniqueSources: toNumber(row[3], 'unique_sources')
    }));
  }

  async countInRange(contract: string, since: number, until: number): Promise<number> {
    const rows = this.query(
      'count_in_range',
      `SELECT COUNT(*) FROM contract_mentions
       WHERE contract = ? AND mentioned_at >= ? AND mentioned_at < ?`,
      [contract, since, until]
    );
    const first = rows[0];
    return first ? toNumber(first[0], 'count') : 0;
  }

  async deleteOlderThan(before: number): Promise<number> {
    return this.execute(
      'delete_old_mentions',
      'DELETE FROM contract_mentions WHERE mentioned_at < ?',
      [before]
    );
  }

  async recordAlertHistory(token: TrendingToken, alertedAt: number): Promise<void> {
    this.execute(
      'record_alert',
      `INSERT INTO alert_history (contract, chain, score, mention_count, unique_sources, velocity, alerted_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [token.contract, token.chain, token.score, token.mentionCount, token.uniqueSources, token.velocity, alertedAt]
    );
  }

  async getRecentAlerts(limit: number): Promise<AlertRecord[]> {
    const rows = this.query(
      'recent_alerts',
      `SELECT id, contract, chain, score, mention_count, unique_sources, velocity, alerted_at
       FROM alert_history
       ORDER BY alerted_at DESC, id DESC
       LIMIT ?`,
      [limit]
    );

    return rows.map(row => ({
      id: toNumber(row[0], 'id'),
      contract: toText(row[1], 'contract'),
      chain: toChain(row[2]),
      score: toNumber(row[3], 'score'),
      mentionCount: toNumber(row[4], 'mention_count'),
      uniqueSources: toNumber(row[5], 'unique_sources'),
      velocity: toNumber(row[6], 'velocity'),
      alertedAt: toNumber(row[7], 'alerted_at')
    }));
  }

  isConnected(): boolean {
    return this.db !== null;
  }

  async close(): Promise<void> {
    if (this.saveInterval) {
      clearInterval(this.saveInterval);
      this.saveInterval = null;
    }
    if (!this.db) return;

    if (this.dirty) {
      this.saveToDisk();
    }
    this.db.close();
    this.db = null;
    logger.info('Mention database closed');
  }
}
