import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { consensusRecordSchema } from '../consensus/types.js';
import type { ConsensusRecord } from '../consensus/types.js';
import { parsePredictionRecord } from '../consensus/predictions.js';
import type { PredictionRecord } from '../consensus/predictions.js';
import { TIMEFRAMES } from '../core/types.js';
import type { Timeframe } from '../core/types.js';
import type { ConsensusStore, PredictionStore } from './predictionStore.js';

interface DocumentRow {
  timeframe: string;
  document: string;
}

const timeframeOrder = (timeframe: string): number => TIMEFRAMES.findIndex((tf) => tf === timeframe);

/**
 * Keyed JSON documents in SQLite. Each (source, symbol, timeframe) prediction
 * and each (symbol, timeframe) consensus occupies one row that writes replace.
 */
export class SqliteStore implements PredictionStore, ConsensusStore {
  private readonly db: Database.Database;

  constructor(dbPath = './data/analysis.sqlite') {
    if (dbPath !== ':memory:') mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.init();
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS predictions (
        source TEXT NOT NULL,
        symbol TEXT NOT NULL,
        timeframe TEXT NOT NULL,
        label TEXT NOT NULL,
        confidence REAL NOT NULL,
        document TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (source, symbol, timeframe)
      );

      CREATE TABLE IF NOT EXISTS consensus (
        symbol TEXT NOT NULL,
        timeframe TEXT NOT NULL,
        label TEXT NOT NULL,
        confidence REAL NOT NULL,
        document TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (symbol, timeframe)
      );
    `);
  }

  async savePrediction(record: PredictionRecord): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO predictions(source, symbol, timeframe, label, confidence, document, updated_at)
         VALUES(@source, @symbol, @timeframe, @label, @confidence, @document, @updatedAt)
         ON CONFLICT(source, symbol, timeframe) DO UPDATE SET
           label=excluded.label,
           confidence=excluded.confidence,
           document=excluded.document,
           updated_at=excluded.updated_at`
      )
      .run({
        source: record.source,
        symbol: record.symbol,
        timeframe: record.timeframe,
        label: record.label,
        confidence: record.confidence,
        document: JSON.stringify(record),
        updatedAt: record.timestamp
      });
  }

  async getPrediction(source: string, symbol: string, timeframe: Timeframe): Promise<PredictionRecord | undefined> {
    const row = this.db
      .prepare<[string, string, string], DocumentRow>(
        'SELECT timeframe, document FROM predictions WHERE source = ? AND symbol = ? AND timeframe = ?'
      )
      .get(source, symbol, timeframe);
    return row ? parsePredictionRecord(JSON.parse(row.document)) : undefined;
  }

  async getPredictionsForSymbol(source: string, symbol: string): Promise<PredictionRecord[]> {
    const rows = this.db
      .prepare<[string, string], DocumentRow>('SELECT timeframe, document FROM predictions WHERE source = ? AND symbol = ?')
      .all(source, symbol);
    return rows
      .sort((a, b) => timeframeOrder(a.timeframe) - timeframeOrder(b.timeframe))
      .map((row) => parsePredictionRecord(JSON.parse(row.document)));
  }

  async saveConsensus(record: ConsensusRecord): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO consensus(symbol, timeframe, label, confidence, document, updated_at)
         VALUES(@symbol, @timeframe, @label, @confidence, @document, @updatedAt)
         ON CONFLICT(symbol, timeframe) DO UPDATE SET
           label=excluded.label,
           confidence=excluded.confidence,
           document=excluded.document,
           updated_at=excluded.updated_at`
      )
      .run({
        symbol: record.symbol,
        timeframe: record.timeframe,
        label: record.label,
        confidence: record.confidence,
        document: JSON.stringify(record),
        updatedAt: record.timestamp
      });
  }

  async getConsensus(symbol: string, timeframe: Timeframe): Promise<ConsensusRecord | undefined> {
    const row = this.db
      .prepare<[string, string], DocumentRow>('SELECT timeframe, document FROM consensus WHERE symbol = ? AND timeframe = ?')
      .get(symbol, timeframe);
    return row ? consensusRecordSchema.parse(JSON.parse(row.document)) : undefined;
  }

  async listConsensus(symbol: string): Promise<ConsensusRecord[]> {
    const rows = this.db
      .prepare<[string], DocumentRow>('SELECT timeframe, document FROM consensus WHERE symbol = ?')
      .all(symbol);
    return rows
      .sort((a, b) => timeframeOrder(a.timeframe) - timeframeOrder(b.timeframe))
      .map((row) => consensusRecordSchema.parse(JSON.parse(row.document)));
  }

  close(): void {
    this.db.close();
  }
}
