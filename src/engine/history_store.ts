/**
 * @fileoverview Analysis history kept by the advisory engine.
 *
 * SQLite via better-sqlite3. Without a storage path the database lives in
 * memory and is discarded with the engine.
 *
 * @packageDocumentation
 */

import Database from 'better-sqlite3';
import type { NativeOperation } from '../native/types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface AnalysisRecord {
  analysisId: string;
  queryId: string;
  userId: string | null;
  operation: NativeOperation;
  /** Token symbol, contract address or question. */
  subject: string;
  confidence: number;
  summary: string;
  /** Seconds since epoch. */
  analyzedAt: number;
}

export interface HistoryStats {
  total: number;
  averageConfidence: number;
  firstAnalysis: number | null;
  lastAnalysis: number | null;
}

interface AnalysisRow {
  analysis_id: string;
  query_id: string;
  user_id: string | null;
  operation: NativeOperation;
  subject: string;
  confidence: number;
  summary: string;
  analyzed_at: number;
}

interface StatsRow {
  total: number;
  average_confidence: number | null;
  first_analysis: number | null;
  last_analysis: number | null;
}

const SUMMARY_LENGTH = 200;

export function summarize(text: string): string {
  const firstParagraph = text.trim().split(/\n\s*\n/)[0] ?? '';
  const flattened = firstParagraph.replace(/\s+/g, ' ').trim();
  return flattened.length > SUMMARY_LENGTH ? `${flattened.slice(0, SUMMARY_LENGTH - 1)}…` : flattened;
}

function toRecord(row: AnalysisRow): AnalysisRecord {
  return {
    analysisId: row.analysis_id,
    queryId: row.query_id,
    userId: row.user_id,
    operation: row.operation,
    subject: row.subject,
    confidence: row.confidence,
    summary: row.summary,
    analyzedAt: row.analyzed_at,
  };
}

// ============================================================================
// STORE
// ============================================================================

export class AnalysisHistoryStore {
  private readonly stmtInsert: Database.Statement<[string, string, string | null, string, string, number, string, number]>;
  private readonly stmtRecent: Database.Statement<[number], AnalysisRow>;
  private readonly stmtRecentForUser: Database.Statement<[string, number], AnalysisRow>;
  private readonly stmtLatestForSubject: Database.Statement<[string], AnalysisRow>;
  private readonly stmtStats: Database.Statement<[], StatsRow>;
  private closed = false;

  /** Opens `path`, or an in-memory database when no path is given. */
  static open(path?: string): AnalysisHistoryStore {
    return new AnalysisHistoryStore(new Database(path ?? ':memory:'));
  }

  constructor(private readonly db: Database.Database) {
    this.ensureTable();

    this.stmtInsert = this.db.prepare<[string, string, string | null, string, string, number, string, number]>(`
      INSERT INTO advisor_analysis_history
        (analysis_id, query_id, user_id, operation, subject, confidence, summary, analyzed_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.stmtRecent = this.db.prepare<[number], AnalysisRow>(`
      SELECT * FROM advisor_analysis_history
      ORDER BY analyzed_at DESC, rowid DESC
      LIMIT ?
    `);

    this.stmtRecentForUser = this.db.prepare<[string, number], AnalysisRow>(`
      SELECT * FROM advisor_analysis_history
      WHERE user_id = ?
      ORDER BY analyzed_at DESC, rowid DESC
      LIMIT ?
    `);

    this.stmtLatestForSubject = this.db.prepare<[string], AnalysisRow>(`
      SELECT * FROM advisor_analysis_history
      WHERE subject = ?
      ORDER BY analyzed_at DESC, rowid DESC
      LIMIT 1
    `);

    this.stmtStats = this.db.prepare<[], StatsRow>(`
      SELECT
        COUNT(*) AS total,
        AVG(confidence) AS average_confidence,
        MIN(analyzed_at) AS first_analysis,
        MAX(analyzed_at) AS last_analysis
      FROM advisor_analysis_history
    `);
  }

  get isMemory(): boolean {
    return this.db.memory;
  }

  private ensureTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS advisor_analysis_history (
        analysis_id TEXT PRIMARY KEY,
        query_id TEXT NOT NULL,
        user_id TEXT,
        operation TEXT NOT NULL,
        subject TEXT NOT NULL,
        confidence REAL NOT NULL,
        summary TEXT NOT NULL,
        analyzed_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_analysis_history_subject ON advisor_analysis_history(subject);
      CREATE INDEX IF NOT EXISTS idx_analysis_history_user ON advisor_analysis_history(user_id);
    `);
  }

  record(entry: AnalysisRecord): void {
    this.stmtInsert.run(
      entry.analysisId,
      entry.queryId,
      entry.userId,
      entry.operation,
      entry.subject,
      entry.confidence,
      entry.summary,
      entry.analyzedAt
    );
  }

  /** Newest first. */
  recent(limit = 20, userId?: string): AnalysisRecord[] {
    const rows = userId === undefined ? this.stmtRecent.all(limit) : this.stmtRecentForUser.all(userId, limit);
    return rows.map(toRecord);
  }

  latestFor(subject: string): AnalysisRecord | undefined {
    const row = this.stmtLatestForSubject.get(subject);
    return row ? toRecord(row) : undefined;
  }

  stats(): HistoryStats {
    const row = this.stmtStats.get();
    return {
      total: row?.total ?? 0,
      averageConfidence: row?.average_confidence ?? 0,
      firstAnalysis: row?.first_analysis ?? null,
      lastAnalysis: row?.last_analysis ?? null,
    };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }
}
