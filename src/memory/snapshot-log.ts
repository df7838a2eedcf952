/**
 * Snapshot Log — SQLite persistence for the stream of snapshots
 *
 * One flat row per tick, tagged with the session that produced it and
 * which caller drove it. Rows are never updated; the log is an
 * append-only record that can later be exported as training data.
 *
 * Uses better-sqlite3 (synchronous), so recording fits inside a
 * snapshot consumer without any awaiting.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { v4 as uuid } from 'uuid';
import { AwarenessReason, Snapshot, TickOrigin } from '../core/types';

interface SnapshotRow {
  id: string;
  session_id: string;
  origin: TickOrigin;
  tick: number;
  time: number;
  pulse: number;
  attention_level: number;
  echo_count: number;
  internal_state: number;
  external_signal: number;
  total_state: number;
  direction: number;
  delta: number;
  irregular_rhythm: number;
  spontaneous_event: number;
  act_of_awareness: number;
  reason: AwarenessReason;
  acts_of_awareness_total: number;
  created_at: string;
}

export interface LoggedSnapshot {
  id: string;
  sessionId: string;
  origin: TickOrigin;
  snapshot: Snapshot;
}

/** Flat, snake_case record for downstream training pipelines */
export type TrainingRecord = Omit<SnapshotRow, 'id'>;

export interface SnapshotLogStats {
  totalSnapshots: number;
  lifeTicks: number;
  inputTicks: number;
  awarenessEvents: number;
  sessions: number;
}

export class SnapshotLog {
  private db: Database.Database;
  readonly sessionId: string;

  /**
   * @param dbPath - SQLite file, or ':memory:' for a throwaway log.
   */
  constructor(dbPath?: string, sessionId: string = uuid()) {
    const resolvedPath = dbPath ?? path.join(process.cwd(), 'data', 'limbic.db');
    if (resolvedPath !== ':memory:') {
      const dir = path.dirname(resolvedPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(resolvedPath);
    this.db.pragma('journal_mode = WAL');
    this.sessionId = sessionId;
    this.migrate();
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS core_snapshots (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        origin TEXT NOT NULL,
        tick INTEGER NOT NULL,
        time INTEGER NOT NULL,
        pulse REAL NOT NULL,
        attention_level REAL NOT NULL,
        echo_count INTEGER NOT NULL,
        internal_state REAL NOT NULL,
        external_signal REAL NOT NULL,
        total_state REAL NOT NULL,
        direction REAL NOT NULL,
        delta REAL NOT NULL,
        irregular_rhythm INTEGER NOT NULL,
        spontaneous_event INTEGER NOT NULL,
        act_of_awareness INTEGER NOT NULL,
        reason TEXT NOT NULL,
        acts_of_awareness_total INTEGER NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX IF NOT EXISTS idx_snapshots_session_tick ON core_snapshots(session_id, tick);
      CREATE INDEX IF NOT EXISTS idx_snapshots_awareness ON core_snapshots(act_of_awareness);
    `);
  }

  // ─── Writes ───────────────────────────────────────────────────────

  record(snapshot: Snapshot, origin: TickOrigin): string {
    const id = uuid();
    this.db.prepare(`
      INSERT INTO core_snapshots (
        id, session_id, origin, tick, time, pulse, attention_level, echo_count,
        internal_state, external_signal, total_state, direction, delta,
        irregular_rhythm, spontaneous_event, act_of_awareness, reason, acts_of_awareness_total
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      this.sessionId,
      origin,
      snapshot.tick,
      snapshot.time,
      snapshot.pulse,
      snapshot.attentionLevel,
      snapshot.echoCount,
      snapshot.internalState,
      snapshot.externalSignal,
      snapshot.totalState,
      snapshot.direction,
      snapshot.delta,
      snapshot.irregularRhythm ? 1 : 0,
      snapshot.spontaneousEvent ? 1 : 0,
      snapshot.actOfAwareness ? 1 : 0,
      snapshot.reason,
      snapshot.actsOfAwarenessTotal,
    );
    return id;
  }

  // ─── Queries ──────────────────────────────────────────────────────

  /** Most recent first */
  getRecent(limit: number = 50): LoggedSnapshot[] {
    return this.db.prepare<[number], SnapshotRow>(
      'SELECT * FROM core_snapshots ORDER BY time DESC, tick DESC LIMIT ?'
    ).all(limit).map(toLogged);
  }

  /** Most recent acts of awareness first */
  getAwarenessEvents(limit: number = 20): LoggedSnapshot[] {
    return this.db.prepare<[number], SnapshotRow>(
      'SELECT * FROM core_snapshots WHERE act_of_awareness = 1 ORDER BY time DESC, tick DESC LIMIT ?'
    ).all(limit).map(toLogged);
  }

  getStats(): SnapshotLogStats {
    const row = this.db.prepare<[], {
      total: number;
      life: number | null;
      input: number | null;
      awareness: number | null;
      sessions: number;
    }>(`
      SELECT
        COUNT(*) as total,
        SUM(CASE WHEN origin = 'life' THEN 1 ELSE 0 END) as life,
        SUM(CASE WHEN origin = 'input' THEN 1 ELSE 0 END) as input,
        SUM(act_of_awareness) as awareness,
        COUNT(DISTINCT session_id) as sessions
      FROM core_snapshots
    `).get();

    return {
      totalSnapshots: row?.total ?? 0,
      lifeTicks: row?.life ?? 0,
      inputTicks: row?.input ?? 0,
      awarenessEvents: row?.awareness ?? 0,
      sessions: row?.sessions ?? 0,
    };
  }

  /**
   * Flat records in tick order, for one session (default: this one).
   */
  exportTrainingRecords(sessionId: string = this.sessionId): TrainingRecord[] {
    return this.db.prepare<[string], SnapshotRow>(
      'SELECT * FROM core_snapshots WHERE session_id = ? ORDER BY tick ASC'
    ).all(sessionId).map(({ id: _id, ...record }) => record);
  }

  close(): void {
    this.db.close();
  }
}

function toLogged(row: SnapshotRow): LoggedSnapshot {
  return {
    id: row.id,
    sessionId: row.session_id,
    origin: row.origin,
    snapshot: Object.freeze({
      tick: row.tick,
      time: row.time,
      pulse: row.pulse,
      attentionLevel: row.attention_level,
      echoCount: row.echo_count,
      internalState: row.internal_state,
      externalSignal: row.external_signal,
      totalState: row.total_state,
      direction: row.direction,
      delta: row.delta,
      irregularRhythm: row.irregular_rhythm === 1,
      spontaneousEvent: row.spontaneous_event === 1,
      actOfAwareness: row.act_of_awareness === 1,
      reason: row.reason,
      actsOfAwarenessTotal: row.acts_of_awareness_total,
    }),
  };
}
