/**
 * SQLite Save Store
 *
 * Named save slots for whole games, kept in a local better-sqlite3 file.
 */

import Database from 'better-sqlite3';
import { v4 as uuid } from 'uuid';
import { createSaveId, type DifficultyName, type EngineState, type SaveId } from '../types.js';
import { deserializeEngineState, serializeEngineState } from './state-codec.js';

export interface SaveSummary {
  id: SaveId;
  name: string;
  difficulty: DifficultyName;
  day: number;
  cash: number;
  reputation: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface SavedGame extends SaveSummary {
  state: EngineState;
}

export interface SaveStore {
  saveGame(name: string, state: EngineState): Promise<SaveSummary>;
  overwriteSave(id: SaveId, state: EngineState): Promise<SaveSummary | null>;
  loadGame(id: SaveId): Promise<SavedGame | null>;
  listSaves(): Promise<SaveSummary[]>;
  deleteSave(id: SaveId): Promise<boolean>;
  close(): void;
}

interface SaveRow {
  id: string;
  name: string;
  difficulty: DifficultyName;
  day: number;
  cash: number;
  reputation: number;
  state: string;
  created_at: string;
  updated_at: string;
}

type SummaryRow = Omit<SaveRow, 'state'>;

const SUMMARY_COLUMNS = 'id, name, difficulty, day, cash, reputation, created_at, updated_at';

export class SQLiteSaveStore implements SaveStore {
  private db: Database.Database;

  constructor(dbPath: string = ':memory:') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS saves (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        difficulty TEXT NOT NULL,
        day INTEGER NOT NULL,
        cash INTEGER NOT NULL,
        reputation INTEGER NOT NULL,
        state TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_saves_updated ON saves(updated_at);
    `);
  }

  async saveGame(name: string, state: EngineState): Promise<SaveSummary> {
    const id = createSaveId(uuid());
    const now = new Date().toISOString();

    this.db
      .prepare(
        `INSERT INTO saves (id, name, difficulty, day, cash, reputation, state, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        id,
        name,
        state.difficulty,
        state.clock.time.day,
        state.player.cash,
        state.player.reputation,
        serializeEngineState(state),
        now,
        now
      );

    console.log(`[Storage] Saved "${name}" (${id}) at day ${state.clock.time.day}`);
    return this.requireSummary(id);
  }

  async overwriteSave(id: SaveId, state: EngineState): Promise<SaveSummary | null> {
    const result = this.db
      .prepare(
        `UPDATE saves SET difficulty = ?, day = ?, cash = ?, reputation = ?, state = ?, updated_at = ?
         WHERE id = ?`
      )
      .run(
        state.difficulty,
        state.clock.time.day,
        state.player.cash,
        state.player.reputation,
        serializeEngineState(state),
        new Date().toISOString(),
        id
      );

    if (result.changes === 0) return null;
    return this.requireSummary(id);
  }

  /** Throws `SaveFormatError` when the stored state cannot be read back. */
  async loadGame(id: SaveId): Promise<SavedGame | null> {
    const row = this.db
      .prepare('SELECT * FROM saves WHERE id = ?')
      .get(id) as SaveRow | undefined;

    if (!row) return null;

    return { ...toSummary(row), state: deserializeEngineState(row.state) };
  }

  async listSaves(): Promise<SaveSummary[]> {
    const rows = this.db
      .prepare(`SELECT ${SUMMARY_COLUMNS} FROM saves ORDER BY updated_at DESC, created_at DESC`)
      .all() as SummaryRow[];

    return rows.map(toSummary);
  }

  async deleteSave(id: SaveId): Promise<boolean> {
    const result = this.db.prepare('DELETE FROM saves WHERE id = ?').run(id);
    return result.changes > 0;
  }

  close(): void {
    this.db.close();
  }

  private requireSummary(id: SaveId): SaveSummary {
    const row = this.db
      .prepare(`SELECT ${SUMMARY_COLUMNS} FROM saves WHERE id = ?`)
      .get(id) as SummaryRow | undefined;

    if (!row) throw new Error(`Save ${id} vanished after write`);
    return toSummary(row);
  }
}

function toSummary(row: SummaryRow): SaveSummary {
  return {
    id: createSaveId(row.id),
    name: row.name,
    difficulty: row.difficulty,
    day: row.day,
    cash: row.cash,
    reputation: row.reputation,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function createSaveStore(dbPath?: string): SaveStore {
  return new SQLiteSaveStore(dbPath);
}
