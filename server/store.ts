import Database from 'better-sqlite3';
import path from 'path';
import { fileURLToPath } from 'url';

// =============================================================================
// Output store
//
// Named pipeline outputs persisted as JSON in SQLite. Every run replaces the
// whole set in one transaction: readers see either the previous run or the new
// one, never a mix.
// =============================================================================

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const DEFAULT_DB_PATH = path.join(__dirname, '..', '.outputs.db');

export type StoredOutputInfo = {
  name: string;
  computedAt: string;
};

type OutputRow = {
  name: string;
  value: string;
  computed_at: number;
};

export class OutputStore {
  private readonly db: Database.Database;

  constructor(dbPath: string = DEFAULT_DB_PATH) {
    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS outputs (
        name TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        computed_at INTEGER NOT NULL
      )
    `);
  }

  save(outputs: Record<string, unknown>, computedAt: number = Date.now()): void {
    const clear = this.db.prepare('DELETE FROM outputs');
    const insert = this.db.prepare<[string, string, number]>(
      'INSERT INTO outputs (name, value, computed_at) VALUES (?, ?, ?)'
    );

    const replaceAll = this.db.transaction((entries: [string, unknown][]) => {
      clear.run();
      for (const [name, value] of entries) {
        // JSON has no undefined; null is the "not computable" marker throughout
        insert.run(name, JSON.stringify(value ?? null), computedAt);
      }
    });

    replaceAll(Object.entries(outputs));
    console.log(`[Store] saved ${Object.keys(outputs).length} outputs`);
  }

  has(name: string): boolean {
    return this.db.prepare<[string], { name: string }>('SELECT name FROM outputs WHERE name = ?').get(name) !== undefined;
  }

  /** Parsed value, or undefined for a name that was never stored */
  get(name: string): unknown {
    const row = this.db
      .prepare<[string], OutputRow>('SELECT name, value, computed_at FROM outputs WHERE name = ?')
      .get(name);
    if (!row) return undefined;
    return JSON.parse(row.value);
  }

  list(): StoredOutputInfo[] {
    const rows = this.db
      .prepare<[], Pick<OutputRow, 'name' | 'computed_at'>>('SELECT name, computed_at FROM outputs ORDER BY name')
      .all();
    return rows.map(r => ({ name: r.name, computedAt: new Date(r.computed_at).toISOString() }));
  }

  close(): void {
    this.db.close();
  }
}
