/**
 * RelationStore - SQLite-backed storage for named finite relations
 *
 * Each row is stored as JSON text together with its insertion index, so
 * relations come back in the order they were written.
 */

import Database from "better-sqlite3";
import type { MapEnvironment } from "../env/environment.js";
import type { Value } from "../eval/values.js";

/**
 * Validate parsed JSON as a runtime value
 */
export function parseValue(raw: unknown): Value {
  if (raw === null || typeof raw === "string" || typeof raw === "boolean") return raw;
  if (typeof raw === "number") {
    if (!Number.isFinite(raw)) throw new Error(`Not a storable number: ${raw}`);
    return raw;
  }
  if (Array.isArray(raw)) return raw.map((item: unknown) => parseValue(item));
  if (typeof raw === "object") {
    const record: { [key: string]: Value } = {};
    for (const [key, item] of Object.entries(raw)) record[key] = parseValue(item);
    return record;
  }
  throw new Error(`Not a storable value: ${typeof raw}`);
}

export class RelationStore {
  private db: Database.Database | null;

  constructor(filename: string = ":memory:") {
    this.db = new Database(filename);
    this.initSchema();
  }

  private initSchema(): void {
    if (!this.db) return;

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS relations (
        name TEXT PRIMARY KEY
      );

      CREATE TABLE IF NOT EXISTS relation_rows (
        relation TEXT NOT NULL,
        idx INTEGER NOT NULL,
        data TEXT NOT NULL,
        PRIMARY KEY (relation, idx),
        FOREIGN KEY (relation) REFERENCES relations(name) ON DELETE CASCADE
      );
    `);
  }

  private open(): Database.Database {
    if (!this.db) throw new Error("Relation store is closed");
    return this.db;
  }

  /**
   * Check if database is open
   */
  isOpen(): boolean {
    return this.db !== null;
  }

  /**
   * Create an empty relation; a no-op when it already exists
   */
  define(name: string): void {
    this.open().prepare<[string]>("INSERT OR IGNORE INTO relations (name) VALUES (?)").run(name);
  }

  hasRelation(name: string): boolean {
    if (!this.db) return false;
    const row = this.db
      .prepare<[string], { name: string }>("SELECT name FROM relations WHERE name = ?")
      .get(name);
    return row !== undefined;
  }

  /**
   * Append rows to a relation, defining it when needed
   */
  insert(name: string, rows: readonly Value[]): number {
    const db = this.open();
    this.define(name);

    const next = db
      .prepare<[string], { next: number }>(
        "SELECT COALESCE(MAX(idx) + 1, 0) AS next FROM relation_rows WHERE relation = ?"
      )
      .get(name);
    const start = next?.next ?? 0;

    const stmt = db.prepare<[string, number, string]>(
      "INSERT INTO relation_rows (relation, idx, data) VALUES (?, ?, ?)"
    );
    const insertAll = db.transaction((items: readonly Value[]) => {
      items.forEach((item, i) => stmt.run(name, start + i, JSON.stringify(item)));
    });
    insertAll(rows);
    return rows.length;
  }

  /**
   * Rows of a relation in insertion order
   */
  rows(name: string): Value[] {
    if (!this.db) return [];
    if (!this.hasRelation(name)) throw new Error(`Unknown relation: ${name}`);
    return this.db
      .prepare<[string], { data: string }>(
        "SELECT data FROM relation_rows WHERE relation = ? ORDER BY idx"
      )
      .all(name)
      .map((row) => parseValue(JSON.parse(row.data)));
  }

  relationNames(): string[] {
    if (!this.db) return [];
    return this.db
      .prepare<[], { name: string }>("SELECT name FROM relations ORDER BY name")
      .all()
      .map((r) => r.name);
  }

  /**
   * Remove a relation and its rows
   */
  drop(name: string): void {
    const db = this.open();
    db.transaction(() => {
      db.prepare<[string]>("DELETE FROM relation_rows WHERE relation = ?").run(name);
      db.prepare<[string]>("DELETE FROM relations WHERE name = ?").run(name);
    })();
  }

  /**
   * Bind every stored relation into an environment
   */
  bindInto(env: MapEnvironment): MapEnvironment {
    for (const name of this.relationNames()) {
      env.defineRelation(name, this.rows(name));
    }
    return env;
  }

  /**
   * Close the database
   */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
