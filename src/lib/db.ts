import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { config } from "./config";
import { PersistenceError } from "./scraping/errors";

export type FilterValue = string | number | boolean | null;
export type Filter = Record<string, FilterValue>;

export type UpsertOutcome = "inserted" | "updated";

export interface IndexOptions {
  unique?: boolean;
}

/**
 * Key-based document persistence. Every call is synchronous, so a
 * check-then-write inside one call can't interleave with another worker.
 */
export interface DocumentStore {
  /** Idempotent; safe to call on every run */
  ensureIndex(collection: string, fields: string | string[], options?: IndexOptions): void;
  upsert(collection: string, keyField: string, keyValue: string, doc: object): UpsertOutcome;
  findOne<T>(collection: string, keyField: string, keyValue: string): T | null;
  exists(collection: string, keyField: string, keyValue: string): boolean;
  count(collection: string, filter?: Filter): number;
  findKeys(collection: string, keyField: string, filter?: Filter): string[];
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function identifier(name: string, what: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new PersistenceError(`Invalid ${what} name "${name}"`);
  }
  return name;
}

function fieldExpr(field: string): string {
  return `json_extract(body, '$.${identifier(field, "field")}')`;
}

function bindable(value: FilterValue): string | number | null {
  if (typeof value === "boolean") return value ? 1 : 0;
  return value;
}

/** One table per collection, each row a JSON document */
export class SqliteDocumentStore implements DocumentStore {
  private readonly collections = new Set<string>();

  constructor(private readonly db: Database.Database) {}

  static open(dbPath: string): SqliteDocumentStore {
    try {
      if (dbPath !== ":memory:") {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      }
      const db = new Database(dbPath);
      if (dbPath !== ":memory:") db.pragma("journal_mode = WAL");
      return new SqliteDocumentStore(db);
    } catch (err) {
      throw new PersistenceError(`Failed to open document store at ${dbPath}`, err);
    }
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(`${operation} failed: ${err instanceof Error ? err.message : String(err)}`, err);
    }
  }

  private table(collection: string): string {
    const name = identifier(collection, "collection");
    if (!this.collections.has(name)) {
      this.db.exec(`CREATE TABLE IF NOT EXISTS "${name}" (id INTEGER PRIMARY KEY AUTOINCREMENT, body TEXT NOT NULL)`);
      this.collections.add(name);
    }
    return `"${name}"`;
  }

  private where(filter: Filter = {}): { clause: string; params: (string | number | null)[] } {
    const parts: string[] = [];
    const params: (string | number | null)[] = [];
    for (const [field, value] of Object.entries(filter)) {
      if (value === null) {
        parts.push(`${fieldExpr(field)} IS NULL`);
      } else {
        parts.push(`${fieldExpr(field)} = ?`);
        params.push(bindable(value));
      }
    }
    return { clause: parts.length > 0 ? `WHERE ${parts.join(" AND ")}` : "", params };
  }

  ensureIndex(collection: string, fields: string | string[], options: IndexOptions = {}): void {
    const list = Array.isArray(fields) ? fields : [fields];
    this.run(`ensureIndex(${collection})`, () => {
      const table = this.table(collection);
      const name = `idx_${collection}_${list.map((f) => identifier(f, "field")).join("_")}`;
      this.db.exec(
        `CREATE ${options.unique ? "UNIQUE " : ""}INDEX IF NOT EXISTS "${name}" ON ${table} (${list.map(fieldExpr).join(", ")})`
      );
    });
  }

  upsert(collection: string, keyField: string, keyValue: string, doc: object): UpsertOutcome {
    return this.run(`upsert(${collection}, ${keyValue})`, () => {
      const table = this.table(collection);
      const body = JSON.stringify(doc);
      const update = this.db.prepare<[string, string]>(`UPDATE ${table} SET body = ? WHERE ${fieldExpr(keyField)} = ?`);
      const insert = this.db.prepare<[string]>(`INSERT INTO ${table} (body) VALUES (?)`);

      const tx = this.db.transaction((): UpsertOutcome => {
        if (update.run(body, keyValue).changes > 0) return "updated";
        insert.run(body);
        return "inserted";
      });
      return tx();
    });
  }

  findOne<T>(collection: string, keyField: string, keyValue: string): T | null {
    return this.run(`findOne(${collection}, ${keyValue})`, () => {
      const row = this.db
        .prepare<[string], { body: string }>(
          `SELECT body FROM ${this.table(collection)} WHERE ${fieldExpr(keyField)} = ? LIMIT 1`
        )
        .get(keyValue);
      if (!row) return null;
      const doc: T = JSON.parse(row.body);
      return doc;
    });
  }

  exists(collection: string, keyField: string, keyValue: string): boolean {
    return this.count(collection, { [keyField]: keyValue }) > 0;
  }

  count(collection: string, filter?: Filter): number {
    return this.run(`count(${collection})`, () => {
      const { clause, params } = this.where(filter);
      const row = this.db
        .prepare<(string | number | null)[], { n: number }>(`SELECT COUNT(*) AS n FROM ${this.table(collection)} ${clause}`)
        .get(...params);
      return row ? row.n : 0;
    });
  }

  findKeys(collection: string, keyField: string, filter?: Filter): string[] {
    return this.run(`findKeys(${collection})`, () => {
      const { clause, params } = this.where(filter);
      const rows = this.db
        .prepare<(string | number | null)[], { k: string | number | null }>(
          `SELECT ${fieldExpr(keyField)} AS k FROM ${this.table(collection)} ${clause} ORDER BY id`
        )
        .all(...params);
      return rows.filter((r) => r.k !== null).map((r) => String(r.k));
    });
  }

  close(): void {
    this.db.close();
  }
}

let store: SqliteDocumentStore | null = null;

export function getDocumentStore(): SqliteDocumentStore {
  if (store) return store;
  store = SqliteDocumentStore.open(path.resolve(process.cwd(), config.dbPath));
  return store;
}

export function closeDocumentStore(): void {
  store?.close();
  store = null;
}
