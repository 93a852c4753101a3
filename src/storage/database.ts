import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { CONFIG } from '../config';
import { DEFAULT_LIST_LIMIT } from '../core/constants';

export type Db = Database.Database;

export interface Page {
  offset: number;
  limit: number;
}

export const FIRST_PAGE: Page = { offset: 0, limit: DEFAULT_LIST_LIMIT };

let db: Db | null = null;

/**
 * Open a database and apply the schema. `:memory:` gives a private
 * throwaway database, which is what the tests use.
 */
export function openDatabase(dbPath: string = CONFIG.DB_PATH): Db {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const database = new Database(dbPath);
  database.pragma('journal_mode = WAL');
  database.pragma('foreign_keys = ON');

  initializeSchema(database);
  return database;
}

export function getDatabase(): Db {
  if (db) return db;
  db = openDatabase(CONFIG.DB_PATH);
  return db;
}

function initializeSchema(database: Db): void {
  const schema = fs.readFileSync(CONFIG.SCHEMA_PATH, 'utf-8');
  database.exec(schema);
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

// SQLite has no boolean column type.
export function toFlag(value: boolean): number {
  return value ? 1 : 0;
}

export function fromFlag(value: number): boolean {
  return value !== 0;
}
