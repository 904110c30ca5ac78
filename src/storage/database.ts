import Database from "better-sqlite3";

import { settings } from "../core/config";

export type SqliteDatabase = Database.Database;

export const openDatabase = (dbPath = settings.dbPath): SqliteDatabase => {
  const db = new Database(dbPath);
  if (dbPath !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("busy_timeout = 5000");
  return db;
};
