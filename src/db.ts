import Database from "better-sqlite3";
import fs from "fs";
import path from "path";

export function openDatabase(dbPath: string): Database.Database {
  // Ensure parent dir exists
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");

  db.exec(`
CREATE TABLE IF NOT EXISTS neighborhoods (
  id       INTEGER PRIMARY KEY AUTOINCREMENT,
  position INTEGER NOT NULL, -- list order, decides first-match precedence
  name     TEXT NOT NULL,
  polygon  TEXT NOT NULL     -- JSON array of [lat, lng] pairs
);
`);

  return db;
}
