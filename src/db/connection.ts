import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import { VERBOSE, vlog } from "../util/verbose.js";

const defaults = {
  dataPath: process.env.BJ_DB_PATH ?? "./data/blackjack.db",
};

const cache = new Map<string, Database.Database>();

function ensureDirExists(dirPath: string) {
  if (!fs.existsSync(dirPath)) fs.mkdirSync(dirPath, { recursive: true });
}

export function openDb(filePath: string = defaults.dataPath): Database.Database {
  const key = filePath === ":memory:" ? filePath : path.resolve(filePath);
  // every ':memory:' open is its own database, so never cache it
  const cached = key === ":memory:" ? undefined : cache.get(key);
  if (cached) return cached;
  if (key !== ":memory:") ensureDirExists(path.dirname(key));
  const db = new Database(key, {
    fileMustExist: false,
    verbose: VERBOSE ? (sql: unknown) => vlog({ msg: "sql", sql: String(sql).trim().slice(0, 240) }) : undefined,
  });
  if (key !== ":memory:") {
    db.pragma("journal_mode = WAL");
    cache.set(key, db);
  }
  vlog({ msg: "db_open", path: key });
  return db;
}

export function closeAll() {
  for (const db of cache.values()) db.close();
  cache.clear();
}

export function getDbPath() {
  return path.resolve(defaults.dataPath);
}
