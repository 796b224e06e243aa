import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type { DbConfig } from "../config/schema";
import { ensureDbSchema } from "./init";
import * as schema from "./schema";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

/**
 * 数据库客户端封装，便于统一管理连接与类型。
 */
export interface DbClient {
  sqlite: Database.Database;
  db: AppDatabase;
}

/**
 * 创建 SQLite 数据库连接，并启用基础运行参数。":memory:" 用于测试。
 */
export function createDbClient(config: DbConfig): DbClient {
  const inMemory = config.path === ":memory:";
  const dbPath = inMemory ? config.path : path.resolve(process.cwd(), config.path);
  if (!inMemory) {
    mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  if (!inMemory) {
    sqlite.pragma("journal_mode = WAL");
  }
  // 每次提交都落盘，崩溃后不丢已确认的状态
  sqlite.pragma("synchronous = FULL");
  sqlite.pragma("foreign_keys = ON");
  ensureDbSchema(sqlite);

  const db = drizzle(sqlite, { schema });
  return { sqlite, db };
}
