import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import { PRAGMA_SQL, SCHEMA_SQL, SCHEMA_VERSION } from './schema.js';
import { Logger } from '../../shared/Logger.js';

/**
 * SQLite 資料庫管理器
 *
 * 負責：初始化 DB、載入 sqlite-vec extension、執行 schema、寫入 schema 版本。
 * 傳入 ':memory:' 可建立記憶體資料庫。
 */
export class DatabaseManager {
  private db: Database.Database;
  private logger: Logger;

  constructor(dbPath: string) {
    this.logger = new Logger('DatabaseManager');

    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);

    // 載入 sqlite-vec extension
    this.db.loadExtension(sqliteVec.getLoadablePath());

    // 設定 PRAGMA（逐行執行，因為 PRAGMA 不支援批次）
    for (const line of PRAGMA_SQL.trim().split('\n')) {
      const trimmed = line.trim();
      if (trimmed && !trimmed.startsWith('--')) {
        this.db.pragma(trimmed.replace('PRAGMA ', '').replace(';', ''));
      }
    }

    this.db.exec(SCHEMA_SQL);
    this.db.prepare(
      "INSERT OR REPLACE INTO schema_meta(key, value) VALUES('version', ?)"
    ).run(SCHEMA_VERSION);

    this.logger.debug('Database initialized', { dbPath });
  }

  getDb(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }
}
