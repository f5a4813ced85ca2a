import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY = ':memory:';

/**
 * Database connection manager for the request log store
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = 'data/request-log.db') {
    if (dbPath === IN_MEMORY) {
      this.dbPath = IN_MEMORY;
    } else {
      this.dbPath = path.resolve(process.cwd(), dbPath);

      // Ensure data directory exists
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    if (this.dbPath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
    }

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS request_logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        endpoint TEXT NOT NULL,
        method TEXT NOT NULL,
        worker TEXT,
        duration_ms INTEGER NOT NULL DEFAULT 0,
        success INTEGER NOT NULL,
        status_code INTEGER,
        timestamp TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_request_logs_endpoint ON request_logs(endpoint);
      CREATE INDEX IF NOT EXISTS idx_request_logs_worker ON request_logs(worker);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
