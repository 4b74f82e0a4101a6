import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export type DB = Database.Database;

type Migration = {
  id: string;
  up: (db: DB) => void;
};

function hasColumn(db: DB, table: string, column: string): boolean {
  const columns = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
  return columns.some((c) => c.name === column);
}

// ─── Базовая схема ───
const BASE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id                  INTEGER PRIMARY KEY AUTOINCREMENT,
    telegram_id         INTEGER UNIQUE NOT NULL,
    username            TEXT,
    first_name          TEXT,
    subscription_until  TEXT,  -- ISO datetime, UTC
    is_active           INTEGER NOT NULL DEFAULT 1,
    created_at          TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  );

  CREATE TABLE IF NOT EXISTS proxy_configs (
    id              INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id         INTEGER NOT NULL,
    proxy_secret    TEXT NOT NULL,
    server_address  TEXT NOT NULL,
    port            INTEGER NOT NULL,
    created_at      TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    FOREIGN KEY (user_id) REFERENCES users(id)
  );

  CREATE TABLE IF NOT EXISTS payments (
    id                   INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id              INTEGER NOT NULL,
    amount               REAL NOT NULL,
    currency             TEXT NOT NULL DEFAULT 'USD',
    status               TEXT NOT NULL DEFAULT 'pending',  -- pending | completed
    provider_payment_id  TEXT,
    created_at           TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    FOREIGN KEY (user_id) REFERENCES users(id)
  );

  CREATE TABLE IF NOT EXISTS schema_migrations (
    id          TEXT PRIMARY KEY,
    applied_at  TEXT DEFAULT (datetime('now'))
  );
`;

// ─── Миграции ───
const migrations: Migration[] = [
  {
    id: '20250110_create_proxy_servers',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS proxy_servers (
          id           INTEGER PRIMARY KEY AUTOINCREMENT,
          address      TEXT UNIQUE NOT NULL,
          port         INTEGER NOT NULL DEFAULT 443,
          description  TEXT,
          location     TEXT,
          max_users    INTEGER NOT NULL DEFAULT 1000,
          is_active    INTEGER NOT NULL DEFAULT 1,
          created_at   TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
          updated_at   TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
        );
      `);
    },
  },
  {
    id: '20250112_index_proxy_configs_user',
    up: (db) => {
      db.exec(`CREATE INDEX IF NOT EXISTS idx_proxy_configs_user_id ON proxy_configs(user_id)`);
    },
  },
  {
    id: '20250118_add_users_expiry_notified_at',
    up: (db) => {
      if (!hasColumn(db, 'users', 'expiry_notified_at')) {
        db.exec(`ALTER TABLE users ADD COLUMN expiry_notified_at TEXT`);
      }
    },
  },
];

export function migrate(db: DB): void {
  db.exec(BASE_SCHEMA);

  const hasMigration = db.prepare(`SELECT 1 FROM schema_migrations WHERE id = ?`);
  const insertMigration = db.prepare(`INSERT INTO schema_migrations (id) VALUES (?)`);

  for (const migration of migrations) {
    if (hasMigration.get(migration.id)) continue;

    db.transaction(() => {
      migration.up(db);
      insertMigration.run(migration.id);
    })();
  }
}

/**
 * Открывает (или создаёт) базу и прогоняет миграции.
 * `:memory:` — для тестов.
 */
export function openDatabase(filePath: string): DB {
  if (filePath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  }

  const db = new Database(filePath);

  // WAL mode — быстрее для чтения, безопаснее
  if (filePath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');

  migrate(db);
  return db;
}
