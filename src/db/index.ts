// Database connection and initialization

import Database from 'better-sqlite3';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { createLogger } from '../shared/logger.js';

const log = createLogger('Database');

let db: Database.Database | null = null;

export interface DatabaseConfig {
  path?: string;
  verbose?: boolean;
}

const resolvePath = (config: DatabaseConfig): string =>
  config.path || path.resolve('data', 'db', 'main.sqlite');

export const getDatabase = (config: DatabaseConfig = {}): Database.Database => {
  if (db) return db;

  db = new Database(resolvePath(config), {
    verbose: config.verbose ? (message?: unknown) => log.debug(String(message)) : undefined
  });

  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  db.pragma('foreign_keys = ON');

  return db;
};

export const initializeDatabase = async (config: DatabaseConfig = {}): Promise<Database.Database> => {
  const dbPath = resolvePath(config);

  if (dbPath !== ':memory:') {
    await fs.mkdir(path.dirname(dbPath), { recursive: true });
  }

  const database = getDatabase(config);
  runMigrations(database);

  return database;
};

export const runMigrations = (database: Database.Database): void => {
  database.exec(`
    CREATE TABLE IF NOT EXISTS migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  for (const migration of getMigrations()) {
    const applied = database.prepare('SELECT 1 FROM migrations WHERE name = ?').get(migration.name);

    if (!applied) {
      log.debug(`Applying migration: ${migration.name}`);
      database.exec(migration.sql);
      database.prepare('INSERT INTO migrations (name) VALUES (?)').run(migration.name);
    }
  }
};

// Fresh in-memory store with the schema applied
export const createMemoryDatabase = (): Database.Database => {
  const database = new Database(':memory:');
  database.pragma('foreign_keys = ON');
  runMigrations(database);
  return database;
};

interface Migration {
  name: string;
  sql: string;
}

const getMigrations = (): Migration[] => [
  {
    name: '001_create_clients',
    sql: `
      CREATE TABLE clients (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        handle TEXT NOT NULL UNIQUE,
        status TEXT NOT NULL DEFAULT 'active',
        channels TEXT NOT NULL DEFAULT '[]',
        cadence_per_week INTEGER NOT NULL DEFAULT 3,
        brand_voice TEXT NOT NULL DEFAULT '',
        instructions TEXT NOT NULL DEFAULT '',
        approval_mode TEXT NOT NULL DEFAULT 'manual',
        page_ids TEXT NOT NULL DEFAULT '{}',
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE INDEX idx_clients_status ON clients(status);
    `
  },
  {
    name: '002_create_ideas',
    sql: `
      CREATE TABLE ideas (
        id TEXT PRIMARY KEY,
        client_id TEXT NOT NULL REFERENCES clients(id),
        headline TEXT NOT NULL,
        summary TEXT NOT NULL,
        image_url TEXT,
        origin TEXT NOT NULL,
        state TEXT NOT NULL DEFAULT 'new',
        channel TEXT,
        source_detail TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE INDEX idx_ideas_client_state ON ideas(client_id, state);
    `
  },
  {
    name: '003_create_posts',
    sql: `
      CREATE TABLE posts (
        id TEXT PRIMARY KEY,
        client_id TEXT NOT NULL REFERENCES clients(id),
        idea_id TEXT NOT NULL REFERENCES ideas(id),
        body TEXT NOT NULL,
        channel TEXT NOT NULL,
        media_url TEXT,
        status TEXT NOT NULL DEFAULT 'pending',
        feedback TEXT,
        error TEXT,
        platform_post_id TEXT,
        attempts INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        published_at TEXT
      );
      CREATE INDEX idx_posts_client_status ON posts(client_id, status);
    `
  },
  {
    name: '004_create_sessions',
    sql: `
      CREATE TABLE sessions (
        client_id TEXT PRIMARY KEY REFERENCES clients(id),
        state TEXT NOT NULL DEFAULT 'idle',
        last_shown_list TEXT NOT NULL DEFAULT '[]',
        last_intent TEXT,
        created_at TEXT NOT NULL,
        last_activity_at TEXT NOT NULL,
        expires_at TEXT NOT NULL
      );
      CREATE INDEX idx_sessions_expires ON sessions(expires_at);
    `
  }
];

export const closeDatabase = (): void => {
  if (db) {
    db.close();
    db = null;
  }
};

export default {
  getDatabase,
  initializeDatabase,
  closeDatabase
};
