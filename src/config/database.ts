/**
 * Database configuration and SQLite connection singleton
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { config } from './index.js';
import { migrate } from '../db/migrations.js';

let db: Database.Database | null = null;

/**
 * Open a database connection and bring its schema up to date.
 * Used directly by tests that want an isolated ":memory:" database.
 */
export const openDatabase = (dbPath: string): Database.Database => {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const connection = new Database(dbPath);
  // WAL lets the HTTP surface read while a dispatch run writes
  connection.pragma('journal_mode = WAL');
  connection.pragma('foreign_keys = ON');
  connection.pragma('busy_timeout = 5000');
  migrate(connection);
  return connection;
};

/**
 * Get the database singleton
 * Opens the configured database if no connection exists
 */
export const getDatabase = (): Database.Database => {
  if (!db) {
    db = openDatabase(config.database.path);
  }
  return db;
};

/**
 * Close the database connection
 * Should be called during graceful shutdown
 */
export const closeDatabase = (): void => {
  if (db) {
    db.close();
    db = null;
    console.log('[Database] Connection closed');
  }
};

/**
 * Check database connection health
 */
export const checkDatabaseConnection = (): boolean => {
  try {
    getDatabase().prepare('SELECT 1').get();
    return true;
  } catch (error) {
    console.error('[Database] Connection check failed:', error);
    return false;
  }
};

/**
 * Initialize database connection
 * Should be called during application startup
 */
export const initializeDatabase = (): void => {
  try {
    getDatabase();
    console.log(`[Database] Opened ${config.database.path}`);
  } catch (error) {
    console.error('[Database] Failed to open:', error);
    throw error;
  }
};
