/**
 * Database Connection Manager
 *
 * Opens the recorder's SQLite database with better-sqlite3. A connection is
 * owned by one command run: opened at start, closed on every exit path.
 */

import Database from 'better-sqlite3';
import { existsSync } from 'fs';
import { IN_MEMORY_PATH } from '../config/index.js';
import { DatabaseUnavailableError } from '../reliability/errors.js';

export interface DatabaseConfig {
  path: string;
  readonly?: boolean;
  /** Defaults to true for file databases: a typo must not create an empty recorder file */
  fileMustExist?: boolean;
  timeout?: number;
}

export class DatabaseConnection {
  private db: Database.Database | null = null;
  private config: Required<DatabaseConfig>;

  constructor(config: DatabaseConfig) {
    this.config = {
      readonly: false,
      fileMustExist: config.path !== IN_MEMORY_PATH,
      timeout: 5000,
      ...config,
    };
  }

  /**
   * Get or open the database connection
   */
  getConnection(): Database.Database {
    if (this.db) {
      return this.db;
    }

    if (this.config.fileMustExist && !existsSync(this.config.path)) {
      throw new DatabaseUnavailableError(this.config.path, new Error('file does not exist'));
    }

    try {
      this.db = new Database(this.config.path, {
        readonly: this.config.readonly,
        fileMustExist: this.config.fileMustExist,
        timeout: this.config.timeout,
      });
    } catch (error) {
      throw new DatabaseUnavailableError(
        this.config.path,
        error instanceof Error ? error : new Error(String(error))
      );
    }

    // statistics rows cascade from statistics_meta
    this.db.pragma('foreign_keys = ON');

    return this.db;
  }

  get path(): string {
    return this.config.path;
  }

  /**
   * Close database connection
   */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  /**
   * Check if connection is open
   */
  isOpen(): boolean {
    return this.db !== null && this.db.open;
  }
}

/**
 * Create a new database connection
 */
export function createConnection(config: DatabaseConfig): DatabaseConnection {
  return new DatabaseConnection(config);
}

/**
 * Create an in-memory database (for testing)
 */
export function createInMemoryConnection(): DatabaseConnection {
  return new DatabaseConnection({ path: IN_MEMORY_PATH });
}
