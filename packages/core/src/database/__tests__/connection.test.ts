/**
 * Database Connection Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createConnection, createInMemoryConnection } from '../connection.js';
import { DatabaseUnavailableError } from '../../reliability/errors.js';

describe('DatabaseConnection', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'recstat-conn-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('refuses to create a missing database file', () => {
    const dbPath = path.join(tempDir, 'missing.db');
    const connection = createConnection({ path: dbPath });

    expect(() => connection.getConnection()).toThrow(DatabaseUnavailableError);
    expect(() => connection.getConnection()).toThrow(
      `Database connection failed for ${dbPath}: file does not exist`
    );
    expect(fs.existsSync(dbPath)).toBe(false);
  });

  it('opens an existing file and enables foreign keys', () => {
    const dbPath = path.join(tempDir, 'recorder.db');
    createConnection({ path: dbPath, fileMustExist: false }).getConnection().close();

    const connection = createConnection({ path: dbPath });
    const db = connection.getConnection();

    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
    expect(connection.isOpen()).toBe(true);

    connection.close();
    expect(connection.isOpen()).toBe(false);
  });

  it('reuses the open handle', () => {
    const connection = createInMemoryConnection();

    expect(connection.getConnection()).toBe(connection.getConnection());
    expect(connection.path).toBe(':memory:');

    connection.close();
  });
});
