/**
 * Shared setup for command tests: a seeded recorder file in a temp dir
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createConnection, createRecorderStore, type RecorderStore } from '@recstat/core';
import { createTestRecorder, type TestRecorderOptions } from '@recstat/core/testing';

export interface RecorderFile {
  dir: string;
  dbPath: string;
  /** Open the file again to inspect what a command did */
  inspect<T>(fn: (store: RecorderStore) => T): T;
  cleanup(): void;
}

export function createRecorderFile(options: Omit<TestRecorderOptions, 'path'> = {}): RecorderFile {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'recstat-cli-'));
  const dbPath = path.join(dir, 'home-assistant_v2.db');
  createTestRecorder({ ...options, path: dbPath }).close();

  return {
    dir,
    dbPath,
    inspect<T>(fn: (store: RecorderStore) => T): T {
      const connection = createConnection({ path: dbPath });
      try {
        return fn(createRecorderStore(connection.getConnection()));
      } finally {
        connection.close();
      }
    },
    cleanup() {
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

export function outputOf(calls: unknown[][]): string[] {
  return calls.map((call) => String(call[0]));
}
