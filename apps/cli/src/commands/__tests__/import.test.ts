/**
 * Tests for recstat import
 */

import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { CsvStructureError, ExecutionFailedError, toExitCode, type ImportReport } from '@recstat/core';
import { importCommand } from '../import.js';
import { createRecorderFile, outputOf, type RecorderFile } from './helpers.js';

const HEADER = 'table,entity,date,id,metadata_id,created_ts,start_ts,mean,min,max,last_reset,last_reset_ts,state,sum';

describe('importCommand', () => {
  let recorder: RecorderFile;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    recorder = createRecorderFile();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    recorder.cleanup();
  });

  function writeCsv(lines: string[]): string {
    fs.writeFileSync(path.join(recorder.dir, 'edits.csv'), `${lines.join('\n')}\n`);
    return 'edits.csv';
  }

  function options() {
    return { dbUrl: recorder.dbPath, env: {}, cwd: recorder.dir };
  }

  const edits = [
    HEADER,
    'statistics,sensor.outdoor_temperature,,,1,,1700003600,21.5,,,,,,',
    'statistics,sensor.energy_total,,23,,,,,,,,,,',
    ',,,,,,,,,,,,,',
    'statistics,sensor.outdoor_temperature,,2,,,,,,14,,,,',
    'statistics,,,,999,,1700003600,1,,,,,,',
  ];

  it('applies the edits and prints the report', async () => {
    const report = await importCommand(writeCsv(edits), options());

    expect(report).toMatchObject({ mode: 'apply', inserted: 1, updated: 1, deleted: 1, skipped: 1 });
    expect(outputOf(consoleLogSpy.mock.calls)).toEqual([
      'Rows read:        5',
      'Skipped:          1',
      'Invalid rows:     1',
      'Conflicts:        0',
      'Inserted:         1',
      'Updated:          1',
      'Deleted:          1',
      '  line 6: [UnknownMetadataId] metadata_id 999 does not exist in statistics_meta',
    ]);

    recorder.inspect((store) => {
      expect(store.getRecord('statistics', 23)).toBeNull();
      expect(store.getRecord('statistics', 2)?.max).toBe(14);
      expect(store.getRecord('statistics', 4)).toMatchObject({ metadata_id: 1, start_ts: 1700003600, mean: 21.5 });
    });
  });

  it('prints the SQL of a dry-run and writes nothing', async () => {
    const report = await importCommand(writeCsv(edits), { ...options(), dryRun: true });

    expect(report.mode).toBe('dry-run');
    const lines = outputOf(consoleLogSpy.mock.calls);
    expect(lines.slice(2, 5)).toEqual([
      'DELETE FROM statistics WHERE id = 23;',
      'UPDATE statistics SET max = 14.0 WHERE id = 2;',
      'INSERT INTO statistics (metadata_id, created_ts, start_ts, mean) VALUES (1, 1700003600.0, 1700003600.0, 21.5);',
    ]);
    expect(lines).toContain('Would insert:     1');

    recorder.inspect((store) => {
      expect(store.getRecord('statistics', 23)).not.toBeNull();
      expect(store.countRecords('statistics')).toBe(4);
    });
  });

  it('prints the report as JSON', async () => {
    await importCommand(writeCsv(edits), { ...options(), json: true, dryRun: true });

    const report: ImportReport = JSON.parse(outputOf(consoleLogSpy.mock.calls)[0]);
    expect(report.statements).toHaveLength(3);
    expect(report.invalid.byKind.UnknownMetadataId).toBe(1);
  });

  it('rejects a malformed file before touching the database', async () => {
    const file = writeCsv([HEADER, 'statistics,,,23,,,,,,,,,,', 'statistics,,,2']);

    const error = await importCommand(file, options()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CsvStructureError);
    expect(toExitCode(error)).toBe(21);
    recorder.inspect((store) => {
      expect(store.getRecord('statistics', 23)).not.toBeNull();
    });
  });

  it('commits nothing when one intent fails', async () => {
    const file = writeCsv([HEADER, 'statistics,,,23,,,,,,,,,,', 'statistics,,,404,,,,5,,,,,,']);

    const error = await importCommand(file, options()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExecutionFailedError);
    expect(toExitCode(error)).toBe(30);
    recorder.inspect((store) => {
      expect(store.getRecord('statistics', 23)).not.toBeNull();
    });
  });

  it('warns about columns it does not know', async () => {
    const file = writeCsv(['table,id,mean,note', 'statistics,2,5,checked']);

    await importCommand(file, options());

    expect(outputOf(consoleErrorSpy.mock.calls)).toEqual([expect.stringContaining('ignoring unknown columns: note')]);
    recorder.inspect((store) => {
      expect(store.getRecord('statistics', 2)?.mean).toBe(5);
    });
  });
});
