/**
 * Inspection Tests: status, entity listing, export
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestRecorder, type TestRecorder } from '../../testing/index.js';
import { ConfigurationError } from '../../reliability/errors.js';
import { estimateKb, listEntities } from '../entities.js';
import { exportRecords } from '../export.js';
import { summarizeTables } from '../status.js';
import { formatUtc, parseDateOption } from '../time.js';

describe('Inspection', () => {
  let recorder: TestRecorder;

  beforeEach(() => {
    recorder = createTestRecorder();
  });

  afterEach(() => {
    recorder.close();
  });

  // ===========================================================================
  // Status
  // ===========================================================================

  describe('summarizeTables', () => {
    it('measures every table as rows times columns', () => {
      const report = summarizeTables(recorder.store);

      expect(report.dialect).toBe('sqlite');
      expect(report.schemaVersion).toBe(50);
      expect(report.tables.map((t) => [t.name, t.rows, t.columns, t.records, t.bytes])).toEqual([
        ['schema_changes', 1, 3, 3, 24],
        ['statistics', 4, 11, 44, 352],
        ['statistics_meta', 3, 4, 12, 96],
        ['statistics_short_term', 3, 11, 33, 264],
      ]);
      expect(report.totalRecords).toBe(92);
      expect(report.totalBytes).toBe(736);
    });

    it('computes each share of the total', () => {
      const report = summarizeTables(recorder.store);

      expect(report.tables[1].percent).toBeCloseTo((44 / 92) * 100, 10);
      expect(report.tables.reduce((sum, t) => sum + t.percent, 0)).toBeCloseTo(100, 10);
    });

    it('reports zero shares for an empty database', () => {
      const empty = createTestRecorder({ seed: false, schemaVersion: null });
      try {
        const report = summarizeTables(empty.store);

        expect(report.schemaVersion).toBeNull();
        expect(report.totalRecords).toBe(0);
        expect(report.tables.every((t) => t.percent === 0)).toBe(true);
      } finally {
        empty.close();
      }
    });
  });

  // ===========================================================================
  // Entities
  // ===========================================================================

  describe('listEntities', () => {
    it('merges both statistics tables per metadata id', () => {
      expect(listEntities(recorder.store)).toEqual([
        {
          metadataId: 1,
          entity: 'sensor.outdoor_temperature',
          count: 4,
          first: 1699996400,
          last: 1700000300,
          kb: 0.3,
          unit: '°C',
        },
        {
          metadataId: 2,
          entity: 'sensor.energy_total',
          count: 2,
          first: 1699996400,
          last: 1700000000,
          kb: 0.2,
          unit: 'kWh',
        },
        {
          metadataId: 3,
          entity: 'sensor.humidity',
          count: 1,
          first: 1700000000,
          last: 1700000000,
          kb: 0.1,
          unit: '',
        },
      ]);
    });

    it('sorts and reverses', () => {
      const ids = (sort: 'count' | 'last', reverse?: boolean): number[] =>
        listEntities(recorder.store, { sort, reverse }).map((e) => e.metadataId);

      expect(ids('count')).toEqual([3, 2, 1]);
      expect(ids('count', true)).toEqual([1, 2, 3]);
      expect(ids('last')).toEqual([2, 3, 1]);
    });

    it('limits counts to the date range, inclusive', () => {
      const after = listEntities(recorder.store, { after: 1700000000 });
      expect(after.map((e) => [e.metadataId, e.count])).toEqual([
        [1, 3],
        [2, 1],
        [3, 1],
      ]);

      const before = listEntities(recorder.store, { before: 1699996400 });
      expect(before.map((e) => [e.metadataId, e.count])).toEqual([
        [1, 1],
        [2, 1],
      ]);
    });

    it('leaves the name empty for an id without metadata', () => {
      recorder.db.pragma('foreign_keys = OFF');
      recorder.db
        .prepare('INSERT INTO statistics (metadata_id, created_ts, start_ts) VALUES (77, 1700000000, 1700000000)')
        .run();

      const orphan = listEntities(recorder.store).find((e) => e.metadataId === 77);

      expect(orphan).toMatchObject({ entity: '', unit: '', count: 1 });
    });

    it('estimates size from the statistics column count', () => {
      expect(estimateKb(1000, 11)).toBe(85.9);
      expect(estimateKb(0, 11)).toBe(0);
    });
  });

  // ===========================================================================
  // Export
  // ===========================================================================

  describe('exportRecords', () => {
    it('exports long-term rows before short-term rows, in CSV column order', () => {
      const result = exportRecords(recorder.store, ['sensor.outdoor_temperature']);

      expect(result.header).toEqual([
        'table',
        'entity',
        'date',
        'id',
        'metadata_id',
        'created_ts',
        'start_ts',
        'mean',
        'min',
        'max',
        'last_reset',
        'last_reset_ts',
        'state',
        'sum',
      ]);
      expect(result.rows).toEqual([
        ['statistics', 'sensor.outdoor_temperature', '2023-11-14 21:13:20', '1', '1', '1700000000.5', '1699996400.0', '10.0', '8.0', '12.0', '', '', '', ''],
        ['statistics', 'sensor.outdoor_temperature', '2023-11-14 22:13:20', '2', '1', '1700003600.5', '1700000000.0', '11.0', '9.0', '13.5', '', '', '', ''],
        ['statistics_short_term', 'sensor.outdoor_temperature', '2023-11-14 22:13:20', '1', '1', '1700000300.5', '1700000000.0', '11.0', '10.5', '11.5', '', '', '', ''],
        ['statistics_short_term', 'sensor.outdoor_temperature', '2023-11-14 22:18:20', '2', '1', '1700000600.5', '1700000300.0', '12.0', '11.0', '13.0', '', '', '', ''],
      ]);
      expect(result.missing).toEqual([]);
    });

    it('reports unknown entities and keeps going', () => {
      const result = exportRecords(recorder.store, ['sensor.missing', 'sensor.humidity']);

      expect(result.missing).toEqual(['sensor.missing']);
      expect(result.rows.map((r) => [r[0], r[3]])).toEqual([['statistics_short_term', '3']]);
    });

    it('applies thresholds and date bounds', () => {
      const ids = (options: Parameters<typeof exportRecords>[2]): string[][] =>
        exportRecords(recorder.store, ['sensor.outdoor_temperature'], options).rows.map((r) => [r[0], r[3]]);

      expect(ids({ above: 13 })).toEqual([['statistics', '2']]);
      // only short-term id 1 has a value (min 10.5) strictly between 10 and 11
      expect(ids({ above: 10, below: 11 })).toEqual([['statistics_short_term', '1']]);
      expect(ids({ after: 1700000300 })).toEqual([['statistics_short_term', '2']]);
    });
  });

  // ===========================================================================
  // Time
  // ===========================================================================

  describe('time helpers', () => {
    it('formats epoch seconds as UTC without fractions', () => {
      expect(formatUtc(1700000000)).toBe('2023-11-14 22:13:20');
      expect(formatUtc(1700000000.9)).toBe('2023-11-14 22:13:20');
    });

    it('parses date options as UTC', () => {
      expect(parseDateOption('2023-11-14', '--after')).toBe(1699920000);
      expect(parseDateOption('2023-11-14 22:13:20', '--after')).toBe(1700000000);
      expect(parseDateOption('2023-11-14T22:13:20', '--before')).toBe(1700000000);
    });

    it('rejects malformed and impossible dates', () => {
      expect(() => parseDateOption('14/11/2023', '--after')).toThrow(
        'Invalid --after date "14/11/2023": expected YYYY-MM-DD or YYYY-MM-DD HH:MM:SS'
      );
      expect(() => parseDateOption('2023-02-30', '--before')).toThrow(ConfigurationError);
      expect(() => parseDateOption('2023-11-14 24:00:00', '--before')).toThrow(
        'Invalid --before date "2023-11-14 24:00:00": no such date or time'
      );
    });
  });
});
