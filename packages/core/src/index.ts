/**
 * @recstat/core - Recorder statistics toolkit
 *
 * - Catalog: recorder table layout and schema-version check
 * - Import: classify, plan and apply CSV edits to the statistics tables
 * - Inspect: status, entity listing and export
 * - Database: SQLite connection and the RecorderStore seam
 */

export * from './catalog/index.js';
export * from './import/index.js';
export * from './inspect/index.js';
export * from './database/index.js';
export * from './csv/index.js';
export * from './config/index.js';
export * from './reliability/index.js';
export * from './telemetry/index.js';
