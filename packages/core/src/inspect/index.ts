/**
 * @recstat/core/inspect - Read-only views over the recorder
 */

export { summarizeTables, type StatusReport, type TableStatus } from './status.js';
export {
  listEntities,
  estimateKb,
  isEntitySortKey,
  ENTITY_SORT_KEYS,
  type EntitySortKey,
  type EntitySummary,
  type ListEntitiesOptions,
} from './entities.js';
export { exportRecords, type ExportOptions, type ExportResult } from './export.js';
export { formatUtc, parseDateOption } from './time.js';
