/**
 * Import pipeline: classify, plan, execute, summarize
 */

import type { RecorderStore } from '../database/store.js';
import { getLogger, type Logger } from '../telemetry/logger.js';
import { classifyAll } from './classifier.js';
import { execute } from './executor.js';
import { plan } from './planner.js';
import { summarize } from './summary.js';
import type { ImportRow, ImportReport } from './types.js';

export interface RunImportOptions {
  dryRun?: boolean;
  logger?: Logger;
}

/**
 * Run one import against `store`
 *
 * Row problems end up in the report. Only a failed apply throws, after the
 * transaction has been rolled back.
 *
 * @throws ExecutionFailedError
 */
export function runImport(
  rows: readonly ImportRow[],
  store: RecorderStore,
  options: RunImportOptions = {}
): ImportReport {
  const logger = options.logger ?? getLogger();
  const mode = options.dryRun ? 'dry-run' : 'apply';
  const startTime = Date.now();

  logger.jobStart('import', { mode, rows: rows.length });

  const importPlan = plan(classifyAll(rows), (ids) => store.findExistingMetadataIds(ids));

  logger.debug('Import planned', {
    intents: importPlan.intents.length,
    invalidRows: importPlan.invalidLines.length,
    conflicts: importPlan.conflicts.length,
    skipped: importPlan.skipped,
  });
  for (const conflict of importPlan.conflicts) {
    logger.info('Conflicting rows for the same id, last row wins', { ...conflict });
  }

  try {
    const result = execute(importPlan.intents, mode, store);
    const report = summarize(result, importPlan);

    if (result.mode === 'apply') {
      for (const statement of result.statements) {
        logger.debug('Executed', { statement });
      }
    }

    logger.jobEnd('import', true, Date.now() - startTime, {
      mode,
      inserted: report.inserted,
      updated: report.updated,
      deleted: report.deleted,
      invalidRows: report.invalid.rows,
    });

    return report;
  } catch (error) {
    logger.error('Import failed', error, { mode });
    logger.jobEnd('import', false, Date.now() - startTime, { mode });
    throw error;
  }
}
