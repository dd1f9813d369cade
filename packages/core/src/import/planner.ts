/**
 * Reconciliation Planner
 *
 * Turns classified rows into an ordered, conflict-free plan:
 *
 * - one batched metadata lookup covers every insert and every update that
 *   sets metadata_id; unknown ids demote the row to UnknownMetadataId
 * - updates and deletes on the same (table, id) collapse to the last row,
 *   each dropped row recorded as a Conflict
 * - per table (statistics first) the plan runs deletes, then updates, then
 *   inserts, each group in input order
 *
 * Validation happens before dedupe, so an invalid row never overrides a
 * valid one.
 */

import { STATISTICS_TABLES, type StatisticsTable } from '../catalog/index.js';
import type {
  Classification,
  Conflict,
  DeleteIntent,
  ImportPlan,
  InsertIntent,
  MetadataLookup,
  MutationIntent,
  RowValidationError,
  UpdateIntent,
} from './types.js';

/** The metadata_id a row would write, if any */
function referencedMetadataId(intent: MutationIntent): number | undefined {
  switch (intent.kind) {
    case 'insert':
      return intent.values.metadata_id;
    case 'update':
      return intent.patch.metadata_id;
    case 'delete':
      return undefined;
  }
}

interface TableGroups {
  deletes: DeleteIntent[];
  updates: UpdateIntent[];
  inserts: InsertIntent[];
}

/**
 * Build an execution plan from classified rows
 *
 * `lookup` is called at most once.
 */
export function plan(classifications: readonly Classification[], lookup: MetadataLookup): ImportPlan {
  const errors: RowValidationError[] = [];
  const candidates: MutationIntent[] = [];
  let skipped = 0;

  for (const classification of classifications) {
    switch (classification.outcome) {
      case 'skipped':
        skipped++;
        break;
      case 'invalid':
        errors.push(...classification.errors);
        break;
      case 'intent':
        candidates.push(classification.intent);
        break;
    }
  }

  // ---------------------------------------------------------------------------
  // Metadata references
  // ---------------------------------------------------------------------------

  const referenced = new Set<number>();
  for (const intent of candidates) {
    const metadataId = referencedMetadataId(intent);
    if (metadataId !== undefined) referenced.add(metadataId);
  }

  const known = referenced.size > 0 ? lookup([...referenced]) : new Set<number>();

  const valid: MutationIntent[] = [];
  for (const intent of candidates) {
    const metadataId = referencedMetadataId(intent);
    if (metadataId !== undefined && !known.has(metadataId)) {
      errors.push({
        line: intent.line,
        kind: 'UnknownMetadataId',
        table: intent.table,
        field: 'metadata_id',
        value: String(metadataId),
        message: `metadata_id ${metadataId} does not exist in statistics_meta`,
      });
      continue;
    }
    valid.push(intent);
  }

  // ---------------------------------------------------------------------------
  // Dedupe by (table, id)
  // ---------------------------------------------------------------------------

  const conflicts: Conflict[] = [];
  const winners = new Map<string, UpdateIntent | DeleteIntent>();

  for (const intent of valid) {
    if (intent.kind === 'insert') continue;

    const key = `${intent.table}:${intent.id}`;
    const previous = winners.get(key);
    if (previous) {
      conflicts.push({
        table: intent.table,
        id: intent.id,
        overriddenLine: previous.line,
        overriddenKind: previous.kind,
        winningLine: intent.line,
        winningKind: intent.kind,
      });
    }
    winners.set(key, intent);
  }

  // ---------------------------------------------------------------------------
  // Ordering
  // ---------------------------------------------------------------------------

  const isWinner = (intent: UpdateIntent | DeleteIntent): boolean =>
    winners.get(`${intent.table}:${intent.id}`) === intent;

  const orderFor = (table: StatisticsTable): MutationIntent[] => {
    const group: TableGroups = { deletes: [], updates: [], inserts: [] };
    for (const intent of valid) {
      if (intent.table !== table) continue;
      switch (intent.kind) {
        case 'insert':
          group.inserts.push(intent);
          break;
        case 'update':
          if (isWinner(intent)) group.updates.push(intent);
          break;
        case 'delete':
          if (isWinner(intent)) group.deletes.push(intent);
          break;
      }
    }
    return [...group.deletes, ...group.updates, ...group.inserts];
  };

  const byTable: Record<StatisticsTable, MutationIntent[]> = {
    statistics: orderFor('statistics'),
    statistics_short_term: orderFor('statistics_short_term'),
  };
  const intents = STATISTICS_TABLES.flatMap((table) => byTable[table]);

  errors.sort((a, b) => a.line - b.line);
  const invalidLines = [...new Set(errors.map((e) => e.line))].sort((a, b) => a - b);

  return {
    intents,
    byTable,
    errors,
    invalidLines,
    conflicts,
    skipped,
    totalRows: classifications.length,
  };
}
