/**
 * Mutation Executor
 *
 * Applies a plan as a single all-or-nothing transaction, or renders it as
 * SQL without touching the store.
 */

import type { RecorderStore } from '../database/store.js';
import { ExecutionFailedError } from '../reliability/errors.js';
import { toLiteralSql, toParameterized } from './statements.js';
import type {
  AppliedExecution,
  DryRunExecution,
  ExecutionMode,
  ExecutionResult,
  MutationCounts,
  MutationIntent,
} from './types.js';

function emptyCounts(): MutationCounts {
  return { inserted: 0, updated: 0, deleted: 0 };
}

function tally(counts: MutationCounts, intent: MutationIntent): void {
  switch (intent.kind) {
    case 'insert':
      counts.inserted++;
      break;
    case 'update':
      counts.updated++;
      break;
    case 'delete':
      counts.deleted++;
      break;
  }
}

/**
 * Render every intent as literal SQL, in order. Reads nothing, writes nothing.
 */
export function renderDryRun(intents: readonly MutationIntent[]): DryRunExecution {
  const counts = emptyCounts();
  const statements = intents.map((intent) => {
    tally(counts, intent);
    return toLiteralSql(intent);
  });
  return { mode: 'dry-run', counts, statements };
}

/**
 * Apply every intent inside one transaction
 *
 * An update or delete that matches no row fails the run, as does any
 * database error. Either way nothing is committed.
 *
 * @throws ExecutionFailedError naming the failing intent and its line
 */
export function applyIntents(intents: readonly MutationIntent[], store: RecorderStore): AppliedExecution {
  return store.transaction((): AppliedExecution => {
    const counts = emptyCounts();
    const statements: string[] = [];
    const insertedIds: number[] = [];

    intents.forEach((intent, index) => {
      const statement = toParameterized(intent);
      const literal = toLiteralSql(intent);

      let changes: number;
      let lastInsertRowid: number;
      try {
        ({ changes, lastInsertRowid } = store.run(statement));
      } catch (error) {
        throw new ExecutionFailedError(
          index,
          intent.line,
          error instanceof Error ? error.message : String(error),
          { statement: literal, cause: error instanceof Error ? error : undefined }
        );
      }

      if (intent.kind !== 'insert' && changes === 0) {
        throw new ExecutionFailedError(index, intent.line, `no ${intent.table} row with id ${intent.id}`, {
          statement: literal,
        });
      }

      if (intent.kind === 'insert') {
        insertedIds.push(lastInsertRowid);
      }
      tally(counts, intent);
      statements.push(literal);
    });

    return { mode: 'apply', counts, statements, insertedIds };
  });
}

export function execute(
  intents: readonly MutationIntent[],
  mode: ExecutionMode,
  store: RecorderStore
): ExecutionResult {
  return mode === 'dry-run' ? renderDryRun(intents) : applyIntents(intents, store);
}
