/**
 * Entity listing
 *
 * One line per metadata_id found in either statistics table, with counts
 * and first/last start_ts merged across both.
 */

import {
  BYTES_PER_FIELD,
  STATISTICS_TABLES,
  describeTable,
} from '../catalog/index.js';
import type { RecorderStore, TimeRange } from '../database/store.js';

export const ENTITY_SORT_KEYS = ['count', 'first', 'last', 'kb'] as const;
export type EntitySortKey = (typeof ENTITY_SORT_KEYS)[number];

export function isEntitySortKey(value: string): value is EntitySortKey {
  return (ENTITY_SORT_KEYS as readonly string[]).includes(value);
}

export interface EntitySummary {
  metadataId: number;
  /** statistic_id, '' when the metadata row is missing */
  entity: string;
  count: number;
  /** Epoch seconds */
  first: number;
  last: number;
  /** Estimated size in KB, one decimal */
  kb: number;
  unit: string;
}

export interface ListEntitiesOptions extends TimeRange {
  sort?: EntitySortKey;
  reverse?: boolean;
}

export function estimateKb(count: number, columns: number): number {
  return Math.round((count * columns * BYTES_PER_FIELD) / 1024 * 10) / 10;
}

export function listEntities(store: RecorderStore, options: ListEntitiesOptions = {}): EntitySummary[] {
  const range: TimeRange = { after: options.after, before: options.before };
  const merged = new Map<number, { count: number; first: number; last: number }>();

  for (const table of STATISTICS_TABLES) {
    for (const agg of store.aggregateByMetadata(table, range)) {
      const existing = merged.get(agg.metadataId);
      if (!existing) {
        merged.set(agg.metadataId, { count: agg.count, first: agg.first, last: agg.last });
        continue;
      }
      existing.count += agg.count;
      existing.first = Math.min(existing.first, agg.first);
      existing.last = Math.max(existing.last, agg.last);
    }
  }

  const metadata = new Map(store.listMetadata().map((m) => [m.id, m]));
  const columns = describeTable('statistics').columns.length;

  const entities: EntitySummary[] = [...merged].map(([metadataId, agg]) => {
    const meta = metadata.get(metadataId);
    return {
      metadataId,
      entity: meta?.statistic_id ?? '',
      count: agg.count,
      first: agg.first,
      last: agg.last,
      kb: estimateKb(agg.count, columns),
      unit: meta?.unit_of_measurement ?? '',
    };
  });

  const { sort } = options;
  if (sort) {
    const direction = options.reverse ? -1 : 1;
    entities.sort((a, b) => (a[sort] - b[sort]) * direction);
  }

  return entities;
}
