import {
  NodeLabel,
  NodeRow,
  RelationshipBatch,
  RelationshipRow,
  WriteStats,
} from '../models';
import { WriteContext } from './types';

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Insertion-ordered grouping; one relationship batch shape per group
 */
export function groupBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

export function emptyStats(): WriteStats {
  return { rows: 0, batches: 0 };
}

export function mergeStats(...stats: WriteStats[]): WriteStats {
  return stats.reduce(
    (total, current) => ({
      rows: total.rows + current.rows,
      batches: total.batches + current.batches,
    }),
    emptyStats()
  );
}

/**
 * Upsert node rows in fixed-size batches, one store call per batch
 */
export async function writeNodeRows(
  context: WriteContext,
  label: NodeLabel,
  rows: readonly NodeRow[],
  options: { withEmbeddings?: boolean } = {}
): Promise<WriteStats> {
  const size = options.withEmbeddings ? context.embeddingBatchSize : context.batchSize;
  const batches = chunk(rows, size);

  for (const batch of batches) {
    await context.store.upsertNodes({ label, rows: batch });
  }

  return { rows: rows.length, batches: batches.length };
}

export async function writeRelationshipRows(
  context: WriteContext,
  shape: Omit<RelationshipBatch, 'rows'>,
  rows: readonly RelationshipRow[]
): Promise<WriteStats> {
  const batches = chunk(rows, context.batchSize);

  for (const batch of batches) {
    await context.store.upsertRelationships({ ...shape, rows: batch });
  }

  return { rows: rows.length, batches: batches.length };
}
