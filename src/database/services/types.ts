import type { GraphStore } from '../graph-store';

/**
 * Everything a write step needs: the store plus batching and embedding settings
 */
export interface WriteContext {
  store: GraphStore;
  /** Rows per write for plain batches */
  batchSize: number;
  /** Rows per write when rows carry embedding vectors */
  embeddingBatchSize: number;
  embeddingProperty: string;
  embeddingType: string;
}

/**
 * Record plus its index-aligned vector, when one was supplied
 */
export interface Embedded<T> {
  record: T;
  embedding?: number[];
}
