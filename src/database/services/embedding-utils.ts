import { GraphProperties } from '../models';
import { WriteContext } from './types';

/**
 * A vector is usable when it is non-empty and every component is a finite number
 */
export function validateEmbedding(embedding: readonly number[] | undefined): boolean {
  if (!embedding || embedding.length === 0) return false;
  return embedding.every(value => typeof value === 'number' && Number.isFinite(value));
}

/**
 * Add the vector and its model tag to node properties. Returns whether one was attached.
 */
export function attachEmbedding(
  props: GraphProperties,
  embedding: readonly number[] | undefined,
  context: WriteContext
): boolean {
  if (!embedding || !validateEmbedding(embedding)) return false;
  props[context.embeddingProperty] = [...embedding];
  props.embedding_type = context.embeddingType;
  return true;
}
