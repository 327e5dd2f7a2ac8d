import { NODE_KEYS, NodeLabel, RelationshipBatch } from './models';

function keyPattern(fields: readonly string[], source: string): string {
  return fields.map(field => `${field}: ${source}.${field}`).join(', ');
}

/**
 * `UNWIND $rows AS row MERGE (n:Label {key...}) SET n += row.props`
 */
export function buildNodeUpsert(label: NodeLabel): string {
  return [
    'UNWIND $rows AS row',
    `MERGE (n:${label} {${keyPattern(NODE_KEYS[label], 'row.key')}})`,
    'SET n += row.props',
  ].join('\n');
}

/**
 * Endpoints are matched, never created: a row whose endpoint is absent writes nothing.
 */
export function buildRelationshipUpsert(
  batch: Pick<RelationshipBatch, 'type' | 'fromLabel' | 'toLabel' | 'mergeKeys'>
): string {
  const mergeProps =
    batch.mergeKeys.length > 0 ? ` {${keyPattern(batch.mergeKeys, 'row.key')}}` : '';

  return [
    'UNWIND $rows AS row',
    `MATCH (a:${batch.fromLabel} {${keyPattern(NODE_KEYS[batch.fromLabel], 'row.from')}})`,
    `MATCH (b:${batch.toLabel} {${keyPattern(NODE_KEYS[batch.toLabel], 'row.to')}})`,
    `MERGE (a)-[r:${batch.type}${mergeProps}]->(b)`,
    'SET r += row.props',
  ].join('\n');
}
