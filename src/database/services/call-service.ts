import { createComponentLogger } from '../../utils/logger';
import { CallEdge, ConstructorEdge, NodeLabel, RelationshipType, WriteStats } from '../models';
import { writeRelationshipRows } from './batch-utils';
import { WriteContext } from './types';

const logger = createComponentLogger('call-service');

/**
 * Method-[:CALLS {type}]->Method. The call kind is part of the relationship identity;
 * the qualifier is a plain property.
 */
export async function writeCalls(
  context: WriteContext,
  edges: readonly CallEdge[]
): Promise<WriteStats> {
  const stats = await writeRelationshipRows(
    context,
    {
      type: RelationshipType.CALLS,
      fromLabel: NodeLabel.METHOD,
      toLabel: NodeLabel.METHOD,
      mergeKeys: ['type'],
    },
    edges.map(edge => ({
      from: { method_signature: edge.caller },
      to: { method_signature: edge.callee },
      key: { type: edge.call_type },
      props: { qualifier: edge.qualifier ?? null },
    }))
  );

  logger.debug('Call edges written', { edges: edges.length });
  return stats;
}

/**
 * Method-[:CREATES]->Class for constructor calls with exactly one matching class
 */
export async function writeConstructorTargets(
  context: WriteContext,
  edges: readonly ConstructorEdge[]
): Promise<WriteStats> {
  return writeRelationshipRows(
    context,
    {
      type: RelationshipType.CREATES,
      fromLabel: NodeLabel.METHOD,
      toLabel: NodeLabel.CLASS,
      mergeKeys: [],
    },
    edges.map(edge => ({
      from: { method_signature: edge.caller },
      to: { name: edge.target.name, file: edge.target.file },
      key: {},
      props: {},
    }))
  );
}
