import type { MethodRecord } from '../../parsers/java/types';
import { ConstraintViolationError } from '../../utils/errors';
import { createComponentLogger } from '../../utils/logger';
import {
  NodeLabel,
  NodeRow,
  ParameterTypeEdge,
  RelationshipType,
  WriteStats,
} from '../models';
import { groupBy, mergeStats, writeNodeRows, writeRelationshipRows } from './batch-utils';
import { attachEmbedding } from './embedding-utils';
import { Embedded, WriteContext } from './types';

const logger = createComponentLogger('method-service');

/**
 * Refuse records without a signature before anything reaches the store
 */
export function assertMethodSignatures(methods: readonly MethodRecord[]): void {
  for (const method of methods) {
    if (typeof method.method_signature !== 'string' || method.method_signature.trim() === '') {
      throw new ConstraintViolationError(
        'method_signature_required',
        `Method ${method.name || '<anonymous>'} in ${method.file} has no method_signature`
      );
    }
  }
}

function methodRow(method: MethodRecord): NodeRow {
  return {
    key: { method_signature: method.method_signature },
    props: {
      id: method.method_signature,
      name: method.name,
      file: method.file,
      line: method.line,
      end_line: method.end_line,
      class_name: method.class_name ?? null,
      containing_type: method.containing_type ?? null,
      modifiers: method.modifiers,
      is_static: method.is_static,
      is_abstract: method.is_abstract,
      is_final: method.is_final,
      is_private: method.is_private,
      is_public: method.is_public,
      return_type: method.return_type,
      estimated_lines: method.estimated_lines,
      cyclomatic_complexity: method.cyclomatic_complexity,
      deprecated: method.deprecated,
      deprecated_message: method.deprecated_message ?? null,
      deprecated_since: method.deprecated_since ?? null,
    },
  };
}

/**
 * Method nodes keyed by signature. Duplicate signatures collapse into one node.
 */
export async function writeMethods(
  context: WriteContext,
  methods: readonly Embedded<MethodRecord>[]
): Promise<WriteStats> {
  assertMethodSignatures(methods.map(({ record }) => record));

  const plainRows: NodeRow[] = [];
  const embeddedRows: NodeRow[] = [];
  for (const { record, embedding } of methods) {
    const row = methodRow(record);
    if (attachEmbedding(row.props, embedding, context)) {
      embeddedRows.push(row);
    } else {
      plainRows.push(row);
    }
  }

  const plain = await writeNodeRows(context, NodeLabel.METHOD, plainRows);
  const embedded = await writeNodeRows(context, NodeLabel.METHOD, embeddedRows, {
    withEmbeddings: true,
  });

  logger.debug('Methods written', { methods: methods.length, withEmbeddings: embeddedRows.length });
  return mergeStats(plain, embedded);
}

/**
 * File-[:DECLARES]->Method and Class/Interface-[:CONTAINS_METHOD]->Method
 */
export async function writeMethodOwnership(
  context: WriteContext,
  methods: readonly MethodRecord[]
): Promise<WriteStats> {
  const declares = await writeRelationshipRows(
    context,
    {
      type: RelationshipType.DECLARES,
      fromLabel: NodeLabel.FILE,
      toLabel: NodeLabel.METHOD,
      mergeKeys: [],
    },
    methods.map(method => ({
      from: { path: method.file },
      to: { method_signature: method.method_signature },
      key: {},
      props: {},
    }))
  );

  const owned = methods.filter(method => method.class_name && method.containing_type);
  const byOwnerKind = groupBy(owned, method => method.containing_type ?? 'class');
  const contains: WriteStats[] = [];

  for (const [kind, group] of byOwnerKind) {
    contains.push(
      await writeRelationshipRows(
        context,
        {
          type: RelationshipType.CONTAINS_METHOD,
          fromLabel: kind === 'interface' ? NodeLabel.INTERFACE : NodeLabel.CLASS,
          toLabel: NodeLabel.METHOD,
          mergeKeys: [],
        },
        group.map(method => ({
          from: { name: method.class_name ?? '', file: method.file },
          to: { method_signature: method.method_signature },
          key: {},
          props: {},
        }))
      )
    );
  }

  return mergeStats(declares, ...contains);
}

/**
 * Parameter nodes, Method-[:HAS_PARAMETER]->Parameter, and Parameter-[:OF_TYPE]->type
 * for the parameters whose type resolved to exactly one declaration
 */
export async function writeParameters(
  context: WriteContext,
  methods: readonly MethodRecord[],
  typeEdges: readonly ParameterTypeEdge[]
): Promise<WriteStats> {
  const parameterRows: NodeRow[] = [];
  for (const method of methods) {
    for (const parameter of method.parameters) {
      parameterRows.push({
        key: { method_signature: method.method_signature, index: parameter.index },
        props: {
          name: parameter.name,
          type: parameter.type,
          type_package: parameter.type_package ?? null,
        },
      });
    }
  }

  const nodes = await writeNodeRows(context, NodeLabel.PARAMETER, parameterRows);

  const hasParameter = await writeRelationshipRows(
    context,
    {
      type: RelationshipType.HAS_PARAMETER,
      fromLabel: NodeLabel.METHOD,
      toLabel: NodeLabel.PARAMETER,
      mergeKeys: [],
    },
    parameterRows.map(row => ({
      from: { method_signature: row.key.method_signature },
      to: row.key,
      key: {},
      props: {},
    }))
  );

  const ofType: WriteStats[] = [];
  for (const group of groupBy(typeEdges, edge => edge.target.label).values()) {
    ofType.push(
      await writeRelationshipRows(
        context,
        {
          type: RelationshipType.OF_TYPE,
          fromLabel: NodeLabel.PARAMETER,
          toLabel: group[0].target.label,
          mergeKeys: [],
        },
        group.map(edge => ({
          from: { method_signature: edge.method_signature, index: edge.index },
          to: { name: edge.target.name, file: edge.target.file },
          key: {},
          props: {},
        }))
      )
    );
  }

  logger.debug('Parameters written', {
    parameters: parameterRows.length,
    resolvedTypes: typeEdges.length,
  });
  return mergeStats(nodes, hasParameter, ...ofType);
}
