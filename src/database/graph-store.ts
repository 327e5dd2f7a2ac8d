import neo4j, { Integer, Neo4jError } from 'neo4j-driver';
import { ConstraintViolationError } from '../utils/errors';
import { createComponentLogger } from '../utils/logger';
import { CypherRunner } from './connection';
import { buildNodeUpsert, buildRelationshipUpsert } from './cypher-builder';
import { GraphProperties, NodeBatch, PropertyValue, RelationshipBatch } from './models';

const logger = createComponentLogger('graph-store');

const CONSTRAINT_VALIDATION_FAILED = 'Neo.ClientError.Schema.ConstraintValidationFailed';

/**
 * Write surface of the property graph. Every upsert is MERGE-by-natural-key, so
 * replaying a batch leaves node and relationship counts unchanged.
 */
export interface GraphStore {
  upsertNodes(batch: NodeBatch): Promise<void>;
  upsertRelationships(batch: RelationshipBatch): Promise<void>;
  /** Names of the constraints currently defined */
  listConstraints(): Promise<string[]>;
  applySchemaStatement(statement: string): Promise<void>;
}

type CypherValue = PropertyValue | Integer;

function toCypherValue(value: PropertyValue): CypherValue {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return neo4j.int(value);
  }
  return value;
}

/**
 * Integer scalars go out as Neo4j integers; arrays (embeddings) are left as floats
 */
export function toCypherProperties(properties: GraphProperties): Record<string, CypherValue> {
  const converted: Record<string, CypherValue> = {};
  for (const [key, value] of Object.entries(properties)) {
    converted[key] = toCypherValue(value);
  }
  return converted;
}

export class Neo4jGraphStore implements GraphStore {
  constructor(private readonly runner: CypherRunner) {}

  async upsertNodes(batch: NodeBatch): Promise<void> {
    if (batch.rows.length === 0) return;

    const rows = batch.rows.map(row => ({
      key: toCypherProperties(row.key),
      props: toCypherProperties(row.props),
    }));
    await this.execute(buildNodeUpsert(batch.label), { rows });
  }

  async upsertRelationships(batch: RelationshipBatch): Promise<void> {
    if (batch.rows.length === 0) return;

    const rows = batch.rows.map(row => ({
      from: toCypherProperties(row.from),
      to: toCypherProperties(row.to),
      key: toCypherProperties(row.key),
      props: toCypherProperties(row.props),
    }));
    await this.execute(buildRelationshipUpsert(batch), { rows });
  }

  async listConstraints(): Promise<string[]> {
    const records = await this.runner.run('SHOW CONSTRAINTS YIELD name RETURN name');
    return records
      .map(record => record.name)
      .filter((name): name is string => typeof name === 'string');
  }

  async applySchemaStatement(statement: string): Promise<void> {
    await this.execute(statement, {});
  }

  private async execute(query: string, params: Record<string, unknown>): Promise<void> {
    try {
      await this.runner.run(query, params);
    } catch (error) {
      if (error instanceof Neo4jError && error.code === CONSTRAINT_VALIDATION_FAILED) {
        logger.error('Constraint violation during write', { error: error.message });
        throw new ConstraintViolationError('schema', error.message, error);
      }
      throw error;
    }
  }
}
