import { SchemaConstraintError } from '../../utils/errors';
import { createComponentLogger } from '../../utils/logger';
import type { GraphStore } from '../graph-store';

const logger = createComponentLogger('schema-service');

export interface SchemaStatement {
  name: string;
  cypher: string;
}

/**
 * Uniqueness constraints on every natural key. A write never starts without all of them.
 */
export const REQUIRED_CONSTRAINTS: readonly SchemaStatement[] = [
  {
    name: 'directory_path',
    cypher: 'CREATE CONSTRAINT directory_path IF NOT EXISTS FOR (d:Directory) REQUIRE d.path IS UNIQUE',
  },
  {
    name: 'file_path',
    cypher: 'CREATE CONSTRAINT file_path IF NOT EXISTS FOR (f:File) REQUIRE f.path IS UNIQUE',
  },
  {
    name: 'class_name_file',
    cypher:
      'CREATE CONSTRAINT class_name_file IF NOT EXISTS FOR (c:Class) REQUIRE (c.name, c.file) IS UNIQUE',
  },
  {
    name: 'interface_name_file',
    cypher:
      'CREATE CONSTRAINT interface_name_file IF NOT EXISTS FOR (i:Interface) REQUIRE (i.name, i.file) IS UNIQUE',
  },
  {
    name: 'method_signature_unique',
    cypher:
      'CREATE CONSTRAINT method_signature_unique IF NOT EXISTS FOR (m:Method) REQUIRE m.method_signature IS UNIQUE',
  },
  {
    name: 'import_path',
    cypher: 'CREATE CONSTRAINT import_path IF NOT EXISTS FOR (i:Import) REQUIRE i.import_path IS UNIQUE',
  },
  {
    name: 'external_dependency_package',
    cypher:
      'CREATE CONSTRAINT external_dependency_package IF NOT EXISTS FOR (e:ExternalDependency) REQUIRE e.package IS UNIQUE',
  },
  {
    name: 'parameter_method_index',
    cypher:
      'CREATE CONSTRAINT parameter_method_index IF NOT EXISTS FOR (p:Parameter) REQUIRE (p.method_signature, p.index) IS UNIQUE',
  },
  {
    name: 'doc_span',
    cypher:
      'CREATE CONSTRAINT doc_span IF NOT EXISTS FOR (d:Doc) REQUIRE (d.file, d.start_line, d.end_line) IS UNIQUE',
  },
];

/**
 * Property existence constraints need Enterprise edition; created when the server accepts them
 */
export const OPTIONAL_CONSTRAINTS: readonly SchemaStatement[] = [
  {
    name: 'method_signature_required',
    cypher:
      'CREATE CONSTRAINT method_signature_required IF NOT EXISTS FOR (m:Method) REQUIRE m.method_signature IS NOT NULL',
  },
];

export const SCHEMA_INDEXES: readonly SchemaStatement[] = [
  { name: 'method_name', cypher: 'CREATE INDEX method_name IF NOT EXISTS FOR (m:Method) ON (m.name)' },
  {
    name: 'method_estimated_lines',
    cypher: 'CREATE INDEX method_estimated_lines IF NOT EXISTS FOR (m:Method) ON (m.estimated_lines)',
  },
  {
    name: 'method_is_public',
    cypher: 'CREATE INDEX method_is_public IF NOT EXISTS FOR (m:Method) ON (m.is_public)',
  },
  {
    name: 'method_is_static',
    cypher: 'CREATE INDEX method_is_static IF NOT EXISTS FOR (m:Method) ON (m.is_static)',
  },
  {
    name: 'method_is_abstract',
    cypher: 'CREATE INDEX method_is_abstract IF NOT EXISTS FOR (m:Method) ON (m.is_abstract)',
  },
  {
    name: 'class_estimated_lines',
    cypher: 'CREATE INDEX class_estimated_lines IF NOT EXISTS FOR (c:Class) ON (c.estimated_lines)',
  },
  {
    name: 'interface_method_count',
    cypher:
      'CREATE INDEX interface_method_count IF NOT EXISTS FOR (i:Interface) ON (i.method_count)',
  },
];

export interface SchemaSetupResult {
  applied: string[];
  skipped: string[];
  failed: string[];
}

function isAlreadyPresent(message: string): boolean {
  const lowered = message.toLowerCase();
  return lowered.includes('already exists') || lowered.includes('equivalent');
}

/**
 * Create every managed constraint and index. Statements the server rejects are
 * logged and reported; the caller decides whether that is fatal.
 */
export async function setupSchema(store: GraphStore): Promise<SchemaSetupResult> {
  const result: SchemaSetupResult = { applied: [], skipped: [], failed: [] };

  for (const statement of [...REQUIRED_CONSTRAINTS, ...OPTIONAL_CONSTRAINTS, ...SCHEMA_INDEXES]) {
    try {
      await store.applySchemaStatement(statement.cypher);
      result.applied.push(statement.name);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (isAlreadyPresent(message)) {
        result.skipped.push(statement.name);
      } else {
        logger.warn('Schema statement failed', { name: statement.name, error: message });
        result.failed.push(statement.name);
      }
    }
  }

  logger.info('Schema setup complete', {
    applied: result.applied.length,
    skipped: result.skipped.length,
    failed: result.failed.length,
  });

  return result;
}

export async function findMissingConstraints(store: GraphStore): Promise<string[]> {
  const existing = new Set(await store.listConstraints());
  return REQUIRED_CONSTRAINTS.map(constraint => constraint.name).filter(
    name => !existing.has(name)
  );
}

/**
 * Preflight before any write: when required constraints are missing, set up the
 * schema once and check again; still missing means SchemaConstraintError.
 */
export async function ensureConstraintsOrFail(store: GraphStore): Promise<void> {
  let missing = await findMissingConstraints(store);
  if (missing.length === 0) {
    logger.debug('All required constraints present');
    return;
  }

  logger.warn('Required constraints missing, creating schema', { missing });
  await setupSchema(store);

  missing = await findMissingConstraints(store);
  if (missing.length > 0) {
    logger.error('Required constraints still missing', { missing });
    throw new SchemaConstraintError(missing);
  }
}
