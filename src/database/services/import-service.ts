import type { FileRecord } from '../../parsers/java/types';
import { createComponentLogger } from '../../utils/logger';
import { DependencyLink, NodeLabel, NodeRow, RelationshipType, WriteStats } from '../models';
import { mergeStats, writeNodeRows, writeRelationshipRows } from './batch-utils';
import { WriteContext } from './types';

const logger = createComponentLogger('import-service');

/**
 * Import nodes keyed by path, and File-[:IMPORTS]->Import
 */
export async function writeImports(
  context: WriteContext,
  files: readonly FileRecord[]
): Promise<WriteStats> {
  const importRows = new Map<string, NodeRow>();
  const edges: Array<{ file: string; importPath: string }> = [];

  for (const file of files) {
    for (const record of file.imports) {
      if (!importRows.has(record.import_path)) {
        importRows.set(record.import_path, {
          key: { import_path: record.import_path },
          props: {
            is_static: record.is_static,
            is_wildcard: record.is_wildcard,
            import_type: record.import_type,
          },
        });
      }
      edges.push({ file: file.path, importPath: record.import_path });
    }
  }

  const nodes = await writeNodeRows(context, NodeLabel.IMPORT, [...importRows.values()]);
  const imports = await writeRelationshipRows(
    context,
    { type: RelationshipType.IMPORTS, fromLabel: NodeLabel.FILE, toLabel: NodeLabel.IMPORT, mergeKeys: [] },
    edges.map(edge => ({
      from: { path: edge.file },
      to: { import_path: edge.importPath },
      key: {},
      props: {},
    }))
  );

  logger.debug('Imports written', { imports: importRows.size, edges: edges.length });
  return mergeStats(nodes, imports);
}

/**
 * ExternalDependency nodes keyed by base package, and Import-[:DEPENDS_ON]->ExternalDependency
 */
export async function writeExternalDependencies(
  context: WriteContext,
  links: readonly DependencyLink[],
  ecosystem: string
): Promise<WriteStats> {
  const dependencyRows = new Map<string, NodeRow>();
  for (const link of links) {
    if (dependencyRows.has(link.package)) continue;
    dependencyRows.set(link.package, {
      key: { package: link.package },
      props: {
        language: 'java',
        ecosystem,
        group_id: link.group ?? null,
        artifact_id: link.artifact ?? null,
        version: link.version ?? null,
      },
    });
  }

  const nodes = await writeNodeRows(context, NodeLabel.EXTERNAL_DEPENDENCY, [
    ...dependencyRows.values(),
  ]);
  const dependsOn = await writeRelationshipRows(
    context,
    {
      type: RelationshipType.DEPENDS_ON,
      fromLabel: NodeLabel.IMPORT,
      toLabel: NodeLabel.EXTERNAL_DEPENDENCY,
      mergeKeys: [],
    },
    links.map(link => ({
      from: { import_path: link.import_path },
      to: { package: link.package },
      key: {},
      props: {},
    }))
  );

  const unversioned = [...dependencyRows.values()].filter(row => row.props.version === null).length;
  logger.debug('External dependencies written', {
    dependencies: dependencyRows.size,
    unversioned,
  });
  return mergeStats(nodes, dependsOn);
}
