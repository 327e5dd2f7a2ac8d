import path from 'path';
import type { FileRecord } from '../../parsers/java/types';
import { createComponentLogger } from '../../utils/logger';
import { NodeLabel, NodeRow, RelationshipType, WriteStats } from '../models';
import { mergeStats, writeNodeRows, writeRelationshipRows } from './batch-utils';
import { attachEmbedding } from './embedding-utils';
import { Embedded, WriteContext } from './types';

const logger = createComponentLogger('structure-service');

/**
 * Parent directory of a repository-relative path; the root is ''
 */
export function parentDirectory(filePath: string): string {
  const parent = path.posix.dirname(filePath);
  return parent === '.' || parent === '/' ? '' : parent;
}

/**
 * Every directory on the way from the root to each file, root '' included
 */
export function collectDirectories(filePaths: readonly string[]): string[] {
  const directories = new Set<string>();

  for (const filePath of filePaths) {
    let current = parentDirectory(filePath);
    directories.add(current);
    while (current !== '') {
      current = parentDirectory(current);
      directories.add(current);
    }
  }

  return [...directories].sort();
}

/**
 * Directory nodes and the Directory-[:CONTAINS]->Directory hierarchy
 */
export async function writeDirectories(
  context: WriteContext,
  filePaths: readonly string[]
): Promise<WriteStats> {
  const directories = collectDirectories(filePaths);

  const nodes = await writeNodeRows(
    context,
    NodeLabel.DIRECTORY,
    directories.map(directory => ({
      key: { path: directory },
      props: { name: directory === '' ? '' : path.posix.basename(directory) },
    }))
  );

  const edges = await writeRelationshipRows(
    context,
    {
      type: RelationshipType.CONTAINS,
      fromLabel: NodeLabel.DIRECTORY,
      toLabel: NodeLabel.DIRECTORY,
      mergeKeys: [],
    },
    directories
      .filter(directory => directory !== '')
      .map(directory => ({
        from: { path: parentDirectory(directory) },
        to: { path: directory },
        key: {},
        props: {},
      }))
  );

  logger.debug('Directories written', { directories: directories.length });
  return mergeStats(nodes, edges);
}

/**
 * File nodes with metrics and optional embedding, plus Directory-[:CONTAINS]->File
 */
export async function writeFiles(
  context: WriteContext,
  files: readonly Embedded<FileRecord>[]
): Promise<WriteStats> {
  const plainRows: NodeRow[] = [];
  const embeddedRows: NodeRow[] = [];

  for (const { record, embedding } of files) {
    const row: NodeRow = {
      key: { path: record.path },
      props: {
        name: path.posix.basename(record.path),
        language: record.language,
        ecosystem: record.ecosystem,
        package: record.package ?? null,
        total_lines: record.total_lines,
        code_lines: record.code_lines,
        method_count: record.method_count,
        class_count: record.class_count,
        interface_count: record.interface_count,
      },
    };
    if (attachEmbedding(row.props, embedding, context)) {
      embeddedRows.push(row);
    } else {
      plainRows.push(row);
    }
  }

  const plain = await writeNodeRows(context, NodeLabel.FILE, plainRows);
  const embedded = await writeNodeRows(context, NodeLabel.FILE, embeddedRows, {
    withEmbeddings: true,
  });

  const containment = await writeRelationshipRows(
    context,
    {
      type: RelationshipType.CONTAINS,
      fromLabel: NodeLabel.DIRECTORY,
      toLabel: NodeLabel.FILE,
      mergeKeys: [],
    },
    files.map(({ record }) => ({
      from: { path: parentDirectory(record.path) },
      to: { path: record.path },
      key: {},
      props: {},
    }))
  );

  logger.debug('Files written', { files: files.length, withEmbeddings: embeddedRows.length });
  return mergeStats(plain, embedded, containment);
}
