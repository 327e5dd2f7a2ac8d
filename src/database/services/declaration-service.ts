import type { ClassDeclaration, InterfaceDeclaration } from '../../parsers/java/types';
import { createComponentLogger } from '../../utils/logger';
import {
  InheritanceEdge,
  NodeLabel,
  RelationshipType,
  TypeLabel,
  WriteStats,
} from '../models';
import { groupBy, mergeStats, writeNodeRows, writeRelationshipRows } from './batch-utils';
import { WriteContext } from './types';

const logger = createComponentLogger('declaration-service');

/**
 * Class and Interface nodes keyed by (name, file), plus File-[:DEFINES]->type
 */
export async function writeTypeDeclarations(
  context: WriteContext,
  classes: readonly ClassDeclaration[],
  interfaces: readonly InterfaceDeclaration[]
): Promise<WriteStats> {
  const classNodes = await writeNodeRows(
    context,
    NodeLabel.CLASS,
    classes.map(declaration => ({
      key: { name: declaration.name, file: declaration.file },
      props: {
        package: declaration.package ?? null,
        line: declaration.line,
        end_line: declaration.end_line,
        modifiers: declaration.modifiers,
        is_abstract: declaration.is_abstract,
        is_final: declaration.is_final,
        estimated_lines: declaration.estimated_lines,
      },
    }))
  );

  const interfaceNodes = await writeNodeRows(
    context,
    NodeLabel.INTERFACE,
    interfaces.map(declaration => ({
      key: { name: declaration.name, file: declaration.file },
      props: {
        package: declaration.package ?? null,
        line: declaration.line,
        end_line: declaration.end_line,
        modifiers: declaration.modifiers,
        method_count: declaration.method_count,
        estimated_lines: declaration.estimated_lines,
      },
    }))
  );

  const classDefines = await writeDefines(context, NodeLabel.CLASS, classes);
  const interfaceDefines = await writeDefines(context, NodeLabel.INTERFACE, interfaces);

  logger.debug('Type declarations written', {
    classes: classes.length,
    interfaces: interfaces.length,
  });
  return mergeStats(classNodes, interfaceNodes, classDefines, interfaceDefines);
}

async function writeDefines(
  context: WriteContext,
  label: TypeLabel,
  declarations: ReadonlyArray<{ name: string; file: string }>
): Promise<WriteStats> {
  return writeRelationshipRows(
    context,
    { type: RelationshipType.DEFINES, fromLabel: NodeLabel.FILE, toLabel: label, mergeKeys: [] },
    declarations.map(declaration => ({
      from: { path: declaration.file },
      to: { name: declaration.name, file: declaration.file },
      key: {},
      props: {},
    }))
  );
}

/**
 * EXTENDS and IMPLEMENTS edges between already-resolved type nodes
 */
export async function writeInheritance(
  context: WriteContext,
  edges: readonly InheritanceEdge[]
): Promise<WriteStats> {
  const groups = groupBy(edges, edge => `${edge.type}|${edge.from.label}|${edge.to.label}`);

  const stats: WriteStats[] = [];
  for (const group of groups.values()) {
    const [first] = group;
    stats.push(
      await writeRelationshipRows(
        context,
        {
          type: first.type,
          fromLabel: first.from.label,
          toLabel: first.to.label,
          mergeKeys: [],
        },
        group.map(edge => ({
          from: { name: edge.from.name, file: edge.from.file },
          to: { name: edge.to.name, file: edge.to.file },
          key: {},
          props: {},
        }))
      )
    );
  }

  return mergeStats(...stats);
}
