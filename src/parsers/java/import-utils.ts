import Parser from 'tree-sitter';
import { ImportRecord, ImportType } from './types';
import { findNodeOfType, NodeTextFn } from './traversal-utils';

const STANDARD_PREFIXES = ['java.', 'javax.'];

export function classifyImport(
  importPath: string,
  packageName: string | undefined,
  internalPrefixes: readonly string[]
): ImportType {
  if (STANDARD_PREFIXES.some(prefix => importPath.startsWith(prefix))) {
    return ImportType.STANDARD;
  }

  const prefixes = [...internalPrefixes];
  if (packageName) {
    const segments = packageName.split('.');
    prefixes.push(segments.slice(0, Math.min(2, segments.length)).join('.'));
  }

  const isInternal = prefixes.some(
    prefix => prefix.length > 0 && (importPath === prefix || importPath.startsWith(`${prefix}.`))
  );
  return isInternal ? ImportType.INTERNAL : ImportType.EXTERNAL;
}

export function extractImport(
  node: Parser.SyntaxNode,
  content: string,
  getNodeTextFn: NodeTextFn,
  packageName: string | undefined,
  internalPrefixes: readonly string[]
): ImportRecord | null {
  const pathNode = node.namedChildren.find(
    child => child.type === 'scoped_identifier' || child.type === 'identifier'
  );
  if (!pathNode) return null;

  const isStatic = findNodeOfType(node, 'static') !== null;
  const isWildcard = findNodeOfType(node, 'asterisk') !== null;
  const basePath = getNodeTextFn(pathNode, content).replace(/\s+/g, '');
  const importPath = isWildcard ? `${basePath}.*` : basePath;

  return {
    import_path: importPath,
    is_static: isStatic,
    is_wildcard: isWildcard,
    import_type: classifyImport(importPath, packageName, internalPrefixes),
  };
}

/**
 * Simple type name -> package for single-type, non-static imports
 */
export function buildImportedTypeMap(imports: readonly ImportRecord[]): Map<string, string> {
  const importedTypes = new Map<string, string>();

  for (const record of imports) {
    if (record.is_static || record.is_wildcard) continue;
    const lastDot = record.import_path.lastIndexOf('.');
    if (lastDot <= 0) continue;
    importedTypes.set(
      record.import_path.slice(lastDot + 1),
      record.import_path.slice(0, lastDot)
    );
  }

  return importedTypes;
}
