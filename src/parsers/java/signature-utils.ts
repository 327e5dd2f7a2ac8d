import Parser from 'tree-sitter';
import { MODIFIER_KEYWORDS, ParameterRecord } from './types';
import { NodeTextFn } from './traversal-utils';

/**
 * Extract modifiers from a declaration node. Annotations are not modifiers.
 */
export function extractModifiers(node: Parser.SyntaxNode): string[] {
  const modifiers: string[] = [];
  const modifiersNode = node.children.find(child => child.type === 'modifiers');
  if (!modifiersNode) return modifiers;

  for (const child of modifiersNode.children) {
    if (MODIFIER_KEYWORDS.has(child.type)) {
      modifiers.push(child.type);
    }
  }

  return modifiers;
}

const DEPRECATED_ANNOTATIONS = new Set(['Deprecated', 'java.lang.Deprecated']);

export interface DeprecatedAnnotation {
  since?: string;
}

/**
 * `@Deprecated` or `@Deprecated(since = "9")` among a declaration's modifiers
 */
export function findDeprecatedAnnotation(
  node: Parser.SyntaxNode,
  content: string,
  getNodeTextFn: NodeTextFn
): DeprecatedAnnotation | undefined {
  const modifiersNode = node.children.find(child => child.type === 'modifiers');
  if (!modifiersNode) return undefined;

  for (const annotation of modifiersNode.namedChildren) {
    if (annotation.type !== 'marker_annotation' && annotation.type !== 'annotation') continue;
    const nameNode = annotation.childForFieldName('name');
    if (!nameNode || !DEPRECATED_ANNOTATIONS.has(getNodeTextFn(nameNode, content))) continue;

    const deprecated: DeprecatedAnnotation = {};
    const argumentsNode = annotation.childForFieldName('arguments');
    for (const pair of argumentsNode?.namedChildren ?? []) {
      if (pair.type !== 'element_value_pair') continue;
      const key = pair.childForFieldName('key');
      const value = pair.childForFieldName('value');
      if (key && value && getNodeTextFn(key, content) === 'since') {
        deprecated.since = getNodeTextFn(value, content).replace(/^"|"$/g, '');
      }
    }
    return deprecated;
  }

  return undefined;
}

/**
 * Type text with whitespace removed, e.g. `Map<String, List<Integer>>` -> `Map<String,List<Integer>>`
 */
export function normalizeTypeText(typeText: string): string {
  return typeText.replace(/\s+/g, '');
}

/**
 * Bare type name used for matching declarations: generics, array brackets and varargs dots dropped
 */
export function stripTypeDecorations(typeText: string): string {
  let depth = 0;
  let result = '';
  for (const char of typeText) {
    if (char === '<') {
      depth++;
    } else if (char === '>') {
      depth = Math.max(0, depth - 1);
    } else if (depth === 0) {
      result += char;
    }
  }
  return result.replace(/\[\]/g, '').replace(/\.\.\./g, '').replace(/\s+/g, '');
}

/**
 * Split a possibly qualified type into package and simple name.
 * `com.acme.Widget` -> { package: 'com.acme', name: 'Widget' }. Nested types keep the
 * last segment: `Map.Entry` -> { name: 'Entry' } with no package.
 */
export function splitQualifiedType(typeText: string): { package?: string; name: string } {
  const bare = stripTypeDecorations(typeText);
  const segments = bare.split('.').filter(segment => segment.length > 0);
  if (segments.length <= 1) {
    return { name: bare };
  }

  const name = segments[segments.length - 1];
  const packageSegments: string[] = [];
  for (const segment of segments.slice(0, -1)) {
    if (/^[A-Z]/.test(segment)) break;
    packageSegments.push(segment);
  }

  return packageSegments.length > 0 ? { package: packageSegments.join('.'), name } : { name };
}

/**
 * Extract formal and varargs parameters in declaration order
 */
export function extractParameters(
  methodNode: Parser.SyntaxNode,
  content: string,
  getNodeTextFn: NodeTextFn,
  importedTypes: ReadonlyMap<string, string>
): ParameterRecord[] {
  const parametersNode = methodNode.childForFieldName('parameters');
  if (!parametersNode) return [];

  const parameters: ParameterRecord[] = [];

  for (const child of parametersNode.namedChildren) {
    let type: string | undefined;
    let name: string | undefined;

    if (child.type === 'formal_parameter') {
      const typeNode = child.childForFieldName('type');
      const nameNode = child.childForFieldName('name');
      type = typeNode ? normalizeTypeText(getNodeTextFn(typeNode, content)) : undefined;
      name = nameNode ? getNodeTextFn(nameNode, content) : undefined;
      const dimensions = child.childForFieldName('dimensions');
      if (type && dimensions) {
        type += normalizeTypeText(getNodeTextFn(dimensions, content));
      }
    } else if (child.type === 'spread_parameter') {
      const typeNode = child.namedChildren.find(
        part => part.type !== 'modifiers' && part.type !== 'variable_declarator'
      );
      const declarator = child.namedChildren.find(part => part.type === 'variable_declarator');
      const nameNode = declarator?.childForFieldName('name');
      type = typeNode ? `${normalizeTypeText(getNodeTextFn(typeNode, content))}...` : undefined;
      name = nameNode ? getNodeTextFn(nameNode, content) : undefined;
    } else {
      continue;
    }

    const parameter: ParameterRecord = {
      name: name ?? `arg${parameters.length}`,
      type: type ?? '?',
      index: parameters.length,
    };

    const typePackage = type ? resolveTypePackage(type, importedTypes) : undefined;
    if (typePackage) {
      parameter.type_package = typePackage;
    }

    parameters.push(parameter);
  }

  return parameters;
}

/**
 * Package of a type reference, from its own qualification or a single-type import
 */
export function resolveTypePackage(
  typeText: string,
  importedTypes: ReadonlyMap<string, string>
): string | undefined {
  const { package: qualifiedPackage, name } = splitQualifiedType(typeText);
  if (qualifiedPackage) return qualifiedPackage;
  return importedTypes.get(name);
}
