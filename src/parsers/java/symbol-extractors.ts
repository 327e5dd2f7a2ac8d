import Parser from 'tree-sitter';
import {
  ClassDeclaration,
  DocKind,
  DocRecord,
  InterfaceDeclaration,
  MethodRecord,
} from './types';
import { findEnclosingType, findMethodEndLine, NodeTextFn } from './traversal-utils';
import {
  extractModifiers,
  extractParameters,
  findDeprecatedAnnotation,
  normalizeTypeText,
  stripTypeDecorations,
} from './signature-utils';
import { buildMethodSignature } from './signature-builder';
import { extractMethodCalls } from './call-resolver';
import { extractDeprecatedTag, extractPrecedingDoc } from './javadoc-utils';
import { computeCyclomaticComplexity } from './metrics-utils';

/**
 * Per-file state shared by the extractors during one traversal
 */
export interface ExtractionContext {
  filePath: string;
  content: string;
  lines: string[];
  packageName?: string;
  importedTypes: ReadonlyMap<string, string>;
  getNodeText: NodeTextFn;
}

export interface ExtractedType<T> {
  declaration: T;
  doc?: DocRecord;
}

/**
 * Type names listed in a `type_list`, generic arguments dropped
 */
function extractTypeList(
  node: Parser.SyntaxNode | null | undefined,
  context: ExtractionContext
): string[] {
  if (!node) return [];
  const typeList = node.namedChildren.find(child => child.type === 'type_list');
  if (!typeList) return [];

  return typeList.namedChildren
    .map(typeNode => stripTypeDecorations(context.getNodeText(typeNode, context.content)))
    .filter(name => name.length > 0);
}

function buildTypeDoc(
  node: Parser.SyntaxNode,
  scope: 'class' | 'interface',
  owner: string,
  context: ExtractionContext
): DocRecord | undefined {
  const doc = extractPrecedingDoc(node, context.content, context.getNodeText);
  return doc ? { ...doc, scope, owner } : undefined;
}

/**
 * Process class declaration
 */
export function processClass(
  node: Parser.SyntaxNode,
  context: ExtractionContext
): ExtractedType<ClassDeclaration> | null {
  const nameNode = node.childForFieldName('name');
  if (!nameNode) return null;

  const name = context.getNodeText(nameNode, context.content);
  const modifiers = extractModifiers(node);
  const line = node.startPosition.row + 1;
  const endLine = node.endPosition.row + 1;

  const superclassNode = node.childForFieldName('superclass');
  const superclassType = superclassNode?.namedChildren[0];
  const superclass = superclassType
    ? stripTypeDecorations(context.getNodeText(superclassType, context.content))
    : undefined;

  const declaration: ClassDeclaration = {
    kind: 'class',
    name,
    file: context.filePath,
    line,
    end_line: endLine,
    modifiers,
    estimated_lines: endLine - line + 1,
    implements: extractTypeList(node.childForFieldName('interfaces'), context),
    is_abstract: modifiers.includes('abstract'),
    is_final: modifiers.includes('final'),
  };
  if (context.packageName) declaration.package = context.packageName;
  if (superclass) declaration.extends = superclass;

  return { declaration, doc: buildTypeDoc(node, 'class', name, context) };
}

/**
 * Process interface declaration. `method_count` is filled in once methods are known.
 */
export function processInterface(
  node: Parser.SyntaxNode,
  context: ExtractionContext
): ExtractedType<InterfaceDeclaration> | null {
  const nameNode = node.childForFieldName('name');
  if (!nameNode) return null;

  const name = context.getNodeText(nameNode, context.content);
  const line = node.startPosition.row + 1;
  const endLine = node.endPosition.row + 1;
  const extendsNode = node.namedChildren.find(child => child.type === 'extends_interfaces');

  const declaration: InterfaceDeclaration = {
    kind: 'interface',
    name,
    file: context.filePath,
    line,
    end_line: endLine,
    modifiers: extractModifiers(node),
    estimated_lines: endLine - line + 1,
    extends: extractTypeList(extendsNode, context),
    method_count: 0,
  };
  if (context.packageName) declaration.package = context.packageName;

  return { declaration, doc: buildTypeDoc(node, 'interface', name, context) };
}

export interface ExtractedMethod {
  method: MethodRecord;
  ownerNode: Parser.SyntaxNode | null;
  doc?: DocRecord;
}

/**
 * Process method declaration (constructors are handled as call targets, not methods)
 */
export function processMethod(
  node: Parser.SyntaxNode,
  context: ExtractionContext
): ExtractedMethod | null {
  const nameNode = node.childForFieldName('name');
  if (!nameNode) return null;

  const name = context.getNodeText(nameNode, context.content);
  const owner = findEnclosingType(node, context.content, context.getNodeText);
  const modifiers = extractModifiers(node);
  const body = node.childForFieldName('body');
  const typeNode = node.childForFieldName('type');
  const returnType = typeNode
    ? normalizeTypeText(context.getNodeText(typeNode, context.content))
    : 'void';

  const parameters = extractParameters(
    node,
    context.content,
    context.getNodeText,
    context.importedTypes
  );

  const isInterfaceMember = owner?.kind === 'interface';
  const isStatic = modifiers.includes('static');
  const isAbstract =
    modifiers.includes('abstract') ||
    (isInterfaceMember && !body && !isStatic && !modifiers.includes('default'));

  const line = node.startPosition.row + 1;
  const endLine = findMethodEndLine(node);
  const signature = buildMethodSignature(
    context.packageName,
    owner?.name,
    name,
    parameters.map(parameter => parameter.type),
    returnType
  );

  const bodyText = body ? context.getNodeText(body, context.content) : '';
  const doc = extractPrecedingDoc(node, context.content, context.getNodeText);
  const deprecatedAnnotation = findDeprecatedAnnotation(node, context.content, context.getNodeText);
  const deprecatedTag =
    doc?.kind === DocKind.JAVADOC ? extractDeprecatedTag(doc.text) : undefined;

  const method: MethodRecord = {
    name,
    file: context.filePath,
    line,
    end_line: endLine,
    method_signature: signature,
    parameters,
    modifiers,
    is_static: isStatic,
    is_abstract: isAbstract,
    is_final: modifiers.includes('final'),
    is_private: modifiers.includes('private'),
    is_public: modifiers.includes('public') || isInterfaceMember,
    return_type: returnType,
    estimated_lines: endLine - line + 1,
    cyclomatic_complexity: computeCyclomaticComplexity(node),
    deprecated: deprecatedAnnotation !== undefined || deprecatedTag !== undefined,
    code: context.lines.slice(line - 1, endLine).join('\n'),
    calls: extractMethodCalls(bodyText, owner?.name ?? '', context.importedTypes),
  };
  if (owner) {
    method.class_name = owner.name;
    method.containing_type = owner.kind;
  }
  if (deprecatedTag) method.deprecated_message = deprecatedTag;
  if (deprecatedAnnotation?.since) method.deprecated_since = deprecatedAnnotation.since;

  return {
    method,
    ownerNode: owner?.node ?? null,
    doc: doc ? { ...doc, scope: 'method', owner: signature } : undefined,
  };
}
