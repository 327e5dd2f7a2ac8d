import Parser from 'tree-sitter';
import { COMMENT_NODE_TYPES, ContainingKind } from './types';

export type NodeTextFn = (node: Parser.SyntaxNode, content: string) => string;

/**
 * Find first direct child of given type
 */
export function findNodeOfType(node: Parser.SyntaxNode, type: string): Parser.SyntaxNode | null {
  for (let i = 0; i < node.childCount; i++) {
    const child = node.child(i);
    if (child?.type === type) return child;
  }
  return null;
}

/**
 * Find all nodes of given type (recursive search)
 */
export function findNodesOfType(node: Parser.SyntaxNode, type: string): Parser.SyntaxNode[] {
  const nodes: Parser.SyntaxNode[] = [];

  const traverse = (n: Parser.SyntaxNode) => {
    if (n.type === type) {
      nodes.push(n);
    }
    for (let i = 0; i < n.childCount; i++) {
      const child = n.child(i);
      if (child) traverse(child);
    }
  };

  traverse(node);
  return nodes;
}

export function isCommentNode(node: Parser.SyntaxNode): boolean {
  return COMMENT_NODE_TYPES.has(node.type);
}

export interface EnclosingType {
  node: Parser.SyntaxNode;
  name: string;
  kind: ContainingKind;
}

/**
 * Walk up to the nearest class or interface declaration
 */
export function findEnclosingType(
  node: Parser.SyntaxNode,
  content: string,
  getNodeTextFn: NodeTextFn
): EnclosingType | null {
  let parent = node.parent;

  while (parent) {
    if (parent.type === 'class_declaration' || parent.type === 'interface_declaration') {
      const nameNode = parent.childForFieldName('name');
      return {
        node: parent,
        name: nameNode ? getNodeTextFn(nameNode, content) : '',
        kind: parent.type === 'class_declaration' ? 'class' : 'interface',
      };
    }
    parent = parent.parent;
  }

  return null;
}

/**
 * Last line of a method: the end of its last body statement, or its start line
 * when the body is empty or absent. Lines are 1-based.
 */
export function findMethodEndLine(methodNode: Parser.SyntaxNode): number {
  const startLine = methodNode.startPosition.row + 1;
  const body = methodNode.childForFieldName('body');
  if (!body) return startLine;

  const statements = body.namedChildren.filter(child => !isCommentNode(child));
  if (statements.length === 0) return startLine;

  return statements[statements.length - 1].endPosition.row + 1;
}
