import Parser from 'tree-sitter';
import { DocKind } from './types';
import { isCommentNode, NodeTextFn } from './traversal-utils';

export interface ExtractedDoc {
  kind: DocKind;
  text: string;
  start_line: number;
  end_line: number;
}

/**
 * Contiguous comments immediately before a declaration. Stops at the first
 * non-comment sibling or at a blank line between comments.
 */
export function extractPrecedingDoc(
  node: Parser.SyntaxNode,
  content: string,
  getNodeTextFn: NodeTextFn
): ExtractedDoc | undefined {
  const comments: Parser.SyntaxNode[] = [];
  let expectedEndRow = node.startPosition.row;
  let sibling = node.previousSibling;

  while (sibling && isCommentNode(sibling)) {
    if (expectedEndRow - sibling.endPosition.row > 1) break;
    comments.unshift(sibling);
    expectedEndRow = sibling.startPosition.row;
    sibling = sibling.previousSibling;
  }

  if (comments.length === 0) return undefined;

  const texts = comments.map(comment => getNodeTextFn(comment, content));
  const text = texts.map(cleanCommentText).join('\n').trim();
  if (!text) return undefined;

  return {
    kind: classifyComment(texts[texts.length - 1]),
    text,
    start_line: comments[0].startPosition.row + 1,
    end_line: comments[comments.length - 1].endPosition.row + 1,
  };
}

/**
 * Text of a Javadoc `@deprecated` tag up to the next block tag. Empty string
 * when the tag has no text, undefined when there is no tag.
 */
export function extractDeprecatedTag(docText: string): string | undefined {
  const lines = docText.split('\n');
  const start = lines.findIndex(line => /^\s*@deprecated\b/.test(line));
  if (start === -1) return undefined;

  const parts = [lines[start].replace(/^\s*@deprecated\b/, '')];
  for (const line of lines.slice(start + 1)) {
    if (/^\s*@\w+/.test(line)) break;
    parts.push(line);
  }

  return parts.join(' ').replace(/\s+/g, ' ').trim();
}

export function classifyComment(raw: string): DocKind {
  const trimmed = raw.trimStart();
  if (trimmed.startsWith('/**')) return DocKind.JAVADOC;
  if (trimmed.startsWith('/*')) return DocKind.BLOCK_COMMENT;
  return DocKind.LINE_COMMENT;
}

/**
 * Strip comment delimiters and leading asterisks
 */
export function cleanCommentText(raw: string): string {
  return raw
    .replace(/^\s*\/\*\*?/, '')
    .replace(/\*\/\s*$/, '')
    .split('\n')
    .map(line => line.replace(/^\s*\/\/\s?/, '').replace(/^\s*\*\s?/, '').trimEnd())
    .join('\n')
    .trim();
}
