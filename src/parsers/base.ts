import Parser from 'tree-sitter';
import type { Logger } from 'winston';
import { createComponentLogger } from '../utils/logger';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * A file that could not be extracted. Recorded and skipped; the run continues.
 */
export interface ParseError {
  filePath: string;
  message: string;
  line?: number;
  severity: 'error' | 'warning';
}

/**
 * Abstract base class for tree-sitter backed parsers
 */
export abstract class BaseParser {
  protected parser: Parser;
  protected language: string;
  protected logger: Logger;

  constructor(parser: Parser, language: string) {
    this.parser = parser;
    this.language = language;
    this.logger = createComponentLogger(`parser-${language}`);
  }

  abstract getSupportedExtensions(): string[];

  canParseFile(filePath: string): boolean {
    return this.getSupportedExtensions().includes(this.getFileExtension(filePath));
  }

  /**
   * Parse content and return the syntax tree. Throws on content the grammar cannot take.
   */
  protected parseContent(content: string): Parser.Tree {
    if (this.isBinaryContent(content)) {
      throw new Error('Content appears to be binary');
    }

    const tree = this.parser.parse(this.normalizeLineEndings(content));
    if (!tree || !tree.rootNode) {
      throw new Error('Failed to parse content: tree or rootNode is null');
    }

    const errorCount = this.countTreeErrors(tree.rootNode);
    if (errorCount > 0) {
      this.logger.debug('Syntax errors recovered by parser', { errorCount });
    }

    return tree;
  }

  protected normalizeLineEndings(content: string): string {
    return content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
  }

  protected getNodeText(node: Parser.SyntaxNode, content: string): string {
    return content.slice(node.startIndex, node.endIndex);
  }

  protected getFileExtension(filePath: string): string {
    const parts = filePath.split('.');
    return parts.length > 1 ? `.${parts[parts.length - 1]}` : '';
  }

  protected countTreeErrors(node: Parser.SyntaxNode): number {
    let errorCount = node.type === 'ERROR' ? 1 : 0;
    for (const child of node.children) {
      errorCount += this.countTreeErrors(child);
    }
    return errorCount;
  }

  private isBinaryContent(content: string): boolean {
    if (content.indexOf('\0') !== -1) {
      return true;
    }
    if (content.length === 0) {
      return false;
    }

    let nonPrintableCount = 0;
    for (let i = 0; i < content.length; i++) {
      const code = content.charCodeAt(i);
      if (code < 32 && code !== 9 && code !== 10 && code !== 13) {
        nonPrintableCount++;
      }
    }
    return nonPrintableCount / content.length > 0.1;
  }
}
