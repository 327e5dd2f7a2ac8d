import Parser from 'tree-sitter';
type TreeSitterLanguage = Parameters<Parser['setLanguage']>[0];
const Java: TreeSitterLanguage = require('tree-sitter-java');
import { BaseParser, err, ok, ParseError, Result } from './base';
import {
  ClassDeclaration,
  DocRecord,
  FileRecord,
  ImportRecord,
  InterfaceDeclaration,
  JavaParseOptions,
  MethodRecord,
} from './java/types';
import { buildImportedTypeMap, extractImport } from './java/import-utils';
import { computeLineMetrics } from './java/metrics-utils';
import {
  ExtractionContext,
  processClass,
  processInterface,
  processMethod,
} from './java/symbol-extractors';

/**
 * Java declaration extractor. A pure function of (path, content): no state
 * survives between calls, so one instance can serve many files.
 */
export class JavaParser extends BaseParser {
  constructor() {
    const parser = new Parser();
    parser.setLanguage(Java);
    super(parser, 'java');
  }

  getSupportedExtensions(): string[] {
    return ['.java'];
  }

  parseFile(
    filePath: string,
    content: string,
    options: JavaParseOptions = {}
  ): Result<FileRecord, ParseError> {
    try {
      return ok(this.extractFileRecord(filePath, content, options));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn('Failed to extract Java file', { filePath, error: message });
      return err({ filePath, message, severity: 'error' });
    }
  }

  private extractFileRecord(
    filePath: string,
    rawContent: string,
    options: JavaParseOptions
  ): FileRecord {
    const content = this.normalizeLineEndings(rawContent);
    const tree = this.parseContent(content);
    const root = tree.rootNode;

    const packageName = this.extractPackage(root, content);
    const imports: ImportRecord[] = [];
    for (const child of root.namedChildren) {
      if (child.type !== 'import_declaration') continue;
      const record = extractImport(
        child,
        content,
        this.getNodeText.bind(this),
        packageName,
        options.internalPackagePrefixes ?? []
      );
      if (record) imports.push(record);
    }

    const context: ExtractionContext = {
      filePath,
      content,
      lines: content.split('\n'),
      importedTypes: buildImportedTypeMap(imports),
      getNodeText: this.getNodeText.bind(this),
    };
    if (packageName) context.packageName = packageName;

    const classes: ClassDeclaration[] = [];
    const interfaces: InterfaceDeclaration[] = [];
    const methods: MethodRecord[] = [];
    const docs: DocRecord[] = [];
    const interfaceNodes = new Map<number, InterfaceDeclaration>();

    const traverse = (node: Parser.SyntaxNode): void => {
      switch (node.type) {
        case 'class_declaration': {
          const extracted = processClass(node, context);
          if (extracted) {
            classes.push(extracted.declaration);
            if (extracted.doc) docs.push(extracted.doc);
          }
          break;
        }
        case 'interface_declaration': {
          const extracted = processInterface(node, context);
          if (extracted) {
            interfaces.push(extracted.declaration);
            interfaceNodes.set(node.startIndex, extracted.declaration);
            if (extracted.doc) docs.push(extracted.doc);
          }
          break;
        }
        case 'method_declaration': {
          const extracted = processMethod(node, context);
          if (extracted) {
            methods.push(extracted.method);
            if (extracted.doc) docs.push(extracted.doc);
            const owningInterface = extracted.ownerNode
              ? interfaceNodes.get(extracted.ownerNode.startIndex)
              : undefined;
            if (owningInterface) owningInterface.method_count++;
          }
          break;
        }
      }

      for (const child of node.namedChildren) {
        traverse(child);
      }
    };

    traverse(root);

    const metrics = computeLineMetrics(content);
    const record: FileRecord = {
      path: filePath,
      code: content,
      language: 'java',
      ecosystem: options.ecosystem ?? 'maven',
      total_lines: metrics.total_lines,
      code_lines: metrics.code_lines,
      method_count: methods.length,
      class_count: classes.length,
      interface_count: interfaces.length,
      classes,
      interfaces,
      methods,
      imports,
      docs,
    };
    if (packageName) record.package = packageName;

    this.logger.debug('Extracted Java file', {
      filePath,
      classes: classes.length,
      interfaces: interfaces.length,
      methods: methods.length,
    });

    return record;
  }

  private extractPackage(root: Parser.SyntaxNode, content: string): string | undefined {
    const declaration = root.namedChildren.find(child => child.type === 'package_declaration');
    if (!declaration) return undefined;

    const nameNode = declaration.namedChildren.find(
      child => child.type === 'scoped_identifier' || child.type === 'identifier'
    );
    return nameNode ? this.getNodeText(nameNode, content).replace(/\s+/g, '') : undefined;
  }
}
