export enum CallKind {
  SAME_CLASS = 'same_class',
  THIS = 'this',
  SUPER = 'super',
  STATIC = 'static',
  INSTANCE = 'instance',
  CONSTRUCTOR = 'constructor',
}

export enum ImportType {
  STANDARD = 'standard',
  INTERNAL = 'internal',
  EXTERNAL = 'external',
}

export enum DocKind {
  JAVADOC = 'javadoc',
  BLOCK_COMMENT = 'block_comment',
  LINE_COMMENT = 'line_comment',
}

export type Ecosystem = 'maven' | 'gradle';

export type ContainingKind = 'class' | 'interface';

export interface ParameterRecord {
  name: string;
  type: string;
  /** Package of the parameter type when a single-type import or a qualified name gives it */
  type_package?: string;
  index: number;
}

export interface CallRecord {
  method_name: string;
  /** Class hint: enclosing type, `super`, the qualifier, or the constructed type */
  target_class: string;
  call_type: CallKind;
  qualifier?: string;
  target_package?: string;
}

export interface MethodRecord {
  name: string;
  file: string;
  line: number;
  end_line: number;
  method_signature: string;
  /** Nearest enclosing class or interface; absent for members of top-level enums and records */
  class_name?: string;
  containing_type?: ContainingKind;
  parameters: ParameterRecord[];
  modifiers: string[];
  is_static: boolean;
  is_abstract: boolean;
  is_final: boolean;
  is_private: boolean;
  is_public: boolean;
  return_type: string;
  estimated_lines: number;
  cyclomatic_complexity: number;
  /** `@Deprecated` annotation or a Javadoc `@deprecated` tag */
  deprecated: boolean;
  deprecated_message?: string;
  deprecated_since?: string;
  code: string;
  calls: CallRecord[];
}

interface TypeDeclarationBase {
  name: string;
  file: string;
  package?: string;
  line: number;
  end_line: number;
  modifiers: string[];
  estimated_lines: number;
}

export interface ClassDeclaration extends TypeDeclarationBase {
  kind: 'class';
  extends?: string;
  implements: string[];
  is_abstract: boolean;
  is_final: boolean;
}

export interface InterfaceDeclaration extends TypeDeclarationBase {
  kind: 'interface';
  extends: string[];
  method_count: number;
}

export type TypeDeclaration = ClassDeclaration | InterfaceDeclaration;

export interface ImportRecord {
  import_path: string;
  is_static: boolean;
  is_wildcard: boolean;
  import_type: ImportType;
}

export interface DocRecord {
  kind: DocKind;
  scope: ContainingKind | 'method';
  /** Type name for class/interface docs, method signature for method docs */
  owner: string;
  text: string;
  start_line: number;
  end_line: number;
}

export interface FileRecord {
  path: string;
  package?: string;
  code: string;
  language: 'java';
  ecosystem: Ecosystem;
  total_lines: number;
  code_lines: number;
  method_count: number;
  class_count: number;
  interface_count: number;
  classes: ClassDeclaration[];
  interfaces: InterfaceDeclaration[];
  methods: MethodRecord[];
  imports: ImportRecord[];
  docs: DocRecord[];
}

export interface JavaParseOptions {
  ecosystem?: Ecosystem;
  internalPackagePrefixes?: string[];
}

export const MODIFIER_KEYWORDS = new Set([
  'public',
  'protected',
  'private',
  'static',
  'abstract',
  'final',
  'native',
  'synchronized',
  'transient',
  'volatile',
  'strictfp',
  'default',
  'sealed',
  'non-sealed',
]);

/**
 * Tokens that look like `name(` but are statements, not invocations
 */
export const CONTROL_FLOW_KEYWORDS = new Set([
  'if',
  'for',
  'while',
  'switch',
  'catch',
  'synchronized',
  'return',
  'throw',
  'new',
  'assert',
  'super',
  'this',
  'try',
]);

export const DECISION_NODE_TYPES = new Set([
  'if_statement',
  'for_statement',
  'enhanced_for_statement',
  'while_statement',
  'do_statement',
  'catch_clause',
  'ternary_expression',
  'switch_label',
]);

export const TYPE_DECLARATION_NODE_TYPES = new Set(['class_declaration', 'interface_declaration']);

export const COMMENT_NODE_TYPES = new Set(['line_comment', 'block_comment', 'comment']);
