/**
 * Graph model: node labels, relationship types and the batch shapes written to the store
 */

export enum NodeLabel {
  DIRECTORY = 'Directory',
  FILE = 'File',
  CLASS = 'Class',
  INTERFACE = 'Interface',
  METHOD = 'Method',
  PARAMETER = 'Parameter',
  IMPORT = 'Import',
  EXTERNAL_DEPENDENCY = 'ExternalDependency',
  DOC = 'Doc',
}

export enum RelationshipType {
  CONTAINS = 'CONTAINS',
  DEFINES = 'DEFINES',
  EXTENDS = 'EXTENDS',
  IMPLEMENTS = 'IMPLEMENTS',
  DECLARES = 'DECLARES',
  CONTAINS_METHOD = 'CONTAINS_METHOD',
  HAS_PARAMETER = 'HAS_PARAMETER',
  OF_TYPE = 'OF_TYPE',
  IMPORTS = 'IMPORTS',
  DEPENDS_ON = 'DEPENDS_ON',
  CALLS = 'CALLS',
  CREATES = 'CREATES',
  HAS_DOC = 'HAS_DOC',
}

/**
 * Natural key of every label. MERGE matches on exactly these properties.
 */
export const NODE_KEYS: Record<NodeLabel, readonly string[]> = {
  [NodeLabel.DIRECTORY]: ['path'],
  [NodeLabel.FILE]: ['path'],
  [NodeLabel.CLASS]: ['name', 'file'],
  [NodeLabel.INTERFACE]: ['name', 'file'],
  [NodeLabel.METHOD]: ['method_signature'],
  [NodeLabel.PARAMETER]: ['method_signature', 'index'],
  [NodeLabel.IMPORT]: ['import_path'],
  [NodeLabel.EXTERNAL_DEPENDENCY]: ['package'],
  [NodeLabel.DOC]: ['file', 'start_line', 'end_line'],
};

export type PropertyValue = string | number | boolean | null | string[] | number[];

export type GraphProperties = Record<string, PropertyValue>;

export interface NodeRow {
  key: GraphProperties;
  props: GraphProperties;
}

export interface NodeBatch {
  label: NodeLabel;
  rows: NodeRow[];
}

export interface RelationshipRow {
  from: GraphProperties;
  to: GraphProperties;
  /** Relationship properties that take part in MERGE identity */
  key: GraphProperties;
  props: GraphProperties;
}

export interface RelationshipBatch {
  type: RelationshipType;
  fromLabel: NodeLabel;
  toLabel: NodeLabel;
  /** Names of `row.key` properties; empty means one relationship per node pair */
  mergeKeys: readonly string[];
  rows: RelationshipRow[];
}

export type TypeLabel = NodeLabel.CLASS | NodeLabel.INTERFACE;

/**
 * A resolved Class or Interface node
 */
export interface TypeRef {
  label: TypeLabel;
  name: string;
  file: string;
}

export interface InheritanceEdge {
  type: RelationshipType.EXTENDS | RelationshipType.IMPLEMENTS;
  from: TypeRef;
  to: TypeRef;
}

export interface ParameterTypeEdge {
  method_signature: string;
  index: number;
  target: TypeRef;
}

export interface CallEdge {
  caller: string;
  callee: string;
  call_type: string;
  qualifier?: string;
}

export interface ConstructorEdge {
  caller: string;
  target: TypeRef;
}

export interface DependencyLink {
  import_path: string;
  package: string;
  group?: string;
  artifact?: string;
  version?: string;
}

export interface WriteStats {
  rows: number;
  batches: number;
}
