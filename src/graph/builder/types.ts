import type { DependencyCoordinate, DependencyMap } from '../../parsers/build-manifest/types';
import type { Ecosystem, FileRecord } from '../../parsers/java/types';

/**
 * Type definitions for GraphBuilder
 * Core interfaces and types used across builder modules
 */

export interface BuildOptions {
  /** Files parsed at once; defaults to the configured pipeline concurrency */
  maxConcurrency?: number;
  /** Extra import prefixes classified as internal */
  internalPackagePrefixes?: string[];
  /** Rows per write for plain batches */
  batchSize?: number;
  /** Rows per write for batches carrying vectors */
  embeddingBatchSize?: number;
  embeddings?: EmbeddingInput;
}

export interface DiscoveredFile {
  /** Absolute path on disk */
  path: string;
  /** Path relative to the repository root, POSIX separators */
  relativePath: string;
}

export interface DiscoveredRepository {
  sources: DiscoveredFile[];
  manifests: DiscoveredFile[];
}

export interface BuildError {
  filePath: string;
  message: string;
  stack?: string;
}

/**
 * Externally produced vectors, index-aligned with the file list and the flattened method list
 */
export interface EmbeddingInput {
  files: number[][];
  methods: number[][];
}

export interface ExtractionResult {
  records: FileRecord[];
  errors: BuildError[];
  coordinates: DependencyCoordinate[];
  dependencyMap: DependencyMap;
  ecosystem: Ecosystem;
  /** Java files found by discovery, parsed or not */
  filesDiscovered: number;
}

export type WriteStep =
  | 'directories'
  | 'files'
  | 'types'
  | 'inheritance'
  | 'methods'
  | 'method_ownership'
  | 'parameters'
  | 'imports'
  | 'external_dependencies'
  | 'calls'
  | 'constructor_targets'
  | 'docs';

export interface StepReport {
  step: WriteStep;
  rows: number;
  batches: number;
}

export interface WriteReport {
  steps: StepReport[];
  batchesWritten: number;
}

export interface BuildResult {
  filesProcessed: number;
  parseFailures: number;
  batchesWritten: number;
  errors: BuildError[];
  classes: number;
  interfaces: number;
  methods: number;
  imports: number;
  dependencyCoordinates: number;
  steps: StepReport[];
}
