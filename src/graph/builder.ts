import fs from 'fs/promises';
import type winston from 'winston';
import type { GraphStore } from '../database/graph-store';
import { BuildManifestParser, detectManifestKind } from '../parsers/build-manifest';
import { buildDependencyMap } from '../parsers/build-manifest/coordinate-catalog';
import { ManifestFile, ManifestKind } from '../parsers/build-manifest/types';
import type { DependencyMap } from '../parsers/build-manifest/types';
import type { Ecosystem, FileRecord } from '../parsers/java/types';
import { GraphPipelineError } from '../utils/errors';
import { createComponentLogger } from '../utils/logger';

import {
  BuildError,
  BuildOptions,
  BuildResult,
  DiscoveredFile,
  EmbeddingInput,
  ExtractionResult,
  FileDiscoveryService,
  FileParsingOrchestrator,
  StorageOrchestrator,
  WriteReport,
} from './builder/';

export type { BuildOptions, BuildResult, BuildError, ExtractionResult, WriteReport };

const logger = createComponentLogger('graph-builder');

/**
 * Ecosystem tag for every file of a repository: a pom.xml anywhere makes it Maven,
 * Gradle manifests alone make it Gradle, nothing at all falls back to Maven
 */
export function detectEcosystem(manifestPaths: readonly string[]): Ecosystem {
  const kinds = manifestPaths.map(manifestPath => detectManifestKind(manifestPath));
  if (kinds.includes(ManifestKind.MAVEN)) return 'maven';
  const gradleKinds = [ManifestKind.GRADLE, ManifestKind.GRADLE_CATALOG, ManifestKind.GRADLE_LOCKFILE];
  if (kinds.some(kind => kind !== null && gradleKinds.includes(kind))) {
    return 'gradle';
  }
  return 'maven';
}

/**
 * GraphBuilder - Main Orchestrator
 *
 * Coordinates repository analysis by delegating to specialized services:
 * - FileDiscoveryService: Java sources and build manifests
 * - FileParsingOrchestrator: concurrent extraction into file records
 * - BuildManifestParser: dependency coordinates
 * - StorageOrchestrator: schema preflight and batched graph writes
 */
export class GraphBuilder {
  private logger: winston.Logger;

  private fileDiscoveryService: FileDiscoveryService;
  private fileParsingOrchestrator: FileParsingOrchestrator;
  private manifestParser: BuildManifestParser;
  private storageOrchestrator?: StorageOrchestrator;

  /**
   * Without a store the builder can only extract
   */
  constructor(store?: GraphStore) {
    this.logger = logger;

    this.fileDiscoveryService = new FileDiscoveryService();
    this.fileParsingOrchestrator = new FileParsingOrchestrator(logger);
    this.manifestParser = new BuildManifestParser();
    if (store) {
      this.storageOrchestrator = new StorageOrchestrator(store, logger);
    }
  }

  /**
   * Walk, parse and read manifests. Touches no store.
   */
  async extractRepository(
    repositoryPath: string,
    options: BuildOptions = {}
  ): Promise<ExtractionResult> {
    const { sources, manifests } = await this.fileDiscoveryService.discoverFiles(repositoryPath);
    const ecosystem = detectEcosystem(manifests.map(manifest => manifest.relativePath));

    const { records, errors } = await this.fileParsingOrchestrator.parseFiles(
      sources,
      ecosystem,
      options
    );

    const manifestFiles = await this.readManifests(manifests, errors);
    const extraction = this.manifestParser.parseManifests(manifestFiles);
    errors.push(...extraction.errors);
    const dependencyMap = buildDependencyMap(extraction.coordinates);

    this.logger.info('Extraction completed', {
      filesDiscovered: sources.length,
      filesParsed: records.length,
      parseFailures: sources.length - records.length,
      manifests: manifests.length,
      coordinates: extraction.coordinates.length,
      ecosystem,
    });

    return {
      records,
      errors,
      coordinates: extraction.coordinates,
      dependencyMap,
      ecosystem,
      filesDiscovered: sources.length,
    };
  }

  async writeGraph(
    records: readonly FileRecord[],
    dependencyMap: DependencyMap,
    embeddings?: EmbeddingInput,
    options: BuildOptions = {}
  ): Promise<WriteReport> {
    if (!this.storageOrchestrator) {
      throw new GraphPipelineError('GraphBuilder was created without a graph store');
    }
    return this.storageOrchestrator.writeGraph(records, dependencyMap, embeddings, options);
  }

  async analyzeRepository(repositoryPath: string, options: BuildOptions = {}): Promise<BuildResult> {
    const startTime = Date.now();
    this.logger.info('Starting repository analysis', { path: repositoryPath });

    try {
      const extraction = await this.extractRepository(repositoryPath, options);
      const report = await this.writeGraph(
        extraction.records,
        extraction.dependencyMap,
        options.embeddings,
        options
      );

      const result: BuildResult = {
        filesProcessed: extraction.records.length,
        parseFailures: extraction.filesDiscovered - extraction.records.length,
        batchesWritten: report.batchesWritten,
        errors: extraction.errors,
        classes: extraction.records.reduce((sum, record) => sum + record.class_count, 0),
        interfaces: extraction.records.reduce((sum, record) => sum + record.interface_count, 0),
        methods: extraction.records.reduce((sum, record) => sum + record.method_count, 0),
        imports: extraction.records.reduce((sum, record) => sum + record.imports.length, 0),
        dependencyCoordinates: extraction.coordinates.length,
        steps: report.steps,
      };

      this.logger.info('Repository analysis completed', {
        duration: Date.now() - startTime,
        filesProcessed: result.filesProcessed,
        parseFailures: result.parseFailures,
        batchesWritten: result.batchesWritten,
      });

      return result;
    } catch (error) {
      this.logger.error('Repository analysis failed', {
        path: repositoryPath,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private async readManifests(
    manifests: readonly DiscoveredFile[],
    errors: BuildError[]
  ): Promise<ManifestFile[]> {
    const files: ManifestFile[] = [];
    for (const manifest of manifests) {
      try {
        files.push({
          path: manifest.relativePath,
          content: await fs.readFile(manifest.path, 'utf-8'),
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn('Failed to read manifest', { path: manifest.relativePath, error: message });
        errors.push({ filePath: manifest.relativePath, message });
      }
    }
    return files;
  }
}
