import type winston from 'winston';
import type { GraphStore } from '../../database/graph-store';
import type { WriteStats } from '../../database/models';
import {
  Embedded,
  WriteContext,
  assertMethodSignatures,
  ensureConstraintsOrFail,
  writeCalls,
  writeConstructorTargets,
  writeDirectories,
  writeDocs,
  writeExternalDependencies,
  writeFiles,
  writeImports,
  writeInheritance,
  writeMethodOwnership,
  writeMethods,
  writeParameters,
  writeTypeDeclarations,
} from '../../database/services';
import type { DependencyMap } from '../../parsers/build-manifest/types';
import type { FileRecord, MethodRecord } from '../../parsers/java/types';
import { config } from '../../utils/config';
import { createComponentLogger } from '../../utils/logger';
import { SymbolResolver } from '../symbol-resolver';
import { linkExternalImports } from './dependency-linker';
import { BuildOptions, EmbeddingInput, StepReport, WriteReport, WriteStep } from './types';

/**
 * Pair records with index-aligned vectors; a missing entry leaves the record without one
 */
export function alignEmbeddings<T>(
  records: readonly T[],
  vectors: readonly number[][] | undefined
): Embedded<T>[] {
  return records.map((record, index) => {
    const embedding = vectors?.[index];
    return embedding ? { record, embedding } : { record };
  });
}

/**
 * Storage Orchestrator
 * Checks the schema, resolves cross-file references, then writes every node and
 * relationship type in dependency order. Each step is an idempotent MERGE.
 */
export class StorageOrchestrator {
  private logger: winston.Logger;

  constructor(
    private store: GraphStore,
    logger?: winston.Logger
  ) {
    this.logger = logger ?? createComponentLogger('storage-orchestrator');
  }

  async writeGraph(
    records: readonly FileRecord[],
    dependencyMap: DependencyMap,
    embeddings?: EmbeddingInput,
    options: BuildOptions = {}
  ): Promise<WriteReport> {
    const methods: MethodRecord[] = records.flatMap(record => record.methods);
    assertMethodSignatures(methods);

    await ensureConstraintsOrFail(this.store);

    const context: WriteContext = {
      store: this.store,
      batchSize: options.batchSize ?? config.pipeline.batchSize,
      embeddingBatchSize: options.embeddingBatchSize ?? config.pipeline.embeddingBatchSize,
      embeddingProperty: config.pipeline.embeddingProperty,
      embeddingType: config.pipeline.embeddingType,
    };

    const resolved = new SymbolResolver(records).resolveAll();
    const links = linkExternalImports(records, dependencyMap);
    const ecosystem = records[0]?.ecosystem ?? 'maven';

    const steps: StepReport[] = [];
    const run = async (step: WriteStep, write: () => Promise<WriteStats>): Promise<void> => {
      const stats = await write();
      steps.push({ step, ...stats });
      this.logger.info('Write step completed', { step, rows: stats.rows, batches: stats.batches });
    };

    await run('directories', () => writeDirectories(context, records.map(record => record.path)));
    await run('files', () => writeFiles(context, alignEmbeddings(records, embeddings?.files)));
    await run('types', () =>
      writeTypeDeclarations(
        context,
        records.flatMap(record => record.classes),
        records.flatMap(record => record.interfaces)
      )
    );
    await run('inheritance', () => writeInheritance(context, resolved.inheritance));
    await run('methods', () => writeMethods(context, alignEmbeddings(methods, embeddings?.methods)));
    await run('method_ownership', () => writeMethodOwnership(context, methods));
    await run('parameters', () => writeParameters(context, methods, resolved.parameterTypes));
    await run('imports', () => writeImports(context, records));
    await run('external_dependencies', () => writeExternalDependencies(context, links, ecosystem));
    await run('calls', () => writeCalls(context, resolved.calls));
    await run('constructor_targets', () => writeConstructorTargets(context, resolved.constructors));
    await run('docs', () => writeDocs(context, records));

    const batchesWritten = steps.reduce((sum, step) => sum + step.batches, 0);
    this.logger.info('Graph write completed', { files: records.length, batchesWritten });

    return { steps, batchesWritten };
  }
}
