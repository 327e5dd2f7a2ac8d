#!/usr/bin/env node
import process from 'process';
import path from 'path';

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import {
  ARTIFACT_FILES,
  GraphBuilder,
  BuildError,
  BuildOptions,
  StepReport,
  readDependencyMap,
  readEmbeddings,
  readExtractionArtifact,
  writeDependencyMap,
  writeErrors,
  writeExtractionArtifact,
} from '../graph';
import {
  Neo4jGraphStore,
  closeDatabaseConnection,
  createSessionRunner,
  openSession,
  testDatabaseConnection,
} from '../database';
import type { GraphStore } from '../database';
import { ensureConstraintsOrFail, setupSchema } from '../database/services';
import { SchemaConstraintError } from '../utils/errors';
import { config } from '../utils/config';
import { logger, flushLogs } from '../utils/logger';

interface SharedOptions {
  verbose?: boolean;
  maxConcurrency?: string;
  batchSize?: string;
}

interface AnalyzeOptions extends SharedOptions {
  embeddings?: string;
  errorsOut?: string;
}

function parsePositive(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive number`);
  }
  return parsed;
}

function buildOptions(options: SharedOptions): BuildOptions {
  if (options.verbose) {
    logger.level = 'debug';
  }
  return {
    maxConcurrency: parsePositive(options.maxConcurrency, '--max-concurrency'),
    batchSize: parsePositive(options.batchSize, '--batch-size'),
  };
}

/**
 * One session for the whole command; the driver is closed afterwards either way
 */
async function withGraphStore<T>(fn: (store: GraphStore) => Promise<T>): Promise<T> {
  await testDatabaseConnection();
  const session = openSession();
  try {
    return await fn(new Neo4jGraphStore(createSessionRunner(session)));
  } finally {
    await session.close();
    await closeDatabaseConnection();
  }
}

function printSteps(steps: readonly StepReport[]): void {
  for (const step of steps) {
    console.log(chalk.gray(`  ${step.step.padEnd(22)} ${step.rows} rows, ${step.batches} batches`));
  }
}

function printErrors(errors: readonly BuildError[]): void {
  if (errors.length === 0) return;
  console.log(chalk.yellow(`\nErrors encountered: ${errors.length}`));
  errors.slice(0, 10).forEach((error, index) => {
    console.log(chalk.gray(`  ${index + 1}. ${error.filePath}: ${error.message}`));
  });
  if (errors.length > 10) {
    console.log(chalk.gray(`  ... and ${errors.length - 10} more errors`));
  }
}

async function fail(
  spinnerText: string,
  spinner: ReturnType<typeof ora>,
  error: unknown
): Promise<never> {
  spinner.fail(spinnerText);
  if (error instanceof SchemaConstraintError) {
    console.error(chalk.red(`\nMissing constraints: ${error.missingConstraints.join(', ')}`));
  } else {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  }
  await flushLogs();
  process.exit(1);
}

const program = new Command();

program
  .name('java-code-graph')
  .description('Build an idempotent Neo4j code graph from Java sources and Maven/Gradle manifests')
  .version('0.1.0');

program
  .command('analyze')
  .description('Extract a repository and write its graph in one run')
  .argument('<path>', 'Path to the repository to analyze')
  .option('--max-concurrency <number>', 'Files parsed at once')
  .option('--batch-size <number>', 'Rows per write batch')
  .option('--embeddings <file>', 'JSON file with { files, methods } vectors')
  .option('--errors-out <file>', 'Write parse errors to this JSON file')
  .option('--verbose', 'Enable verbose logging')
  .action(async (repositoryPath: string, options: AnalyzeOptions) => {
    const spinner = ora('Initializing analysis...').start();

    try {
      const buildOpts = buildOptions(options);
      if (options.embeddings) {
        buildOpts.embeddings = await readEmbeddings(path.resolve(options.embeddings));
      }

      const startTime = Date.now();
      spinner.text = `Analyzing ${path.resolve(repositoryPath)}...`;
      const result = await withGraphStore(store =>
        new GraphBuilder(store).analyzeRepository(path.resolve(repositoryPath), buildOpts)
      );
      spinner.succeed('Analysis completed');

      if (options.errorsOut) {
        await writeErrors(path.resolve(options.errorsOut), result.errors);
      }

      console.log(chalk.green('\nRepository analysis complete'));
      console.log(chalk.blue(`Duration: ${((Date.now() - startTime) / 1000).toFixed(2)}s`));
      console.log(chalk.blue(`Files processed: ${result.filesProcessed}`));
      console.log(chalk.blue(`Parse failures: ${result.parseFailures}`));
      console.log(chalk.blue(`Batches written: ${result.batchesWritten}`));
      console.log(
        chalk.blue(
          `Classes: ${result.classes}, interfaces: ${result.interfaces}, methods: ${result.methods}`
        )
      );
      printSteps(result.steps);
      printErrors(result.errors);

      await flushLogs();
    } catch (error) {
      await closeDatabaseConnection();
      await fail('Analysis failed', spinner, error);
    }
  });

program
  .command('extract')
  .description('Parse a repository into artifacts without touching the database')
  .argument('<path>', 'Path to the repository to extract')
  .requiredOption('--out <dir>', 'Directory for the artifacts')
  .option('--max-concurrency <number>', 'Files parsed at once')
  .option('--verbose', 'Enable verbose logging')
  .action(async (repositoryPath: string, options: SharedOptions & { out: string }) => {
    const spinner = ora('Extracting repository...').start();

    try {
      const buildOpts = buildOptions(options);
      const outDir = path.resolve(options.out);
      const extraction = await new GraphBuilder().extractRepository(
        path.resolve(repositoryPath),
        buildOpts
      );

      await writeExtractionArtifact(
        path.join(outDir, ARTIFACT_FILES.extraction),
        extraction.records
      );
      await writeDependencyMap(
        path.join(outDir, ARTIFACT_FILES.dependencies),
        extraction.dependencyMap
      );
      await writeErrors(path.join(outDir, ARTIFACT_FILES.errors), extraction.errors);
      spinner.succeed('Extraction completed');

      console.log(chalk.blue(`Files parsed: ${extraction.records.length}`));
      console.log(
        chalk.blue(`Parse failures: ${extraction.filesDiscovered - extraction.records.length}`)
      );
      console.log(chalk.blue(`Dependency coordinates: ${extraction.coordinates.length}`));
      console.log(chalk.gray(`Artifacts: ${outDir}`));
      printErrors(extraction.errors);

      await flushLogs();
    } catch (error) {
      await fail('Extraction failed', spinner, error);
    }
  });

program
  .command('write')
  .description('Write previously extracted artifacts to the graph')
  .requiredOption('--artifacts <dir>', 'Directory produced by extract')
  .option('--batch-size <number>', 'Rows per write batch')
  .option('--verbose', 'Enable verbose logging')
  .action(async (options: SharedOptions & { artifacts: string }) => {
    const spinner = ora('Loading artifacts...').start();

    try {
      const buildOpts = buildOptions(options);
      const dir = path.resolve(options.artifacts);
      const records = await readExtractionArtifact(path.join(dir, ARTIFACT_FILES.extraction));
      const dependencyMap = await readDependencyMap(path.join(dir, ARTIFACT_FILES.dependencies));
      const embeddings = await readEmbeddings(path.join(dir, ARTIFACT_FILES.embeddings));

      spinner.text = 'Writing graph...';
      const report = await withGraphStore(store =>
        new GraphBuilder(store).writeGraph(records, dependencyMap, embeddings, buildOpts)
      );
      spinner.succeed('Graph written');

      console.log(chalk.blue(`Files: ${records.length}`));
      console.log(chalk.blue(`Batches written: ${report.batchesWritten}`));
      printSteps(report.steps);

      await flushLogs();
    } catch (error) {
      await closeDatabaseConnection();
      await fail('Write failed', spinner, error);
    }
  });

program
  .command('schema')
  .description('Create the managed constraints and indexes, then verify them')
  .option('--verbose', 'Enable verbose logging')
  .action(async (options: SharedOptions) => {
    buildOptions(options);
    const spinner = ora(`Applying schema to ${config.neo4j.database}...`).start();

    try {
      const result = await withGraphStore(async store => {
        const setup = await setupSchema(store);
        await ensureConstraintsOrFail(store);
        return setup;
      });
      spinner.succeed('Schema ready');

      console.log(chalk.blue(`Applied: ${result.applied.length}`));
      console.log(chalk.blue(`Already present: ${result.skipped.length}`));
      if (result.failed.length > 0) {
        console.log(chalk.yellow(`Failed (optional): ${result.failed.join(', ')}`));
      }

      await flushLogs();
    } catch (error) {
      await closeDatabaseConnection();
      await fail('Schema setup failed', spinner, error);
    }
  });

program.configureHelp({
  sortSubcommands: true,
});

program.on('command:*', () => {
  console.error(chalk.red(`Invalid command: ${program.args.join(' ')}`));
  console.log(chalk.blue('See --help for a list of available commands.'));
  process.exit(1);
});

process.on('unhandledRejection', reason => {
  logger.error('Unhandled rejection', { reason: String(reason) });
  console.error(chalk.red('\nUnhandled promise rejection:'), reason);
  process.exit(1);
});

program.parseAsync().catch(error => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
