import fs from 'fs/promises';
import pLimit from 'p-limit';
import type winston from 'winston';
import { ParseError, Result, err } from '../../parsers/base';
import { JavaParser } from '../../parsers/java';
import { Ecosystem, FileRecord } from '../../parsers/java/types';
import { config } from '../../utils/config';
import { createComponentLogger } from '../../utils/logger';
import { BuildError, BuildOptions, DiscoveredFile } from './types';

export interface ParseOutcome {
  records: FileRecord[];
  errors: BuildError[];
}

/**
 * File Parsing Orchestrator
 * Parses Java sources on a bounded worker pool. Each worker yields a Result;
 * the collector splits them into records and errors once all have settled.
 */
export class FileParsingOrchestrator {
  private logger: winston.Logger;
  private parser = new JavaParser();

  constructor(logger?: winston.Logger) {
    this.logger = logger ?? createComponentLogger('file-parsing-orchestrator');
  }

  async parseFiles(
    files: readonly DiscoveredFile[],
    ecosystem: Ecosystem,
    options: BuildOptions = {}
  ): Promise<ParseOutcome> {
    const concurrency = options.maxConcurrency ?? config.pipeline.maxConcurrency;
    const internalPackagePrefixes =
      options.internalPackagePrefixes ?? config.pipeline.internalPackagePrefixes;
    const limit = pLimit(concurrency);

    const results = await Promise.all(
      files.map(file =>
        limit(async (): Promise<Result<FileRecord, ParseError>> => {
          let content: string;
          try {
            content = await fs.readFile(file.path, 'utf-8');
          } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.warn('Failed to read file', { path: file.relativePath, error: message });
            return err({ filePath: file.relativePath, message, severity: 'error' });
          }

          return this.parser.parseFile(file.relativePath, content, {
            ecosystem,
            internalPackagePrefixes,
          });
        })
      )
    );

    const records: FileRecord[] = [];
    const errors: BuildError[] = [];
    for (const result of results) {
      if (result.ok) {
        records.push(result.value);
      } else {
        errors.push({ filePath: result.error.filePath, message: result.error.message });
      }
    }

    this.logger.info('File parsing completed', {
      totalFiles: files.length,
      successfulParses: records.length,
      failedParses: errors.length,
      totalMethods: records.reduce((sum, record) => sum + record.method_count, 0),
    });

    if (errors.length > 0) {
      this.logger.warn('Parsing failures detected', {
        failedCount: errors.length,
        failedFiles: errors.slice(0, 10).map(error => error.filePath),
      });
    }

    return { records, errors };
  }
}
