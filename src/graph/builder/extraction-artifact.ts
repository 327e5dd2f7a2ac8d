import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { DependencyMap } from '../../parsers/build-manifest/types';
import { CallKind, DocKind, FileRecord, ImportType } from '../../parsers/java/types';
import { ArtifactFormatError } from '../../utils/errors';
import { createComponentLogger } from '../../utils/logger';
import { BuildError, EmbeddingInput } from './types';

const logger = createComponentLogger('extraction-artifact');

export const ARTIFACT_FILES = {
  extraction: 'extraction.json',
  dependencies: 'dependencies.json',
  embeddings: 'embeddings.json',
  errors: 'errors.json',
} as const;

const ParameterSchema = z.object({
  name: z.string(),
  type: z.string(),
  type_package: z.string().optional(),
  index: z.number().int().nonnegative(),
});

const CallSchema = z.object({
  method_name: z.string(),
  target_class: z.string(),
  call_type: z.nativeEnum(CallKind),
  qualifier: z.string().optional(),
  target_package: z.string().optional(),
});

const MethodSchema = z.object({
  name: z.string(),
  file: z.string(),
  line: z.number().int(),
  end_line: z.number().int(),
  method_signature: z.string().min(1),
  class_name: z.string().optional(),
  containing_type: z.enum(['class', 'interface']).optional(),
  parameters: z.array(ParameterSchema),
  modifiers: z.array(z.string()),
  is_static: z.boolean(),
  is_abstract: z.boolean(),
  is_final: z.boolean(),
  is_private: z.boolean(),
  is_public: z.boolean(),
  return_type: z.string(),
  estimated_lines: z.number().int(),
  cyclomatic_complexity: z.number().int(),
  deprecated: z.boolean().default(false),
  deprecated_message: z.string().optional(),
  deprecated_since: z.string().optional(),
  code: z.string(),
  calls: z.array(CallSchema),
});

const TypeBaseSchema = z.object({
  name: z.string(),
  file: z.string(),
  package: z.string().optional(),
  line: z.number().int(),
  end_line: z.number().int(),
  modifiers: z.array(z.string()),
  estimated_lines: z.number().int(),
});

const ClassSchema = TypeBaseSchema.extend({
  kind: z.literal('class'),
  extends: z.string().optional(),
  implements: z.array(z.string()),
  is_abstract: z.boolean(),
  is_final: z.boolean(),
});

const InterfaceSchema = TypeBaseSchema.extend({
  kind: z.literal('interface'),
  extends: z.array(z.string()),
  method_count: z.number().int(),
});

const ImportSchema = z.object({
  import_path: z.string(),
  is_static: z.boolean(),
  is_wildcard: z.boolean(),
  import_type: z.nativeEnum(ImportType),
});

const DocSchema = z.object({
  kind: z.nativeEnum(DocKind),
  scope: z.enum(['class', 'interface', 'method']),
  owner: z.string(),
  text: z.string(),
  start_line: z.number().int(),
  end_line: z.number().int(),
});

export const FileRecordSchema = z.object({
  path: z.string(),
  package: z.string().optional(),
  code: z.string(),
  language: z.literal('java'),
  ecosystem: z.enum(['maven', 'gradle']),
  total_lines: z.number().int(),
  code_lines: z.number().int(),
  method_count: z.number().int(),
  class_count: z.number().int(),
  interface_count: z.number().int(),
  classes: z.array(ClassSchema),
  interfaces: z.array(InterfaceSchema),
  methods: z.array(MethodSchema),
  imports: z.array(ImportSchema),
  docs: z.array(DocSchema).default([]),
});

const ExtractionArtifactSchema = z.array(FileRecordSchema);

const DependencyMapSchema = z.record(z.string());

const EmbeddingsSchema = z.object({
  files: z.array(z.array(z.number())).default([]),
  methods: z.array(z.array(z.number())).default([]),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}

async function readJson(filePath: string): Promise<unknown> {
  const text = await fs.readFile(filePath, 'utf-8');
  try {
    return JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ArtifactFormatError(filePath, `invalid JSON (${message})`);
  }
}

async function readValidated<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T
): Promise<z.output<T>> {
  const parsed = schema.safeParse(await readJson(filePath));
  if (!parsed.success) {
    throw new ArtifactFormatError(filePath, describeIssues(parsed.error));
  }
  return parsed.data;
}

async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(value, null, 2), 'utf-8');
}

export async function writeExtractionArtifact(
  filePath: string,
  records: readonly FileRecord[]
): Promise<void> {
  await writeJson(filePath, records);
  logger.info('Extraction artifact written', { filePath, files: records.length });
}

export async function readExtractionArtifact(filePath: string): Promise<FileRecord[]> {
  const records: FileRecord[] = await readValidated(filePath, ExtractionArtifactSchema);
  logger.info('Extraction artifact loaded', { filePath, files: records.length });
  return records;
}

export async function writeDependencyMap(
  filePath: string,
  dependencyMap: DependencyMap
): Promise<void> {
  await writeJson(filePath, dependencyMap);
}

export async function readDependencyMap(filePath: string): Promise<DependencyMap> {
  return readValidated(filePath, DependencyMapSchema);
}

/**
 * Vectors produced outside this pipeline. No file means no vectors.
 */
export async function readEmbeddings(filePath: string): Promise<EmbeddingInput> {
  try {
    await fs.access(filePath);
  } catch {
    logger.debug('No embeddings file', { filePath });
    return { files: [], methods: [] };
  }
  return readValidated(filePath, EmbeddingsSchema);
}

export async function writeErrors(filePath: string, errors: readonly BuildError[]): Promise<void> {
  await writeJson(filePath, errors);
}
