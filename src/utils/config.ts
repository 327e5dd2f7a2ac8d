import { config as dotenvConfig } from 'dotenv';
import path from 'path';

// Load environment variables
dotenvConfig();

export interface Neo4jConfig {
  uri: string;
  username: string;
  password: string;
  database: string;
}

export interface LoggingConfig {
  level: string;
  file: string;
}

export interface PipelineConfig {
  /** Rows per write for batches without vectors */
  batchSize: number;
  /** Rows per write for batches carrying embedding vectors */
  embeddingBatchSize: number;
  maxConcurrency: number;
  /** Import prefixes classified as internal besides the file's own top-level package */
  internalPackagePrefixes: string[];
  embeddingProperty: string;
  embeddingType: string;
}

export interface Config {
  neo4j: Neo4jConfig;
  logging: LoggingConfig;
  pipeline: PipelineConfig;
  nodeEnv: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

function getEnvVarAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    throw new Error(`Environment variable ${key} must be a positive number`);
  }
  return parsed;
}

function getEnvVarAsList(key: string): string[] {
  const value = process.env[key];
  if (!value) return [];
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

export const config: Config = {
  neo4j: {
    uri: getEnvVar('NEO4J_URI', 'bolt://localhost:7687'),
    username: getEnvVar('NEO4J_USERNAME', 'neo4j'),
    password: getEnvVar('NEO4J_PASSWORD', 'password'),
    database: getEnvVar('NEO4J_DATABASE', 'neo4j'),
  },
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    file: getEnvVar('LOG_FILE', path.join(process.cwd(), 'logs', 'java-code-graph.log')),
  },
  pipeline: {
    batchSize: getEnvVarAsNumber('GRAPH_BATCH_SIZE', 2000),
    embeddingBatchSize: getEnvVarAsNumber('GRAPH_EMBEDDING_BATCH_SIZE', 600),
    maxConcurrency: getEnvVarAsNumber('EXTRACT_MAX_CONCURRENCY', 20),
    internalPackagePrefixes: getEnvVarAsList('INTERNAL_PACKAGE_PREFIXES'),
    embeddingProperty: getEnvVar('EMBEDDING_PROPERTY', 'embedding'),
    embeddingType: getEnvVar('EMBEDDING_TYPE', 'external'),
  },
  nodeEnv: getEnvVar('NODE_ENV', 'development'),
};
