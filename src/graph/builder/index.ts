/**
 * GraphBuilder Modular Architecture
 * Organized barrel exports for all builder modules
 */

// Core Types
export * from './types';

// Pure Utilities
export * from './dependency-linker';
export * from './extraction-artifact';

// Core Services
export { FileDiscoveryService } from './file-discovery-service';
export { StorageOrchestrator, alignEmbeddings } from './storage-orchestrator';

// Parsing & Processing
export { FileParsingOrchestrator } from './file-parsing-orchestrator';
export type { ParseOutcome } from './file-parsing-orchestrator';
