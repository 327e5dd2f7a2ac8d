// Type definitions
export * from './types';

// Utility modules
export * from './batch-utils';
export * from './embedding-utils';

// Schema guard
export * from './schema-service';

// Write services, in write order
export * from './structure-service';
export * from './declaration-service';
export * from './method-service';
export * from './import-service';
export * from './call-service';
export * from './doc-service';
