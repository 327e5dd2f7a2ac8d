// Type definitions and constants
export * from './types';

// AST traversal utilities
export * from './traversal-utils';

// Signature building utilities
export * from './signature-builder';
export * from './signature-utils';

// Call extraction
export * from './call-resolver';

// Documentation comments
export * from './javadoc-utils';

// Line and complexity metrics
export * from './metrics-utils';

// Import classification
export * from './import-utils';

// Symbol extraction utilities
export * from './symbol-extractors';
