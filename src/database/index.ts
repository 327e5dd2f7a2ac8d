export * from './connection';
export * from './cypher-builder';
export * from './graph-store';
export * from './models';
