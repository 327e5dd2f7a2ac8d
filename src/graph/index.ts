export { GraphBuilder, detectEcosystem } from './builder';
export { SymbolResolver } from './symbol-resolver';
export type { ResolvedEdges } from './symbol-resolver';
export * from './builder/index';
