export { BaseParser } from './base';
export { JavaParser } from './java';
export { BuildManifestParser, detectManifestKind } from './build-manifest';
export * from './base';
export * from './java/index';
export * from './build-manifest/index';
