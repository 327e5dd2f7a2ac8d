export * from './types';
export * from './property-utils';
export * from './maven-utils';
export * from './gradle-utils';
export * from './catalog-utils';
export * from './coordinate-catalog';
