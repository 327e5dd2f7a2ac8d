export enum ManifestKind {
  MAVEN = 'maven',
  GRADLE = 'gradle',
  GRADLE_CATALOG = 'gradle-catalog',
  GRADLE_LOCKFILE = 'gradle-lockfile',
}

export type DependencyScope =
  | 'compile'
  | 'runtime'
  | 'test'
  | 'lockfile'
  | 'catalog'
  | 'dependencyManagement'
  | (string & {});

/**
 * A resolved (group, artifact, version) coordinate with where it came from
 */
export interface DependencyCoordinate {
  group: string;
  artifact: string;
  version: string;
  scope: DependencyScope;
  /** Manifest path relative to the repository root */
  source: string;
}

export interface ManifestFile {
  path: string;
  content: string;
}

export interface ManifestParseError {
  filePath: string;
  message: string;
}

export interface ManifestExtractionResult {
  coordinates: DependencyCoordinate[];
  errors: ManifestParseError[];
}

/**
 * Flat coordinate key -> version. Keys: `g:a:v`, `g:a`, `g.a`, the bare group `g`
 * and the bare artifact `a`.
 */
export type DependencyMap = Record<string, string>;

export const SCOPE_PRIORITY: Record<string, number> = {
  compile: 6,
  runtime: 5,
  test: 4,
  lockfile: 3,
  catalog: 2,
  dependencyManagement: 1,
};

export const GRADLE_CONFIGURATIONS = [
  'implementation',
  'api',
  'compile',
  'compileOnly',
  'runtime',
  'runtimeOnly',
  'testImplementation',
  'testCompile',
  'testCompileOnly',
  'testRuntimeOnly',
  'annotationProcessor',
  'kapt',
];

export const MAX_INTERPOLATION_HOPS = 10;
