import { resolveCatalogReference, VersionCatalog } from './catalog-utils';
import { extractVersionBindings, resolveGradleVersion } from './property-utils';
import { DependencyCoordinate, GRADLE_CONFIGURATIONS } from './types';

const CONFIGURATION = `(?:${GRADLE_CONFIGURATIONS.join('|')})`;
const COORDINATE_PART = `[A-Za-z0-9._-]+`;

// implementation 'g:a:v' / implementation("g:a:v") / testImplementation "g:a:v:classifier@jar"
const INLINE_PATTERN = new RegExp(
  `\\b(${CONFIGURATION})\\s*\\(?\\s*['"](${COORDINATE_PART}):(${COORDINATE_PART}):([A-Za-z0-9._\\-\${}]+)(?::${COORDINATE_PART})?(?:@\\w+)?['"]`,
  'g'
);

// implementation group: 'g', name: 'a', version: 'v'
const GROOVY_MAP_PATTERN = new RegExp(
  `\\b(${CONFIGURATION})\\s*\\(?\\s*group\\s*:\\s*['"]([^'"]+)['"]\\s*,\\s*name\\s*:\\s*['"]([^'"]+)['"]\\s*,\\s*version\\s*:\\s*['"]([^'"]+)['"]`,
  'g'
);

// implementation(group = "g", name = "a", version = "v")
const KOTLIN_MAP_PATTERN = new RegExp(
  `\\b(${CONFIGURATION})\\s*\\(\\s*group\\s*=\\s*"([^"]+)"\\s*,\\s*name\\s*=\\s*"([^"]+)"\\s*,\\s*version\\s*=\\s*"([^"]+)"`,
  'g'
);

// implementation(libs.spring.boot.starter) / testImplementation libs.bundles.junit
const CATALOG_PATTERN = new RegExp(
  `\\b(${CONFIGURATION})(?:\\s+|\\s*\\(\\s*)([A-Za-z_]\\w*)\\.([A-Za-z0-9_][A-Za-z0-9_.-]*)`,
  'g'
);

export function gradleScope(configuration: string): string {
  if (configuration.startsWith('test')) return 'test';
  if (configuration.toLowerCase().includes('runtime')) return 'runtime';
  return 'compile';
}

/**
 * Coordinates declared in a Groovy or Kotlin DSL build script. Versions that
 * reference an unknown binding are dropped, and so are catalog references
 * that no catalog resolves.
 */
export function extractGradleCoordinates(
  content: string,
  source: string,
  catalogs: readonly VersionCatalog[] = []
): DependencyCoordinate[] {
  const bindings = extractVersionBindings(content);
  const coordinates: DependencyCoordinate[] = [];

  for (const pattern of [INLINE_PATTERN, GROOVY_MAP_PATTERN, KOTLIN_MAP_PATTERN]) {
    for (const match of content.matchAll(pattern)) {
      const [, configuration, group, artifact, rawVersion] = match;
      const version = resolveGradleVersion(rawVersion, bindings);
      if (!version) continue;

      coordinates.push({
        group,
        artifact,
        version,
        scope: gradleScope(configuration),
        source,
      });
    }
  }

  if (catalogs.length > 0) {
    for (const match of content.matchAll(CATALOG_PATTERN)) {
      const [, configuration, accessor, reference] = match;
      for (const library of resolveCatalogReference(catalogs, accessor, reference)) {
        coordinates.push({ ...library, scope: gradleScope(configuration), source });
      }
    }
  }

  return coordinates;
}

/**
 * `gradle.lockfile` and `dependency-locks/*.lockfile` entries: `group:artifact:version=configurations`
 */
export function extractLockfileCoordinates(content: string, source: string): DependencyCoordinate[] {
  const coordinates: DependencyCoordinate[] = [];

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    // `g:a:v=configurations`, or a bare `g:a:v` in the older per-configuration files
    const separator = line.indexOf('=');
    const parts = (separator === -1 ? line : line.slice(0, separator)).split(':');
    if (parts.length < 3) continue;

    const [group, artifact, version] = parts;
    if (!group || !artifact || !version) continue;
    coordinates.push({ group, artifact, version, scope: 'lockfile', source });
  }

  return coordinates;
}
