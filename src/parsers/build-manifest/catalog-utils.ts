import path from 'path';
import { parse as parseToml } from '@iarna/toml';
import { z } from 'zod';
import { DependencyCoordinate } from './types';

const RichVersionSchema = z.object({
  ref: z.string().optional(),
  strictly: z.string().optional(),
  require: z.string().optional(),
  prefer: z.string().optional(),
});

const VersionSchema = z.union([z.string(), RichVersionSchema]);

const LibrarySchema = z.union([
  z.string(),
  z.object({
    module: z.string().optional(),
    group: z.string().optional(),
    name: z.string().optional(),
    version: VersionSchema.optional(),
  }),
]);

const CatalogSchema = z.object({
  versions: z.record(z.unknown()).default({}),
  libraries: z.record(z.unknown()).default({}),
  bundles: z.record(z.unknown()).default({}),
});

type CatalogVersion = z.infer<typeof VersionSchema>;

export interface CatalogLibrary {
  group: string;
  artifact: string;
  version: string;
}

/**
 * A Gradle version catalog (`gradle/libs.versions.toml`) keyed the way build
 * scripts reach it: `libs.spring.boot.starter` for the alias `spring-boot-starter`
 */
export interface VersionCatalog {
  accessor: string;
  source: string;
  libraries: Map<string, CatalogLibrary>;
  bundles: Map<string, string[]>;
}

export function catalogAccessor(catalogPath: string): string {
  const fileName = path.posix.basename(catalogPath.replace(/\\/g, '/'));
  if (fileName.endsWith('.versions.toml')) return fileName.slice(0, -'.versions.toml'.length);
  return fileName.replace(/\.toml$/, '');
}

export function normalizeCatalogAlias(alias: string): string {
  return alias.replace(/[-_]/g, '.');
}

function richVersion(version: CatalogVersion, versions: ReadonlyMap<string, string>): string | undefined {
  if (typeof version === 'string') return version;
  if (version.ref !== undefined) return versions.get(version.ref);
  return version.strictly ?? version.require ?? version.prefer;
}

function toLibrary(
  value: unknown,
  versions: ReadonlyMap<string, string>
): CatalogLibrary | undefined {
  const parsed = LibrarySchema.safeParse(value);
  if (!parsed.success) return undefined;
  const library = parsed.data;

  // "group:artifact:version" shorthand
  if (typeof library === 'string') {
    const [group, artifact, version] = library.split(':');
    return group && artifact && version ? { group, artifact, version } : undefined;
  }

  const [moduleGroup, moduleName] = library.module?.split(':') ?? [];
  const group = library.group ?? moduleGroup;
  const artifact = library.name ?? moduleName;
  const version = library.version === undefined ? undefined : richVersion(library.version, versions);

  return group && artifact && version ? { group, artifact, version } : undefined;
}

/**
 * Parse a version catalog. Libraries whose version cannot be resolved (a
 * `version.ref` to an undeclared version, no version at all) are left out.
 * Throws on invalid TOML.
 */
export function parseVersionCatalog(content: string, source: string): VersionCatalog {
  const catalog = CatalogSchema.parse(parseToml(content));

  const versions = new Map<string, string>();
  for (const [name, value] of Object.entries(catalog.versions)) {
    const parsed = VersionSchema.safeParse(value);
    const version = parsed.success ? richVersion(parsed.data, versions) : undefined;
    if (version !== undefined) versions.set(name, version);
  }

  const libraries = new Map<string, CatalogLibrary>();
  for (const [alias, value] of Object.entries(catalog.libraries)) {
    const library = toLibrary(value, versions);
    if (library) libraries.set(normalizeCatalogAlias(alias), library);
  }

  const bundles = new Map<string, string[]>();
  for (const [alias, value] of Object.entries(catalog.bundles)) {
    const members = z.array(z.string()).safeParse(value);
    if (members.success) {
      bundles.set(normalizeCatalogAlias(alias), members.data.map(normalizeCatalogAlias));
    }
  }

  return { accessor: catalogAccessor(source), source, libraries, bundles };
}

/**
 * Every resolvable library of a catalog, declared or not
 */
export function catalogCoordinates(catalog: VersionCatalog): DependencyCoordinate[] {
  return [...catalog.libraries.values()].map(library => ({
    ...library,
    scope: 'catalog',
    source: catalog.source,
  }));
}

/**
 * Libraries reached by `libs.<alias>` or `libs.bundles.<alias>`. The first
 * catalog with the accessor and alias wins.
 */
export function resolveCatalogReference(
  catalogs: readonly VersionCatalog[],
  accessor: string,
  reference: string
): CatalogLibrary[] {
  const alias = normalizeCatalogAlias(reference.replace(/\.get$/, ''));
  const bundleAlias = alias.startsWith('bundles.') ? alias.slice('bundles.'.length) : undefined;

  for (const catalog of catalogs) {
    if (catalog.accessor !== accessor) continue;

    if (bundleAlias !== undefined) {
      const members = catalog.bundles.get(bundleAlias);
      if (!members) continue;
      return members.flatMap(member => {
        const library = catalog.libraries.get(member);
        return library ? [library] : [];
      });
    }

    const library = catalog.libraries.get(alias);
    if (library) return [library];
  }

  return [];
}
