import path from 'path';
import { createComponentLogger } from '../utils/logger';
import {
  DependencyCoordinate,
  ManifestExtractionResult,
  ManifestFile,
  ManifestKind,
  ManifestParseError,
} from './build-manifest/types';
import {
  collectManagedVersions,
  extractMavenCoordinates,
  extractPomProperties,
  parsePom,
  PomProject,
} from './build-manifest/maven-utils';
import { extractGradleCoordinates, extractLockfileCoordinates } from './build-manifest/gradle-utils';
import {
  catalogCoordinates,
  parseVersionCatalog,
  VersionCatalog,
} from './build-manifest/catalog-utils';
import { deduplicateCoordinates } from './build-manifest/coordinate-catalog';

const logger = createComponentLogger('build-manifest-parser');

const KIND_ORDER: ManifestKind[] = [
  ManifestKind.MAVEN,
  ManifestKind.GRADLE,
  ManifestKind.GRADLE_CATALOG,
  ManifestKind.GRADLE_LOCKFILE,
];

export function detectManifestKind(filePath: string): ManifestKind | null {
  const normalized = filePath.replace(/\\/g, '/');
  const fileName = path.posix.basename(normalized);
  const parentName = path.posix.basename(path.posix.dirname(normalized));

  if (fileName === 'pom.xml') return ManifestKind.MAVEN;
  if (fileName === 'build.gradle' || fileName === 'build.gradle.kts') return ManifestKind.GRADLE;
  if (parentName === 'gradle' && fileName.endsWith('.toml')) return ManifestKind.GRADLE_CATALOG;
  if (fileName === 'gradle.lockfile') return ManifestKind.GRADLE_LOCKFILE;
  if (parentName === 'dependency-locks' && fileName.endsWith('.lockfile')) {
    return ManifestKind.GRADLE_LOCKFILE;
  }
  return null;
}

/**
 * Extracts dependency coordinates from pom.xml, Gradle build scripts, version
 * catalogs and lockfiles.
 *
 * Manifests are processed Maven first, then Gradle scripts, then catalogs, then
 * lockfiles, each group in path order. Catalogs are read before the scripts so
 * `libs.<alias>` references resolve. Duplicates collapse by `group:artifact` keeping the highest scope,
 * and the first coordinate wins a tie, so the outcome does not depend on the
 * order in which files were found.
 */
export class BuildManifestParser {
  parseManifests(files: readonly ManifestFile[]): ManifestExtractionResult {
    const errors: ManifestParseError[] = [];
    const ordered = this.orderManifests(files);

    const poms: Array<{ file: ManifestFile; project: PomProject }> = [];
    for (const file of ordered.get(ManifestKind.MAVEN) ?? []) {
      try {
        poms.push({ file, project: parsePom(file.content) });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn('Skipping unreadable pom', { filePath: file.path, error: message });
        errors.push({ filePath: file.path, message });
      }
    }

    const globalManaged = new Map<string, string>();
    for (const { project } of poms) {
      const managed = collectManagedVersions(project, extractPomProperties(project));
      for (const [key, version] of managed) {
        if (!globalManaged.has(key)) globalManaged.set(key, version);
      }
    }

    const catalogs: VersionCatalog[] = [];
    for (const file of ordered.get(ManifestKind.GRADLE_CATALOG) ?? []) {
      try {
        catalogs.push(parseVersionCatalog(file.content, file.path));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn('Skipping unreadable version catalog', { filePath: file.path, error: message });
        errors.push({ filePath: file.path, message });
      }
    }

    const collected: DependencyCoordinate[] = [];
    for (const { file, project } of poms) {
      collected.push(...extractMavenCoordinates(project, file.path, globalManaged));
    }
    for (const file of ordered.get(ManifestKind.GRADLE) ?? []) {
      collected.push(...extractGradleCoordinates(file.content, file.path, catalogs));
    }
    for (const catalog of catalogs) {
      collected.push(...catalogCoordinates(catalog));
    }
    for (const file of ordered.get(ManifestKind.GRADLE_LOCKFILE) ?? []) {
      collected.push(...extractLockfileCoordinates(file.content, file.path));
    }

    const coordinates = deduplicateCoordinates(collected);

    logger.info('Dependency coordinates extracted', {
      manifests: files.length,
      declared: collected.length,
      unique: coordinates.length,
      failed: errors.length,
    });

    return { coordinates, errors };
  }

  private orderManifests(files: readonly ManifestFile[]): Map<ManifestKind, ManifestFile[]> {
    const grouped = new Map<ManifestKind, ManifestFile[]>();
    for (const kind of KIND_ORDER) grouped.set(kind, []);

    for (const file of files) {
      const kind = detectManifestKind(file.path);
      if (kind) grouped.get(kind)?.push(file);
    }

    for (const list of grouped.values()) {
      list.sort((a, b) => a.path.localeCompare(b.path));
    }

    return grouped;
  }
}
