import type { DependencyLink } from '../../database/models';
import type { DependencyMap } from '../../parsers/build-manifest/types';
import { FileRecord, ImportType } from '../../parsers/java/types';
import { createComponentLogger } from '../../utils/logger';

const logger = createComponentLogger('dependency-linker');

const MAX_BASE_SEGMENTS = 5;

/**
 * Import packages whose Maven coordinates do not follow from the package name
 */
const PACKAGE_ALIASES: ReadonlyArray<readonly [string, string, string]> = [
  ['org.apache.kafka.clients', 'org.apache.kafka', 'kafka-clients'],
  ['org.apache.kafka.common', 'org.apache.kafka', 'kafka-clients'],
  ['org.slf4j', 'org.slf4j', 'slf4j-api'],
  ['org.springframework.boot.autoconfigure', 'org.springframework.boot', 'spring-boot-autoconfigure'],
  ['org.springframework.boot', 'org.springframework.boot', 'spring-boot'],
  ['org.springframework.context', 'org.springframework', 'spring-context'],
  ['org.springframework.beans', 'org.springframework', 'spring-beans'],
  ['org.springframework.stereotype', 'org.springframework', 'spring-context'],
  ['org.springframework.kafka', 'org.springframework.kafka', 'spring-kafka'],
  ['com.fasterxml.jackson.core', 'com.fasterxml.jackson.core', 'jackson-core'],
  ['com.fasterxml.jackson.databind', 'com.fasterxml.jackson.core', 'jackson-databind'],
];

interface ResolvedCoordinate {
  group?: string;
  artifact?: string;
  version?: string;
}

function isPrefixCompatible(a: string, b: string): boolean {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  return left.startsWith(right) || right.startsWith(left);
}

/**
 * Dotted keys without a colon: the group-level entries of a dependency map
 */
export function groupKeys(dependencyMap: DependencyMap): string[] {
  return Object.keys(dependencyMap).filter(key => !key.includes(':') && key.includes('.'));
}

/**
 * Base package of an import path. Trailing capitalized segments (class names) are
 * trimmed; a candidate that is, or shares a prefix with, a known group wins,
 * otherwise the first three segments (or two) are used.
 */
export function basePackage(importPath: string, knownGroups: readonly string[]): string {
  const parts = importPath.replace(/\.\*$/, '').split('.');

  for (let size = Math.min(parts.length, MAX_BASE_SEGMENTS); size > 1; size--) {
    const segments = parts.slice(0, size);
    while (segments.length >= 2 && /^[A-Z]/.test(segments[segments.length - 1])) {
      segments.pop();
    }
    if (segments.length < 2) continue;

    const candidate = segments.join('.');
    if (knownGroups.includes(candidate)) return candidate;
    if (knownGroups.some(group => isPrefixCompatible(group, candidate))) return candidate;
  }

  return parts.slice(0, parts.length >= 3 ? 3 : 2).join('.');
}

function versionOfArtifact(
  dependencyMap: DependencyMap,
  group: string,
  artifact: string
): string | undefined {
  const prefix = `${group}:${artifact}:`;
  const full = Object.keys(dependencyMap).find(key => key.startsWith(prefix));
  if (full !== undefined) return dependencyMap[full];
  const twoPart = `${group}:${artifact}`;
  return Object.hasOwn(dependencyMap, twoPart) ? dependencyMap[twoPart] : undefined;
}

/**
 * Most specific coordinate for a base package: full `g:a:v` keys beat `g:a`,
 * which beat group keys (exact, then longest compatible prefix). A package whose
 * top-level segment is an artifact name (`lombok`, `junit`) falls back to that
 * artifact's version.
 */
export function resolveCoordinate(
  packageName: string,
  dependencyMap: DependencyMap
): ResolvedCoordinate {
  const resolved: ResolvedCoordinate = {};
  const keys = Object.keys(dependencyMap);

  if (Object.hasOwn(dependencyMap, packageName)) {
    resolved.version = dependencyMap[packageName];
  } else {
    let longest = '';
    for (const key of groupKeys(dependencyMap)) {
      if (isPrefixCompatible(packageName, key) && key.length > longest.length) {
        longest = key;
      }
    }
    if (longest) resolved.version = dependencyMap[longest];
  }

  const lastSegment = packageName.split('.').pop()?.toLowerCase() ?? '';
  let bestScore = -1;
  for (const key of keys) {
    const parts = key.split(':');
    if (parts.length !== 3) continue;
    const [group, artifact] = parts;
    if (!isPrefixCompatible(packageName, group)) continue;

    const score = group.length + (lastSegment && artifact.toLowerCase().includes(lastSegment) ? 10 : 0);
    if (score > bestScore) {
      bestScore = score;
      resolved.group = group;
      resolved.artifact = artifact;
      resolved.version = dependencyMap[key];
    }
  }

  if (resolved.group === undefined) {
    const alias = PACKAGE_ALIASES.find(([prefix]) => packageName.startsWith(prefix));
    if (alias) {
      const [, group, artifact] = alias;
      resolved.group = group;
      resolved.artifact = artifact;
      resolved.version = versionOfArtifact(dependencyMap, group, artifact) ?? resolved.version;
    }
  }

  const [topLevel] = packageName.split('.');
  if (resolved.version === undefined && topLevel && Object.hasOwn(dependencyMap, topLevel)) {
    resolved.version = dependencyMap[topLevel];
  }

  return resolved;
}

/**
 * One DEPENDS_ON link per distinct external import
 */
export function linkExternalImports(
  files: readonly FileRecord[],
  dependencyMap: DependencyMap
): DependencyLink[] {
  const knownGroups = groupKeys(dependencyMap);
  const resolvedByPackage = new Map<string, ResolvedCoordinate>();
  const links = new Map<string, DependencyLink>();

  for (const file of files) {
    for (const record of file.imports) {
      if (record.import_type !== ImportType.EXTERNAL) continue;
      if (!record.import_path.includes('.') || links.has(record.import_path)) continue;

      const packageName = basePackage(record.import_path, knownGroups);
      let coordinate = resolvedByPackage.get(packageName);
      if (!coordinate) {
        coordinate = resolveCoordinate(packageName, dependencyMap);
        resolvedByPackage.set(packageName, coordinate);
      }

      links.set(record.import_path, {
        import_path: record.import_path,
        package: packageName,
        ...coordinate,
      });
    }
  }

  const unversioned = [...resolvedByPackage.entries()]
    .filter(([, coordinate]) => coordinate.version === undefined)
    .map(([packageName]) => packageName);
  if (unversioned.length > 0) {
    logger.warn('External packages without a resolved version', {
      count: unversioned.length,
      sample: unversioned.slice(0, 5),
    });
  }

  return [...links.values()];
}
