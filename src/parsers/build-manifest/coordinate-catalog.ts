import { DependencyCoordinate, DependencyMap, SCOPE_PRIORITY } from './types';

function scopePriority(scope: string): number {
  return SCOPE_PRIORITY[scope] ?? 0;
}

/**
 * One coordinate per `group:artifact`. A later coordinate replaces an earlier one
 * only with a strictly higher scope priority, so ties keep the first seen.
 */
export function deduplicateCoordinates(
  coordinates: readonly DependencyCoordinate[]
): DependencyCoordinate[] {
  const byKey = new Map<string, DependencyCoordinate>();

  for (const coordinate of coordinates) {
    const key = `${coordinate.group}:${coordinate.artifact}`;
    const existing = byKey.get(key);
    if (!existing || scopePriority(coordinate.scope) > scopePriority(existing.scope)) {
      byKey.set(key, coordinate);
    }
  }

  return [...byKey.values()];
}

/**
 * Flat lookup keys per coordinate. The bare group and the bare artifact go to
 * the first coordinate that claims them; an artifact with a dot is left out
 * so it cannot pass for a group.
 */
export function buildDependencyMap(coordinates: readonly DependencyCoordinate[]): DependencyMap {
  const map: DependencyMap = {};
  const coarseAssigned = new Set<string>();

  const assignOnce = (key: string, version: string): void => {
    if (coarseAssigned.has(key)) return;
    coarseAssigned.add(key);
    map[key] = version;
  };

  for (const { group, artifact, version } of coordinates) {
    map[`${group}:${artifact}:${version}`] = version;
    map[`${group}:${artifact}`] = version;
    map[`${group}.${artifact}`] = version;
    assignOnce(group, version);
    if (!artifact.includes('.')) assignOnce(artifact, version);
  }

  return map;
}
