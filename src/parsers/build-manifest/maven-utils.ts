import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import { resolveMavenVersion } from './property-utils';
import { DependencyCoordinate } from './types';

const optionalText = z.string().optional().catch(undefined);

const PomDependencySchema = z
  .object({
    groupId: optionalText,
    artifactId: optionalText,
    version: optionalText,
    scope: optionalText,
  })
  .passthrough();

const DependencyListSchema = z
  .object({ dependency: z.array(PomDependencySchema).catch([]) })
  .partial()
  .catch({});

const PomProjectSchema = z
  .object({
    groupId: optionalText,
    version: optionalText,
    parent: z.object({ groupId: optionalText, version: optionalText }).partial().catch({}),
    properties: z.record(z.unknown()).catch({}),
    dependencies: DependencyListSchema,
    dependencyManagement: z.object({ dependencies: DependencyListSchema }).partial().catch({}),
    profiles: z
      .object({
        profile: z
          .array(z.object({ dependencies: DependencyListSchema }).partial().passthrough())
          .catch([]),
      })
      .partial()
      .catch({}),
  })
  .partial()
  .passthrough();

const PomDocumentSchema = z.object({ project: PomProjectSchema });

export type PomDependency = z.infer<typeof PomDependencySchema>;
export type PomProject = z.infer<typeof PomProjectSchema>;

const pomParser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (name: string) => name === 'dependency' || name === 'profile',
});

/**
 * Parse pom.xml text into its project element. Throws on malformed XML or a
 * document without `<project>`.
 */
export function parsePom(content: string): PomProject {
  const validation = XMLValidator.validate(content);
  if (validation !== true) {
    throw new Error(`Malformed XML at line ${validation.err.line}: ${validation.err.msg}`);
  }

  const parsed = PomDocumentSchema.safeParse(pomParser.parse(content));
  if (!parsed.success) {
    throw new Error('Not a Maven POM: missing <project> element');
  }
  return parsed.data.project;
}

/**
 * Property table for `${...}` resolution: `<properties>` plus project version and groupId
 */
export function extractPomProperties(project: PomProject): Map<string, string> {
  const properties = new Map<string, string>();

  for (const [key, value] of Object.entries(project.properties ?? {})) {
    if (typeof value === 'string' && value.length > 0) {
      properties.set(key, value);
    }
  }

  const version = project.version ?? project.parent?.version;
  if (version) {
    properties.set('project.version', version);
    properties.set('version', version);
  }
  const groupId = project.groupId ?? project.parent?.groupId;
  if (groupId) {
    properties.set('project.groupId', groupId);
  }

  return properties;
}

export function getManagedDependencies(project: PomProject): PomDependency[] {
  return project.dependencyManagement?.dependencies?.dependency ?? [];
}

/**
 * Regular dependencies, including those declared inside profiles
 */
export function getDeclaredDependencies(project: PomProject): PomDependency[] {
  const declared = [...(project.dependencies?.dependency ?? [])];
  for (const profile of project.profiles?.profile ?? []) {
    declared.push(...(profile.dependencies?.dependency ?? []));
  }
  return declared;
}

export function coordinateKey(group: string, artifact: string): string {
  return `${group}:${artifact}`;
}

/**
 * Managed versions of one pom keyed by `group:artifact`
 */
export function collectManagedVersions(
  project: PomProject,
  properties: ReadonlyMap<string, string>
): Map<string, string> {
  const managed = new Map<string, string>();

  for (const dependency of getManagedDependencies(project)) {
    const group = resolveMavenVersion(dependency.groupId, properties);
    const artifact = resolveMavenVersion(dependency.artifactId, properties);
    const version = resolveMavenVersion(dependency.version, properties);
    if (group && artifact && version) {
      managed.set(coordinateKey(group, artifact), version);
    }
  }

  return managed;
}

/**
 * Coordinates of one pom. A dependency whose version stays unresolved is backfilled
 * from the managed versions, local first, then repository-wide; otherwise it is dropped.
 */
export function extractMavenCoordinates(
  project: PomProject,
  source: string,
  globalManaged: ReadonlyMap<string, string>
): DependencyCoordinate[] {
  const properties = extractPomProperties(project);
  const localManaged = collectManagedVersions(project, properties);
  const coordinates: DependencyCoordinate[] = [];

  for (const dependency of getManagedDependencies(project)) {
    const group = resolveMavenVersion(dependency.groupId, properties);
    const artifact = resolveMavenVersion(dependency.artifactId, properties);
    const version = resolveMavenVersion(dependency.version, properties);
    if (group && artifact && version) {
      coordinates.push({ group, artifact, version, scope: 'dependencyManagement', source });
    }
  }

  for (const dependency of getDeclaredDependencies(project)) {
    const group = resolveMavenVersion(dependency.groupId, properties);
    const artifact = resolveMavenVersion(dependency.artifactId, properties);
    if (!group || !artifact) continue;

    const key = coordinateKey(group, artifact);
    const version =
      resolveMavenVersion(dependency.version, properties) ??
      localManaged.get(key) ??
      globalManaged.get(key);
    if (!version) continue;

    coordinates.push({
      group,
      artifact,
      version,
      scope: dependency.scope ?? 'compile',
      source,
    });
  }

  return coordinates;
}
