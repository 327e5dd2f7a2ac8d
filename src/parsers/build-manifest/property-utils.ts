import { MAX_INTERPOLATION_HOPS } from './types';

const MAVEN_PLACEHOLDER = /\$\{([^}]+)\}/g;
const GRADLE_PLACEHOLDER = /\$\{(\w+)\}|\$(\w+)/g;

function substitute(
  value: string,
  pattern: RegExp,
  lookup: (name: string) => string | undefined
): string | undefined {
  let result = '';
  let lastIndex = 0;

  for (const match of value.matchAll(pattern)) {
    const name: string | undefined = match[1] ?? match[2];
    const replacement = name ? lookup(name) : undefined;
    if (replacement === undefined) return undefined;

    const start = match.index ?? 0;
    result += value.slice(lastIndex, start) + replacement;
    lastIndex = start + match[0].length;
  }

  return result + value.slice(lastIndex);
}

function interpolate(
  value: string,
  pattern: RegExp,
  lookup: (name: string) => string | undefined
): string | undefined {
  let current: string | undefined = value;

  for (let hop = 0; hop < MAX_INTERPOLATION_HOPS && current !== undefined; hop++) {
    if (!current.includes('$')) return current;
    current = substitute(current, pattern, lookup);
  }

  return current === undefined || current.includes('$') ? undefined : current;
}

/**
 * Resolve `${prop}` references against a pom's properties. Undefined when any
 * reference stays unresolved.
 */
export function resolveMavenVersion(
  version: string | undefined,
  properties: ReadonlyMap<string, string>
): string | undefined {
  if (!version) return undefined;
  return interpolate(version.trim(), MAVEN_PLACEHOLDER, name => properties.get(name.trim()));
}

/**
 * Resolve `$name` and `${name}` placeholders through `*Version = "..."` bindings,
 * following chains such as `apiVersion = "$coreVersion"`.
 */
export function resolveGradleVersion(
  version: string,
  bindings: ReadonlyMap<string, string>
): string | undefined {
  return interpolate(version.trim(), GRADLE_PLACEHOLDER, name => bindings.get(name));
}

/**
 * `xVersion = "1.2.3"` style bindings. Only names containing "version" count.
 */
export function extractVersionBindings(content: string): Map<string, string> {
  const bindings = new Map<string, string>();
  const pattern = /(\w+)\s*=\s*['"]([^'"\n]+)['"]/g;

  for (const match of content.matchAll(pattern)) {
    const [, name, value] = match;
    if (name.toLowerCase().includes('version') && !bindings.has(name)) {
      bindings.set(name, value);
    }
  }

  return bindings;
}
