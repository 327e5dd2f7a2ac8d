import { describe, expect, it } from '@jest/globals';
import { BuildManifestParser, detectManifestKind } from '../../src/parsers/build-manifest';
import {
  buildDependencyMap,
  deduplicateCoordinates,
} from '../../src/parsers/build-manifest/coordinate-catalog';
import {
  extractGradleCoordinates,
  extractLockfileCoordinates,
  gradleScope,
} from '../../src/parsers/build-manifest/gradle-utils';
import { parseVersionCatalog } from '../../src/parsers/build-manifest/catalog-utils';
import {
  resolveGradleVersion,
  resolveMavenVersion,
} from '../../src/parsers/build-manifest/property-utils';
import { ManifestKind } from '../../src/parsers/build-manifest/types';

const POM = `<?xml version="1.0" encoding="UTF-8"?>
<project xmlns="http://maven.apache.org/POM/4.0.0">
  <groupId>com.acme</groupId>
  <artifactId>orders</artifactId>
  <version>1.0.0</version>
  <properties>
    <jackson.version>2.15.0</jackson.version>
  </properties>
  <dependencyManagement>
    <dependencies>
      <dependency>
        <groupId>org.slf4j</groupId>
        <artifactId>slf4j-api</artifactId>
        <version>2.0.9</version>
      </dependency>
    </dependencies>
  </dependencyManagement>
  <dependencies>
    <dependency>
      <groupId>com.fasterxml.jackson.core</groupId>
      <artifactId>jackson-core</artifactId>
      <version>\${jackson.version}</version>
    </dependency>
    <dependency>
      <groupId>org.slf4j</groupId>
      <artifactId>slf4j-api</artifactId>
    </dependency>
    <dependency>
      <groupId>junit</groupId>
      <artifactId>junit</artifactId>
      <version>4.13.2</version>
      <scope>test</scope>
    </dependency>
    <dependency>
      <groupId>org.unknown</groupId>
      <artifactId>mystery</artifactId>
      <version>\${missing.version}</version>
    </dependency>
  </dependencies>
</project>
`;

describe('BuildManifestParser', () => {
  const parser = new BuildManifestParser();

  describe('Maven', () => {
    it('resolves property versions and backfills managed ones', () => {
      const { coordinates, errors } = parser.parseManifests([{ path: 'pom.xml', content: POM }]);

      expect(errors).toEqual([]);
      expect(coordinates).toEqual([
        {
          group: 'org.slf4j',
          artifact: 'slf4j-api',
          version: '2.0.9',
          scope: 'compile',
          source: 'pom.xml',
        },
        {
          group: 'com.fasterxml.jackson.core',
          artifact: 'jackson-core',
          version: '2.15.0',
          scope: 'compile',
          source: 'pom.xml',
        },
        { group: 'junit', artifact: 'junit', version: '4.13.2', scope: 'test', source: 'pom.xml' },
      ]);
    });

    it('omits a dependency whose version property is undeclared', () => {
      const { coordinates } = parser.parseManifests([{ path: 'pom.xml', content: POM }]);
      const map = buildDependencyMap(coordinates);

      expect(coordinates.some(coordinate => coordinate.artifact === 'mystery')).toBe(false);
      expect(Object.keys(map).some(key => key.startsWith('org.unknown'))).toBe(false);
      expect(map['com.fasterxml.jackson.core']).toBe('2.15.0');
    });

    it('uses managed versions declared in another pom', () => {
      const parent = `<project>
  <dependencyManagement>
    <dependencies>
      <dependency>
        <groupId>com.google.guava</groupId>
        <artifactId>guava</artifactId>
        <version>32.1.3-jre</version>
      </dependency>
    </dependencies>
  </dependencyManagement>
</project>`;
      const child = `<project>
  <dependencies>
    <dependency>
      <groupId>com.google.guava</groupId>
      <artifactId>guava</artifactId>
    </dependency>
  </dependencies>
</project>`;

      const { coordinates } = parser.parseManifests([
        { path: 'service/pom.xml', content: child },
        { path: 'pom.xml', content: parent },
      ]);

      expect(coordinates).toEqual([
        {
          group: 'com.google.guava',
          artifact: 'guava',
          version: '32.1.3-jre',
          scope: 'compile',
          source: 'service/pom.xml',
        },
      ]);
    });

    it('records malformed poms as errors and keeps going', () => {
      const { coordinates, errors } = parser.parseManifests([
        { path: 'broken/pom.xml', content: '<project><dependencies></project>' },
        { path: 'build.gradle', content: "implementation 'org.slf4j:slf4j-api:2.0.9'" },
      ]);

      expect(errors).toHaveLength(1);
      expect(errors[0].filePath).toBe('broken/pom.xml');
      expect(coordinates.map(coordinate => coordinate.artifact)).toEqual(['slf4j-api']);
    });
  });

  describe('Gradle', () => {
    it('reads inline, map and Kotlin forms with variable versions', () => {
      const script = [
        "def kafkaVersion = '3.6.1'",
        'val coreVersion = "1.4.0"',
        'val apiVersion = "$coreVersion"',
        '',
        'dependencies {',
        '    implementation "org.apache.kafka:kafka-clients:$kafkaVersion"',
        '    implementation("com.acme:core:${coreVersion}")',
        "    runtimeOnly group: 'org.postgresql', name: 'postgresql', version: '42.7.1'",
        '    api(group = "com.acme", name = "api", version = "$apiVersion")',
        "    testImplementation 'org.junit.jupiter:junit-jupiter:5.10.1'",
        "    implementation 'com.acme:ghost:$undefinedVersion'",
        '}',
      ].join('\n');

      const coordinates = extractGradleCoordinates(script, 'build.gradle.kts');

      expect(coordinates.map(c => [c.group, c.artifact, c.version, c.scope])).toEqual([
        ['org.apache.kafka', 'kafka-clients', '3.6.1', 'compile'],
        ['com.acme', 'core', '1.4.0', 'compile'],
        ['org.junit.jupiter', 'junit-jupiter', '5.10.1', 'test'],
        ['org.postgresql', 'postgresql', '42.7.1', 'runtime'],
        ['com.acme', 'api', '1.4.0', 'compile'],
      ]);
    });

    it('reads lockfile entries', () => {
      const lockfile = [
        '# This is a Gradle generated file for dependency locking.',
        'com.google.guava:guava:32.1.3-jre=compileClasspath,runtimeClasspath',
        'org.slf4j:slf4j-api:2.0.9=runtimeClasspath',
        'empty=',
      ].join('\n');

      expect(extractLockfileCoordinates(lockfile, 'gradle.lockfile')).toEqual([
        {
          group: 'com.google.guava',
          artifact: 'guava',
          version: '32.1.3-jre',
          scope: 'lockfile',
          source: 'gradle.lockfile',
        },
        {
          group: 'org.slf4j',
          artifact: 'slf4j-api',
          version: '2.0.9',
          scope: 'lockfile',
          source: 'gradle.lockfile',
        },
      ]);
    });

    it('maps configurations to scopes', () => {
      expect(gradleScope('testImplementation')).toBe('test');
      expect(gradleScope('runtimeOnly')).toBe('runtime');
      expect(gradleScope('api')).toBe('compile');
    });
  });

  describe('version catalogs', () => {
    const CATALOG = [
      '[versions]',
      'spring = "6.1.2"',
      'jackson = { strictly = "2.15.2" }',
      '',
      '[libraries]',
      'spring-context = { module = "org.springframework:spring-context", version.ref = "spring" }',
      'jackson_databind = { group = "com.fasterxml.jackson.core", name = "jackson-databind", version.ref = "jackson" }',
      'guava = "com.google.guava:guava:32.1.3-jre"',
      'junit-jupiter = { module = "org.junit.jupiter:junit-jupiter", version = "5.10.1" }',
      'commons-lang = "org.apache.commons:commons-lang3:3.14.0"',
      'floating = { module = "com.acme:floating" }',
      'ghost = { module = "com.acme:ghost", version.ref = "missing" }',
      '',
      '[bundles]',
      'testing = ["junit-jupiter", "guava"]',
    ].join('\n');

    const SCRIPT = [
      'dependencies {',
      '    implementation(libs.spring.context)',
      '    implementation(libs.jackson.databind.get())',
      '    testImplementation(libs.bundles.testing)',
      '    runtimeOnly(libs.ghost)',
      '    implementation(project(":core"))',
      '}',
    ].join('\n');

    it('resolves version references and skips unversioned libraries', () => {
      const catalog = parseVersionCatalog(CATALOG, 'gradle/libs.versions.toml');

      expect(catalog.accessor).toBe('libs');
      expect([...catalog.libraries.keys()]).toEqual([
        'spring.context',
        'jackson.databind',
        'guava',
        'junit.jupiter',
        'commons.lang',
      ]);
      expect(catalog.libraries.get('jackson.databind')).toEqual({
        group: 'com.fasterxml.jackson.core',
        artifact: 'jackson-databind',
        version: '2.15.2',
      });
      expect(catalog.bundles.get('testing')).toEqual(['junit.jupiter', 'guava']);
    });

    it('resolves libs references in build scripts', () => {
      const catalog = parseVersionCatalog(CATALOG, 'gradle/libs.versions.toml');

      const coordinates = extractGradleCoordinates(SCRIPT, 'build.gradle.kts', [catalog]);

      expect(coordinates.map(c => [c.artifact, c.version, c.scope])).toEqual([
        ['spring-context', '6.1.2', 'compile'],
        ['jackson-databind', '2.15.2', 'compile'],
        ['junit-jupiter', '5.10.1', 'test'],
        ['guava', '32.1.3-jre', 'test'],
      ]);
    });

    it('merges scripts, catalogs and dependency locks', () => {
      const { coordinates, errors } = parser.parseManifests([
        { path: 'gradle/dependency-locks/compileClasspath.lockfile', content: 'org.slf4j:slf4j-api:2.0.9\n' },
        { path: 'build.gradle.kts', content: SCRIPT },
        { path: 'gradle/libs.versions.toml', content: CATALOG },
      ]);

      expect(errors).toEqual([]);
      expect(coordinates.map(c => [c.artifact, c.version, c.scope, c.source])).toEqual([
        ['spring-context', '6.1.2', 'compile', 'build.gradle.kts'],
        ['jackson-databind', '2.15.2', 'compile', 'build.gradle.kts'],
        ['junit-jupiter', '5.10.1', 'test', 'build.gradle.kts'],
        ['guava', '32.1.3-jre', 'test', 'build.gradle.kts'],
        ['commons-lang3', '3.14.0', 'catalog', 'gradle/libs.versions.toml'],
        ['slf4j-api', '2.0.9', 'lockfile', 'gradle/dependency-locks/compileClasspath.lockfile'],
      ]);
    });

    it('records an invalid catalog as an error', () => {
      const { coordinates, errors } = parser.parseManifests([
        { path: 'gradle/libs.versions.toml', content: 'libraries = [unclosed' },
      ]);

      expect(coordinates).toEqual([]);
      expect(errors.map(error => error.filePath)).toEqual(['gradle/libs.versions.toml']);
    });
  });

  describe('precedence', () => {
    it('keeps the higher scope across manifests', () => {
      const { coordinates } = parser.parseManifests([
        { path: 'gradle.lockfile', content: 'org.slf4j:slf4j-api:2.0.7=runtimeClasspath' },
        { path: 'build.gradle', content: "implementation 'org.slf4j:slf4j-api:2.0.9'" },
      ]);

      expect(coordinates).toEqual([
        {
          group: 'org.slf4j',
          artifact: 'slf4j-api',
          version: '2.0.9',
          scope: 'compile',
          source: 'build.gradle',
        },
      ]);
    });

    it('lets Maven win a scope tie whatever the input order', () => {
      const pom = `<project><dependencies><dependency>
        <groupId>org.slf4j</groupId><artifactId>slf4j-api</artifactId><version>1.7.36</version>
      </dependency></dependencies></project>`;

      const { coordinates } = parser.parseManifests([
        { path: 'build.gradle', content: "implementation 'org.slf4j:slf4j-api:2.0.9'" },
        { path: 'pom.xml', content: pom },
      ]);

      expect(coordinates.map(coordinate => [coordinate.version, coordinate.source])).toEqual([
        ['1.7.36', 'pom.xml'],
      ]);
    });
  });
});

describe('coordinate catalog', () => {
  it('deduplicates by group and artifact keeping the first on a tie', () => {
    const deduplicated = deduplicateCoordinates([
      { group: 'g', artifact: 'a', version: '1', scope: 'test', source: 'x' },
      { group: 'g', artifact: 'a', version: '2', scope: 'test', source: 'y' },
      { group: 'g', artifact: 'a', version: '3', scope: 'lockfile', source: 'z' },
    ]);

    expect(deduplicated).toEqual([
      { group: 'g', artifact: 'a', version: '1', scope: 'test', source: 'x' },
    ]);
  });

  it('emits every key granularity and gives the group key to the first coordinate', () => {
    const map = buildDependencyMap([
      { group: 'org.acme', artifact: 'core', version: '1.0', scope: 'compile', source: 'pom.xml' },
      { group: 'org.acme', artifact: 'extra', version: '2.0', scope: 'compile', source: 'pom.xml' },
    ]);

    expect(map).toEqual({
      'org.acme:core:1.0': '1.0',
      'org.acme:core': '1.0',
      'org.acme.core': '1.0',
      'org.acme': '1.0',
      core: '1.0',
      'org.acme:extra:2.0': '2.0',
      'org.acme:extra': '2.0',
      'org.acme.extra': '2.0',
      extra: '2.0',
    });
  });

  it('keeps the artifact key for the first coordinate and skips dotted artifacts', () => {
    const map = buildDependencyMap([
      { group: 'org.one', artifact: 'util', version: '1.0', scope: 'compile', source: 'pom.xml' },
      { group: 'org.two', artifact: 'util', version: '2.0', scope: 'compile', source: 'pom.xml' },
      {
        group: 'jakarta.annotation',
        artifact: 'jakarta.annotation-api',
        version: '2.1.1',
        scope: 'compile',
        source: 'pom.xml',
      },
    ]);

    expect(map.util).toBe('1.0');
    expect(Object.hasOwn(map, 'jakarta.annotation-api')).toBe(false);
  });
});

describe('version interpolation', () => {
  it('resolves nested Maven properties', () => {
    const properties = new Map([
      ['base', '2.15'],
      ['jackson.version', '${base}.0'],
    ]);

    expect(resolveMavenVersion('${jackson.version}', properties)).toBe('2.15.0');
    expect(resolveMavenVersion('${nope}', properties)).toBeUndefined();
    expect(resolveMavenVersion(undefined, properties)).toBeUndefined();
  });

  it('gives up on cyclic Gradle bindings', () => {
    const bindings = new Map([
      ['aVersion', '$bVersion'],
      ['bVersion', '$aVersion'],
    ]);

    expect(resolveGradleVersion('$aVersion', bindings)).toBeUndefined();
  });
});

describe('detectManifestKind', () => {
  it('recognizes manifest file names', () => {
    expect(detectManifestKind('module/pom.xml')).toBe(ManifestKind.MAVEN);
    expect(detectManifestKind('build.gradle.kts')).toBe(ManifestKind.GRADLE);
    expect(detectManifestKind('app/gradle.lockfile')).toBe(ManifestKind.GRADLE_LOCKFILE);
    expect(detectManifestKind('settings.gradle')).toBeNull();
  });

  it('recognizes version catalogs and per-configuration lockfiles by directory', () => {
    expect(detectManifestKind('gradle/libs.versions.toml')).toBe(ManifestKind.GRADLE_CATALOG);
    expect(detectManifestKind('gradle/dependency-locks/compileClasspath.lockfile')).toBe(
      ManifestKind.GRADLE_LOCKFILE
    );
    expect(detectManifestKind('config/app.toml')).toBeNull();
    expect(detectManifestKind('compileClasspath.lockfile')).toBeNull();
  });
});
