import { describe, expect, it } from '@jest/globals';
import {
  basePackage,
  groupKeys,
  linkExternalImports,
  resolveCoordinate,
} from '../../src/graph/builder/dependency-linker';
import { buildDependencyMap } from '../../src/parsers/build-manifest/coordinate-catalog';
import { ImportType } from '../../src/parsers/java/types';
import { makeFile, makeImport } from '../helpers/record-factory';

describe('dependency linker', () => {
  describe('basePackage', () => {
    it('prefers a known group', () => {
      expect(
        basePackage('com.fasterxml.jackson.core.JsonFactory', ['com.fasterxml.jackson.core'])
      ).toBe('com.fasterxml.jackson.core');
      expect(basePackage('org.slf4j.*', ['org.slf4j'])).toBe('org.slf4j');
    });

    it('accepts a candidate that shares a prefix with a known group', () => {
      expect(
        basePackage('org.springframework.context.ApplicationContext', ['org.springframework'])
      ).toBe('org.springframework.context');
    });

    it('falls back to the leading segments', () => {
      expect(basePackage('org.apache.commons.lang3.StringUtils', [])).toBe('org.apache.commons');
      expect(basePackage('org.slf4j.*', [])).toBe('org.slf4j');
    });
  });

  describe('resolveCoordinate', () => {
    it('takes group, artifact and version from the best full coordinate', () => {
      const map = buildDependencyMap([
        {
          group: 'org.springframework',
          artifact: 'spring-context',
          version: '6.1.2',
          scope: 'compile',
          source: 'pom.xml',
        },
      ]);

      expect(resolveCoordinate('org.springframework.context', map)).toEqual({
        group: 'org.springframework',
        artifact: 'spring-context',
        version: '6.1.2',
      });
    });

    it('falls back to known package aliases for the artifact', () => {
      const map = buildDependencyMap([
        {
          group: 'com.fasterxml.jackson.core',
          artifact: 'jackson-core',
          version: '2.15.0',
          scope: 'compile',
          source: 'pom.xml',
        },
        {
          group: 'com.fasterxml.jackson.core',
          artifact: 'jackson-databind',
          version: '2.15.2',
          scope: 'compile',
          source: 'pom.xml',
        },
      ]);

      expect(resolveCoordinate('com.fasterxml.jackson.databind', map)).toEqual({
        group: 'com.fasterxml.jackson.core',
        artifact: 'jackson-databind',
        version: '2.15.2',
      });
    });

    it('versions a package named after its artifact', () => {
      const map = buildDependencyMap([
        {
          group: 'org.projectlombok',
          artifact: 'lombok',
          version: '1.18.30',
          scope: 'compile',
          source: 'build.gradle',
        },
      ]);

      expect(resolveCoordinate('lombok.Data', map)).toEqual({ version: '1.18.30' });
    });

    it('leaves an unknown package unversioned', () => {
      expect(resolveCoordinate('org.unknown.lib', { 'org.slf4j': '2.0.9' })).toEqual({});
    });
  });

  it('lists dotted group-level keys', () => {
    expect(groupKeys({ 'g.h:a:1': '1', 'g.h:a': '1', 'g.h.a': '1', 'g.h': '1', junit: '4' })).toEqual(
      ['g.h.a', 'g.h']
    );
  });

  describe('linkExternalImports', () => {
    const files = [
      makeFile('A.java', {
        imports: [
          makeImport('java.util.List', ImportType.STANDARD),
          makeImport('com.acme.Thing', ImportType.INTERNAL),
          makeImport('com.fasterxml.jackson.core.JsonFactory', ImportType.EXTERNAL),
          makeImport('org.unknown.lib.Thing', ImportType.EXTERNAL),
          makeImport('Foo', ImportType.EXTERNAL),
        ],
      }),
      makeFile('B.java', {
        imports: [
          makeImport('com.fasterxml.jackson.core.JsonFactory', ImportType.EXTERNAL),
          makeImport('com.fasterxml.jackson.core.JsonParser', ImportType.EXTERNAL),
        ],
      }),
    ];

    it('links every distinct external import once with its resolved version', () => {
      const links = linkExternalImports(files, { 'com.fasterxml.jackson.core': '2.15.0' });

      expect(links).toEqual([
        {
          import_path: 'com.fasterxml.jackson.core.JsonFactory',
          package: 'com.fasterxml.jackson.core',
          group: 'com.fasterxml.jackson.core',
          artifact: 'jackson-core',
          version: '2.15.0',
        },
        { import_path: 'org.unknown.lib.Thing', package: 'org.unknown.lib' },
        {
          import_path: 'com.fasterxml.jackson.core.JsonParser',
          package: 'com.fasterxml.jackson.core',
          group: 'com.fasterxml.jackson.core',
          artifact: 'jackson-core',
          version: '2.15.0',
        },
      ]);
    });
  });
});
