import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterAll, afterEach, beforeAll, describe, expect, it, jest } from '@jest/globals';
import { FileDiscoveryService } from '../../src/graph/builder/file-discovery-service';

async function writeFixture(root: string, relativePath: string, content = ''): Promise<void> {
  const target = path.join(root, relativePath);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content);
}

describe('FileDiscoveryService', () => {
  const service = new FileDiscoveryService();
  let root: string;

  beforeAll(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'discovery-'));
    await writeFixture(root, 'pom.xml', '<project/>');
    await writeFixture(root, 'module/build.gradle');
    await writeFixture(root, 'src/main/java/com/acme/util/Strings.java', 'class Strings {}');
    await writeFixture(root, 'src/main/java/com/acme/App.java', 'class App {}');
    await writeFixture(root, 'src/main/java/com/acme/Zeta.java', 'class Zeta {}');
    await writeFixture(root, 'target/generated/Gen.java', 'class Gen {}');
    await writeFixture(root, 'node_modules/pkg/Y.java', 'class Y {}');
    await writeFixture(root, '.hidden/Secret.java', 'class Secret {}');
    await writeFixture(root, 'README.md', '# readme');
    await fs.symlink(path.join(root, 'missing.java'), path.join(root, 'Dangling.java'));
  });

  afterAll(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('lists Java sources sorted by relative path', async () => {
    const { sources } = await service.discoverFiles(root);

    expect(sources.map(file => file.relativePath)).toEqual([
      'src/main/java/com/acme/App.java',
      'src/main/java/com/acme/Zeta.java',
      'src/main/java/com/acme/util/Strings.java',
    ]);
    expect(sources[0].path).toBe(path.join(root, 'src/main/java/com/acme/App.java'));
  });

  it('lists build manifests separately', async () => {
    const { manifests } = await service.discoverFiles(root);

    expect(manifests.map(file => file.relativePath)).toEqual(['module/build.gradle', 'pom.xml']);
  });

  it('skips build output, dependencies and hidden directories', () => {
    expect(service.shouldSkipDirectory('target')).toBe(true);
    expect(service.shouldSkipDirectory('node_modules')).toBe(true);
    expect(service.shouldSkipDirectory('.idea')).toBe(true);
    expect(service.shouldSkipDirectory('src')).toBe(false);
  });

  it('recognizes Java sources by extension', () => {
    expect(service.isSourceFile('A.java')).toBe(true);
    expect(service.isSourceFile('A.kt')).toBe(false);
  });

  describe('with symlinked or unreadable directories', () => {
    let tree: string;

    beforeAll(async () => {
      tree = await fs.mkdtemp(path.join(os.tmpdir(), 'discovery-links-'));
    });

    afterEach(() => {
      jest.restoreAllMocks();
    });

    afterAll(async () => {
      await fs.rm(tree, { recursive: true, force: true });
    });

    it('walks a directory reached through a symlink cycle once', async () => {
      const root = path.join(tree, 'cycle');
      await writeFixture(root, 'src/A.java', 'class A {}');
      await fs.symlink(path.join(root, 'src'), path.join(root, 'src/loop'));

      const { sources } = await service.discoverFiles(root);

      expect(sources.map(file => file.relativePath)).toEqual(['src/A.java']);
    });

    it('skips a directory it cannot read and keeps the rest', async () => {
      const root = path.join(tree, 'unreadable');
      await writeFixture(root, 'A.java', 'class A {}');
      await writeFixture(root, 'locked/Hidden.java', 'class Hidden {}');
      const denied = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
      const readdir = fs.readdir;
      jest.spyOn(fs, 'readdir').mockImplementationOnce(readdir).mockRejectedValueOnce(denied);

      const { sources } = await service.discoverFiles(root);

      expect(sources.map(file => file.relativePath)).toEqual(['A.java']);
    });
  });
});
