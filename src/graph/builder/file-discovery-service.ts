import fs from 'fs/promises';
import path from 'path';
import { detectManifestKind } from '../../parsers/build-manifest';
import { createComponentLogger } from '../../utils/logger';
import { DiscoveredFile, DiscoveredRepository } from './types';

const logger = createComponentLogger('file-discovery-service');

const SKIP_DIRECTORIES = new Set(['node_modules', '.git', 'build', 'target', 'out', 'dist']);

/**
 * File Discovery Service
 * Walks a repository for Java sources and build manifests
 */
export class FileDiscoveryService {
  async discoverFiles(repositoryPath: string): Promise<DiscoveredRepository> {
    const root = path.resolve(repositoryPath);
    const sources: DiscoveredFile[] = [];
    const manifests: DiscoveredFile[] = [];

    const visitedDirectories = new Set<string>();

    const traverse = async (currentPath: string): Promise<void> => {
      try {
        const lstats = await fs.lstat(currentPath);
        let stats = lstats;

        if (lstats.isSymbolicLink()) {
          try {
            stats = await fs.stat(currentPath);
          } catch {
            logger.debug('Skipping broken symlink', { path: currentPath });
            return;
          }
        }

        if (stats.isDirectory()) {
          if (currentPath !== root && this.shouldSkipDirectory(path.basename(currentPath))) {
            return;
          }

          // A directory reached again through a symlink is walked once
          const realPath = await fs.realpath(currentPath);
          if (visitedDirectories.has(realPath)) {
            logger.debug('Skipping already visited directory', { path: currentPath, realPath });
            return;
          }
          visitedDirectories.add(realPath);

          const entries = await fs.readdir(currentPath);
          await Promise.all(entries.map(entry => traverse(path.join(currentPath, entry))));
          return;
        }

        if (!stats.isFile()) return;

        const relativePath = this.toPosix(path.relative(root, currentPath));
        if (this.isSourceFile(currentPath)) {
          sources.push({ path: currentPath, relativePath });
        } else if (detectManifestKind(relativePath)) {
          manifests.push({ path: currentPath, relativePath });
        }
      } catch (error) {
        logger.error('Error traversing path', {
          path: currentPath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    };

    await traverse(root);

    const byRelativePath = (a: DiscoveredFile, b: DiscoveredFile): number =>
      a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0;
    sources.sort(byRelativePath);
    manifests.sort(byRelativePath);

    logger.info('File discovery completed', {
      repositoryPath: root,
      sourceFiles: sources.length,
      manifests: manifests.length,
    });

    return { sources, manifests };
  }

  shouldSkipDirectory(dirName: string): boolean {
    return SKIP_DIRECTORIES.has(dirName) || dirName.startsWith('.');
  }

  isSourceFile(filePath: string): boolean {
    return path.extname(filePath) === '.java';
  }

  private toPosix(relativePath: string): string {
    return relativePath.split(path.sep).join('/');
  }
}
