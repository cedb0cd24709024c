import path from 'path';
import mime from 'mime-types';
import { ScanError } from '../common/errors';
import { comparePaths, isSameOrInside } from '../common/path';
import type { FileRecord, RootKind } from '../types/cleanup';
import type { DirectoryEntry, EntryStats, FileSystem } from '../types/fileSystem';
import { createLogger } from '../utils/logger';

const logger = createLogger('scanner');

export interface ScanRoot {
  path: string;
  kind: RootKind;
}

export interface ScanResult {
  roots: ScanRoot[];
  records: FileRecord[];
  warnings: ScanError[];
  /** Roots that could be listed at all */
  readableRoots: string[];
  /** Directories, links and special files; their names are taken too. */
  otherEntries: string[];
}

interface WalkOptions {
  root: ScanRoot;
  /** Other roots nested inside this one; they are walked on their own. */
  skip: Set<string>;
  /**
   * Shared across concurrent subtree walks; only ever appended to.
   */
  accumulator: FileRecord[];
  otherEntries: string[];
  warnings: ScanError[];
  fileSystem: FileSystem;
}

const buildFileRecord = (filePath: string, root: ScanRoot, stats: EntryStats): FileRecord => ({
  path: filePath,
  name: path.basename(filePath),
  dir: path.dirname(filePath),
  root: root.path,
  rootKind: root.kind,
  size: stats.size,
  mtimeMs: stats.mtimeMs,
  mode: stats.mode,
  mimeType: mime.lookup(filePath) || null,
});

const warn = (options: WalkOptions, targetPath: string, error: unknown) => {
  const warning = new ScanError(targetPath, error);
  options.warnings.push(warning);
  logger.warn(warning.message);
};

const walkDirectory = async (currentPath: string, options: WalkOptions): Promise<boolean> => {
  let entries: DirectoryEntry[];
  try {
    entries = await options.fileSystem.listEntries(currentPath);
  } catch (error: unknown) {
    warn(options, currentPath, error);
    return false;
  }

  await Promise.all(
    entries.map(async (entry) => {
      const entryPath = path.join(currentPath, entry.name);
      if (entry.kind !== 'file') {
        options.otherEntries.push(entryPath);
      }

      // Links are never followed, which also keeps the walk free of cycles.
      if (entry.kind === 'symlink' || entry.kind === 'other') {
        return;
      }

      if (entry.kind === 'directory') {
        if (!options.skip.has(entryPath)) {
          await walkDirectory(entryPath, options);
        }
        return;
      }

      try {
        const stats = await options.fileSystem.stat(entryPath);
        if (stats.kind === 'file') {
          options.accumulator.push(buildFileRecord(entryPath, options.root, stats));
        } else {
          options.otherEntries.push(entryPath);
        }
      } catch (error: unknown) {
        warn(options, entryPath, error);
      }
    }),
  );
  return true;
};

/**
 * Resolves the root list: the first entry is canonical, the rest are
 * sources. Repeated roots collapse onto their first occurrence.
 */
export const resolveRoots = (rootPaths: readonly string[]): ScanRoot[] => {
  const seen = new Set<string>();
  const roots: ScanRoot[] = [];
  rootPaths.forEach((rootPath, index) => {
    const absolute = path.resolve(rootPath);
    if (seen.has(absolute)) {
      return;
    }
    seen.add(absolute);
    roots.push({ path: absolute, kind: index === 0 ? 'canonical' : 'source' });
  });
  return roots;
};

export const scanRoots = async (
  rootPaths: readonly string[],
  fileSystem: FileSystem,
): Promise<ScanResult> => {
  const roots = resolveRoots(rootPaths);
  const records: FileRecord[] = [];
  const warnings: ScanError[] = [];
  const readableRoots: string[] = [];
  const otherEntries: string[] = [];

  await Promise.all(
    roots.map(async (root) => {
      const skip = new Set(
        roots
          .filter((other) => other.path !== root.path && isSameOrInside(root.path, other.path))
          .map((other) => other.path),
      );
      const readable = await walkDirectory(root.path, {
        root,
        skip,
        accumulator: records,
        otherEntries,
        warnings,
        fileSystem,
      });
      if (readable) {
        readableRoots.push(root.path);
      }
    }),
  );

  records.sort((a, b) => comparePaths(a.path, b.path));
  readableRoots.sort(comparePaths);
  otherEntries.sort(comparePaths);
  logger.info(`Scanned ${roots.length} root(s), found ${records.length} file(s)`);

  return { roots, records, warnings, readableRoots, otherEntries };
};
