import path from 'path';
import { ScanError } from '../common/errors';
import { isSameOrInside } from '../common/path';
import type { DirectoryEntry, FileSystem } from '../types/fileSystem';
import { createLogger } from '../utils/logger';

const logger = createLogger('cleanup');

export interface CleanupPassResult {
  removed: string[];
  warnings: ScanError[];
}

/**
 * Removes directories that are empty once their own empty children are
 * gone, bottom-up. Returns whether `dirPath` itself was removed.
 */
const pruneDirectory = async (
  dirPath: string,
  canonicalRoot: string,
  fileSystem: FileSystem,
  result: CleanupPassResult,
): Promise<boolean> => {
  let entries: DirectoryEntry[];
  try {
    entries = await fileSystem.listEntries(dirPath);
  } catch (error: unknown) {
    const warning = new ScanError(dirPath, error);
    result.warnings.push(warning);
    logger.warn(warning.message);
    return false;
  }

  let remaining = entries.length;
  for (const entry of entries) {
    if (entry.kind === 'directory') {
      // eslint-disable-next-line no-await-in-loop
      const removed = await pruneDirectory(
        path.join(dirPath, entry.name),
        canonicalRoot,
        fileSystem,
        result,
      );
      if (removed) {
        remaining -= 1;
      }
    }
  }

  if (remaining > 0 || dirPath === canonicalRoot) {
    return false;
  }

  try {
    await fileSystem.removeEmptyDir(dirPath);
    result.removed.push(dirPath);
    logger.info(`Removed empty directory ${dirPath}`);
    return true;
  } catch (error: unknown) {
    const warning = new ScanError(dirPath, error);
    result.warnings.push(warning);
    logger.warn(`Could not remove ${dirPath}: ${warning.message}`);
    return false;
  }
};

/**
 * Prunes empty directories under every scanned root. Source roots are
 * removed too once nothing is left in them; the canonical root never is.
 */
export const pruneEmptyDirectories = async (
  roots: readonly string[],
  canonicalRoot: string,
  fileSystem: FileSystem,
): Promise<CleanupPassResult> => {
  const result: CleanupPassResult = { removed: [], warnings: [] };
  const canonical = path.resolve(canonicalRoot);
  const resolved = Array.from(new Set(roots.map((root) => path.resolve(root))));
  // A root nested in another one is pruned as part of the outer walk.
  const outermost = resolved.filter(
    (root) => !resolved.some((other) => other !== root && isSameOrInside(other, root)),
  );
  for (const root of outermost) {
    // eslint-disable-next-line no-await-in-loop
    await pruneDirectory(root, canonical, fileSystem, result);
  }
  return result;
};
