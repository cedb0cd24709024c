import fs from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import path from 'path';
import { errorCode } from '../common/errors';
import type { EntryKind, EntryStats, FileSystem } from '../types/fileSystem';

const kindOf = (entry: Dirent | Stats): EntryKind => {
  if (entry.isSymbolicLink()) return 'symlink';
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  return 'other';
};

const moveAcrossDevices = async (fromPath: string, toPath: string) => {
  await fs.copyFile(fromPath, toPath, fs.constants.COPYFILE_EXCL);
  const stats = await fs.stat(fromPath);
  await fs.utimes(toPath, stats.atime, stats.mtime);
  await fs.chmod(toPath, stats.mode & 0o777);
  await fs.unlink(fromPath);
};

/** Filesystem capability backed by `fs/promises`. */
export const createNodeFileSystem = (): FileSystem => ({
  async listEntries(dirPath) {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .map((entry) => ({ name: entry.name, kind: kindOf(entry) }))
      .sort((a, b) => a.name.localeCompare(b.name));
  },

  async stat(targetPath): Promise<EntryStats> {
    const stats = await fs.lstat(targetPath);
    return {
      kind: kindOf(stats),
      size: stats.size,
      mtimeMs: stats.mtimeMs,
      mode: stats.mode & 0o777,
    };
  },

  async readBytes(filePath) {
    return fs.readFile(filePath);
  },

  async delete(filePath) {
    await fs.unlink(filePath);
  },

  async rename(fromPath, toPath) {
    await fs.rename(fromPath, toPath);
  },

  async setPermissions(filePath, mode) {
    await fs.chmod(filePath, mode);
  },

  async move(fromPath, toPath) {
    await fs.mkdir(path.dirname(toPath), { recursive: true });
    try {
      await fs.rename(fromPath, toPath);
    } catch (error: unknown) {
      if (errorCode(error) !== 'EXDEV') {
        throw error;
      }
      await moveAcrossDevices(fromPath, toPath);
    }
  },

  async removeEmptyDir(dirPath) {
    await fs.rmdir(dirPath);
  },
});
