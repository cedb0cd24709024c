export type EntryKind = 'file' | 'directory' | 'symlink' | 'other';

export interface DirectoryEntry {
  name: string;
  kind: EntryKind;
}

export interface EntryStats {
  kind: EntryKind;
  size: number;
  mtimeMs: number;
  /** Permission bits only (`mode & 0o777`) */
  mode: number;
}

/**
 * Filesystem operations the cleanup core is allowed to perform. The core
 * never touches `fs` directly; the CLI hands it a Node binding and tests can
 * wrap that binding to inject failures.
 */
export interface FileSystem {
  listEntries(dirPath: string): Promise<DirectoryEntry[]>;
  stat(targetPath: string): Promise<EntryStats>;
  readBytes(filePath: string): Promise<Uint8Array>;
  delete(filePath: string): Promise<void>;
  rename(fromPath: string, toPath: string): Promise<void>;
  setPermissions(filePath: string, mode: number): Promise<void>;
  /** Relocates a file, creating the destination directory when needed. */
  move(fromPath: string, toPath: string): Promise<void>;
  removeEmptyDir(dirPath: string): Promise<void>;
}
