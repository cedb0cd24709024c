import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Prompter, PromptContext } from '../main/decisionEngine';
import type { CleanupConfig, Decision, FileRecord, ProposedAction } from '../types/cleanup';
import type { FileSystem } from '../types/fileSystem';

export const makeConfig = (overrides: Partial<CleanupConfig> = {}): CleanupConfig => ({
  permissions: 0o644,
  troublesomeChars: [':', '?'],
  substitute: '_',
  tempSuffixes: ['.tmp', '~'],
  ...overrides,
});

export const makeRecord = (
  filePath: string,
  overrides: Partial<Omit<FileRecord, 'path' | 'name' | 'dir'>> = {},
): FileRecord => ({
  path: filePath,
  name: path.basename(filePath),
  dir: path.dirname(filePath),
  root: path.dirname(filePath),
  rootKind: 'source',
  size: 10,
  mtimeMs: 1_000,
  mode: 0o644,
  mimeType: null,
  ...overrides,
});

export const makeTempDir = (prefix: string) =>
  fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));

export const removeTempDir = async (dirPath: string | null) => {
  if (dirPath) {
    await fs.rm(dirPath, { recursive: true, force: true });
  }
};

export interface WriteOptions {
  mode?: number;
  /** Modification time in whole seconds since the epoch */
  mtime?: number;
}

export const writeFile = async (
  root: string,
  relative: string,
  content: string,
  options: WriteOptions = {},
) => {
  const filePath = path.join(root, relative);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
  await fs.chmod(filePath, options.mode ?? 0o644);
  if (options.mtime !== undefined) {
    await fs.utimes(filePath, options.mtime, options.mtime);
  }
  return filePath;
};

export const exists = async (targetPath: string) => {
  try {
    await fs.lstat(targetPath);
    return true;
  } catch {
    return false;
  }
};

export type FailingOperation = Exclude<keyof FileSystem, 'listEntries' | 'stat'>;

/**
 * Wraps a filesystem so the listed operations reject for the listed paths,
 * standing in for permission errors without depending on the test user.
 */
export const withFailures = (
  base: FileSystem,
  failures: Partial<Record<FailingOperation | 'listEntries', string[]>>,
): FileSystem => {
  const fail = (operation: FailingOperation | 'listEntries', targetPath: string) => {
    if (failures[operation]?.includes(targetPath)) {
      const error = Object.assign(new Error(`EACCES: permission denied, ${operation} '${targetPath}'`), {
        code: 'EACCES',
      });
      throw error;
    }
  };
  return {
    listEntries: async (dirPath) => {
      fail('listEntries', dirPath);
      return base.listEntries(dirPath);
    },
    stat: (targetPath) => base.stat(targetPath),
    readBytes: async (filePath) => {
      fail('readBytes', filePath);
      return base.readBytes(filePath);
    },
    delete: async (filePath) => {
      fail('delete', filePath);
      return base.delete(filePath);
    },
    rename: async (fromPath, toPath) => {
      fail('rename', fromPath);
      return base.rename(fromPath, toPath);
    },
    setPermissions: async (filePath, mode) => {
      fail('setPermissions', filePath);
      return base.setPermissions(filePath, mode);
    },
    move: async (fromPath, toPath) => {
      fail('move', fromPath);
      return base.move(fromPath, toPath);
    },
    removeEmptyDir: async (dirPath) => {
      fail('removeEmptyDir', dirPath);
      return base.removeEmptyDir(dirPath);
    },
  };
};

/** Replays fixed answers and remembers what it was asked. */
export class ScriptedPrompter implements Prompter {
  readonly asked: { proposal: ProposedAction; context: PromptContext }[] = [];

  constructor(private readonly answers: Decision[], private readonly fallback: Decision = 'no') {}

  async ask(proposal: ProposedAction, context: PromptContext): Promise<Decision> {
    this.asked.push({ proposal, context });
    return this.answers.shift() ?? this.fallback;
  }
}
