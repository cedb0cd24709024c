#!/usr/bin/env node
import path from 'path';
import { CleanupError, describeCause } from '../common/errors';
import { printProposals, printRunSummary } from '../utils/cleanupReporter';
import { createLogger } from '../utils/logger';
import { defaultConfigPath, loadCleanupConfig } from './config';
import { ConsolePrompter } from './consolePrompter';
import { approveAll } from './decisionEngine';
import { createNodeFileSystem } from './nodeFileSystem';
import { runCleanup } from './pipeline';
import type { FileSystem } from '../types/fileSystem';

const logger = createLogger('cli');

export const USAGE =
  'Usage: clean-files <canonical-dir> <source-dir> [source-dir...] [--config <file>] [--yes] [--dry-run]';

export interface CliOptions {
  canonical: string;
  sources: string[];
  configPath: string;
  yes: boolean;
  dryRun: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const positional: string[] = [];
  let configPath = defaultConfigPath();
  let yes = false;
  let dryRun = false;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === '--yes' || arg === '-y') {
      yes = true;
    } else if (arg === '--dry-run') {
      dryRun = true;
    } else if (arg === '--config') {
      const value = argv[index + 1];
      if (!value) {
        throw new UsageError('--config needs a file path');
      }
      configPath = value;
      index += 1;
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length < 2) {
    throw new UsageError('A canonical directory and at least one source directory are required');
  }
  const [canonical, ...sources] = positional.map((entry) => path.resolve(entry));
  return { canonical, sources, configPath, yes, dryRun };
}

export interface CliIo {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  fileSystem: FileSystem;
}

export async function runCli(
  argv: readonly string[],
  io: CliIo = {
    input: process.stdin,
    output: process.stdout,
    fileSystem: createNodeFileSystem(),
  },
): Promise<number> {
  const write = (line: string) => io.output.write(`${line}\n`);
  if (argv.includes('--help') || argv.includes('-h')) {
    write(USAGE);
    return 0;
  }

  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error: unknown) {
    write(describeCause(error));
    write(USAGE);
    return 1;
  }

  try {
    const stats = await io.fileSystem.stat(options.canonical);
    if (stats.kind !== 'directory') {
      write(`Canonical directory ${options.canonical} is not a directory`);
      return 1;
    }
  } catch (error: unknown) {
    write(`Canonical directory ${options.canonical} is not readable: ${describeCause(error)}`);
    return 1;
  }

  const prompter = new ConsolePrompter(io.input, io.output);
  try {
    const config = await loadCleanupConfig(options.configPath);
    const report = await runCleanup({
      roots: [options.canonical, ...options.sources],
      config,
      fileSystem: io.fileSystem,
      prompter: options.yes ? approveAll : prompter,
      dryRun: options.dryRun,
      confirmStart: async (proposals) => {
        printProposals(proposals, write);
        if (options.yes) {
          return true;
        }
        return prompter.confirm('Start interactive confirmation?');
      },
    });

    if (options.dryRun) {
      printProposals(report.proposals, write);
    }
    printRunSummary(report, write);
    return report.readableRoots.length === 0 ? 1 : 0;
  } catch (error: unknown) {
    if (error instanceof CleanupError) {
      write(error.message);
      return 1;
    }
    logger.error('Unexpected failure', error);
    throw error;
  } finally {
    prompter.close();
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      // eslint-disable-next-line no-console
      console.error(error);
      process.exitCode = 1;
    });
}
