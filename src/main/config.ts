import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { parse, stringify } from 'ini';
import { z } from 'zod';
import { ConfigError, errorCode } from '../common/errors';
import type { CleanupConfig } from '../types/cleanup';
import { createLogger } from '../utils/logger';

const logger = createLogger('config');

export const CONFIG_SECTION = 'Settings';

export const DEFAULT_SETTINGS = {
  suggested_permissions: 'rw-r--r--',
  troublesome_chars: ':;*?"$#`|\\.',
  char_substitute: '_',
  temp_extensions: '.tmp,~,.bak,.DS_Store',
} as const;

export const defaultConfigPath = () => path.join(os.homedir(), '.clean_files');

const settingsSchema = z.object({
  suggested_permissions: z.string().trim().min(1, 'suggested_permissions is empty'),
  troublesome_chars: z.string(),
  char_substitute: z.string().length(1, 'char_substitute must be exactly one character'),
  temp_extensions: z.string(),
});

export type RawSettings = z.infer<typeof settingsSchema>;

const PERMISSION_LETTERS = ['r', 'w', 'x'];

/**
 * Accepts `rw-r--r--` style strings as well as plain octal (`644`, `0644`)
 * and returns the permission bits.
 */
export const parsePermissions = (value: string): number => {
  const trimmed = value.trim();
  if (/^0?[0-7]{3}$/.test(trimmed)) {
    return Number.parseInt(trimmed, 8);
  }
  if (trimmed.length !== 9) {
    throw new ConfigError(
      `Permission string must be 9 characters long (e.g. rw-r--r--), got "${value}"`,
    );
  }
  let mode = 0;
  for (let index = 0; index < 9; index += 1) {
    const char = trimmed[index];
    const expected = PERMISSION_LETTERS[index % 3];
    mode <<= 1;
    if (char === expected) {
      mode |= 1;
    } else if (char !== '-') {
      throw new ConfigError(`Unexpected "${char}" at position ${index + 1} of "${value}"`);
    }
  }
  return mode;
};

const splitList = (value: string) =>
  value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

export const resolveCleanupConfig = (raw: RawSettings): CleanupConfig => {
  const troublesomeChars = Array.from(new Set(Array.from(raw.troublesome_chars)));
  if (troublesomeChars.includes(raw.char_substitute)) {
    throw new ConfigError(
      `char_substitute "${raw.char_substitute}" is itself listed in troublesome_chars`,
    );
  }
  if (raw.char_substitute === '/' || raw.char_substitute === '\0') {
    throw new ConfigError('char_substitute cannot be a path separator');
  }
  return {
    permissions: parsePermissions(raw.suggested_permissions),
    troublesomeChars,
    substitute: raw.char_substitute,
    tempSuffixes: splitList(raw.temp_extensions),
  };
};

/** Parses `.clean_files` contents; keys missing from the file keep their defaults. */
export const parseCleanupConfig = (text: string, source?: string): CleanupConfig => {
  const parsed = parse(text);
  const section: unknown = parsed[CONFIG_SECTION] ?? {};
  const result = settingsSchema.partial().safeParse(section);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || CONFIG_SECTION}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid [${CONFIG_SECTION}] section: ${details}`, source);
  }
  return resolveCleanupConfig({ ...DEFAULT_SETTINGS, ...result.data });
};

export const serialiseDefaults = () => stringify({ [CONFIG_SECTION]: { ...DEFAULT_SETTINGS } });

/**
 * Reads the configuration file. A missing file is created with the defaults
 * so the operator has something to edit next time.
 */
export const loadCleanupConfig = async (
  filePath: string = defaultConfigPath(),
): Promise<CleanupConfig> => {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    if (errorCode(error) !== 'ENOENT') {
      throw new ConfigError(`Cannot read configuration ${filePath}: ${String(error)}`, filePath);
    }
    logger.warn(`Configuration file ${filePath} not found; writing defaults.`);
    try {
      await fs.writeFile(filePath, serialiseDefaults(), 'utf8');
    } catch (writeError) {
      logger.warn(`Could not write default configuration to ${filePath}`, writeError);
    }
    return resolveCleanupConfig({ ...DEFAULT_SETTINGS });
  }
  return parseCleanupConfig(text, filePath);
};
