import type { ProposedAction } from '../types/cleanup';

export type CleanupErrorCode =
  | 'SCAN_FAILED'
  | 'HASH_FAILED'
  | 'ACTION_FAILED'
  | 'INVALID_CONFIG';

export class CleanupError extends Error {
  constructor(
    message: string,
    public readonly code: CleanupErrorCode,
    public readonly path?: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'CleanupError';
  }
}

/** Unreadable directory or file during the walk; the subtree is skipped. */
export class ScanError extends CleanupError {
  constructor(path: string, cause?: unknown) {
    super(`Cannot read ${path}: ${describeCause(cause)}`, 'SCAN_FAILED', path, cause);
    this.name = 'ScanError';
  }
}

/** Unreadable content while fingerprinting; the file is treated as unique. */
export class HashError extends CleanupError {
  constructor(path: string, cause?: unknown) {
    super(`Cannot hash ${path}: ${describeCause(cause)}`, 'HASH_FAILED', path, cause);
    this.name = 'HashError';
  }
}

export class ActionError extends CleanupError {
  constructor(
    public readonly proposal: ProposedAction,
    message: string,
    cause?: unknown,
  ) {
    super(message, 'ACTION_FAILED', proposal.target.path, cause);
    this.name = 'ActionError';
  }
}

export class ConfigError extends CleanupError {
  constructor(message: string, path?: string) {
    super(message, 'INVALID_CONFIG', path);
    this.name = 'ConfigError';
  }
}

export const errorCode = (error: unknown): string | undefined => {
  if (error && typeof error === 'object' && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return cause === undefined ? 'unknown error' : String(cause);
}
