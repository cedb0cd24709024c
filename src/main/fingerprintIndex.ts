import crypto from 'crypto';
import pLimit from 'p-limit';
import { HashError } from '../common/errors';
import { matchSuffix } from '../common/path';
import type { CleanupConfig, FileRecord } from '../types/cleanup';
import type { FileSystem } from '../types/fileSystem';
import { createLogger } from '../utils/logger';

const logger = createLogger('fingerprint');

export const HASH_ALGORITHM = 'sha256';
const MAX_CONCURRENT_READS = 8;

export interface FingerprintIndex {
  /** Content hash -> every hashed file with that content */
  byHash: ReadonlyMap<string, readonly FileRecord[]>;
  /** Base name -> every hashed file carrying that name */
  byName: ReadonlyMap<string, readonly FileRecord[]>;
  hashOf(record: FileRecord): string | undefined;
  warnings: readonly HashError[];
}

const groupBy = <K>(records: readonly FileRecord[], keyOf: (record: FileRecord) => K) => {
  const groups = new Map<K, FileRecord[]>();
  records.forEach((record) => {
    const key = keyOf(record);
    const group = groups.get(key);
    if (group) {
      group.push(record);
    } else {
      groups.set(key, [record]);
    }
  });
  return groups;
};

export const hashBytes = (bytes: Uint8Array) =>
  crypto.createHash(HASH_ALGORITHM).update(bytes).digest('hex');

/**
 * Files that are empty or temporary are removed outright and never compared,
 * so only the rest are candidates for hashing.
 */
export const isComparable = (record: FileRecord, config: CleanupConfig) =>
  record.size > 0 && matchSuffix(record.name, config.tempSuffixes) === undefined;

/**
 * Builds the duplicate and same-name relations for a completed scan. A file
 * is only read when another candidate shares its size or its name: a file
 * unique on both counts can be neither a duplicate nor a version conflict.
 */
export const buildFingerprintIndex = async (
  records: readonly FileRecord[],
  fileSystem: FileSystem,
  config: CleanupConfig,
): Promise<FingerprintIndex> => {
  const candidates = records.filter((record) => isComparable(record, config));
  const bySize = groupBy(candidates, (record) => record.size);
  const byCandidateName = groupBy(candidates, (record) => record.name);
  const toHash = candidates.filter(
    (record) =>
      (bySize.get(record.size)?.length ?? 0) > 1 ||
      (byCandidateName.get(record.name)?.length ?? 0) > 1,
  );

  const hashes = new Map<string, string>();
  const warnings: HashError[] = [];
  const limit = pLimit(MAX_CONCURRENT_READS);

  await Promise.all(
    toHash.map((record) =>
      limit(async () => {
        try {
          hashes.set(record.path, hashBytes(await fileSystem.readBytes(record.path)));
        } catch (error: unknown) {
          const warning = new HashError(record.path, error);
          warnings.push(warning);
          logger.warn(warning.message);
        }
      }),
    ),
  );

  const hashed = toHash.filter((record) => hashes.has(record.path));
  const hashOf = (record: FileRecord) => hashes.get(record.path);
  logger.info(`Hashed ${hashed.length} of ${records.length} file(s)`);

  return {
    byHash: groupBy(hashed, (record) => hashes.get(record.path) ?? ''),
    byName: groupBy(hashed, (record) => record.name),
    hashOf,
    warnings,
  };
};
