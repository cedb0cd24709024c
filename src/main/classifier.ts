import path from 'path';
import {
  compareProposals,
  duplicate,
  emptyFile,
  moveOriginal,
  permissions,
  rename,
  tempFile,
  versionConflict,
} from '../common/actions';
import { PathAllocator } from '../common/pathAllocator';
import { comparePaths, matchSuffix, sanitizeName } from '../common/path';
import type {
  CleanupConfig,
  DeletionAction,
  FileRecord,
  ProposedAction,
} from '../types/cleanup';
import type { FingerprintIndex } from './fingerprintIndex';

const canonicalFirst = (a: FileRecord, b: FileRecord) =>
  Number(a.rootKind !== 'canonical') - Number(b.rootKind !== 'canonical');

/** Canonical member, then oldest, then smallest path. */
export const compareSurvivors = (a: FileRecord, b: FileRecord) =>
  canonicalFirst(a, b) || a.mtimeMs - b.mtimeMs || comparePaths(a.path, b.path);

/** Newest, then canonical member, then smallest path. */
export const compareKeepers = (a: FileRecord, b: FileRecord) =>
  b.mtimeMs - a.mtimeMs || canonicalFirst(a, b) || comparePaths(a.path, b.path);

const pickFirst = (group: readonly FileRecord[], compare: typeof compareSurvivors) =>
  [...group].sort(compare)[0];

const sortedGroups = <K extends string>(groups: ReadonlyMap<K, readonly FileRecord[]>) =>
  Array.from(groups.entries())
    .filter(([, members]) => members.length > 1)
    .sort(([a], [b]) => comparePaths(a, b));

/** Rules 1-4: at most one removal per file. */
const proposeRemovals = (
  records: readonly FileRecord[],
  index: FingerprintIndex,
  config: CleanupConfig,
) => {
  const removals = new Map<string, DeletionAction>();

  records.forEach((record) => {
    if (record.size === 0) {
      removals.set(record.path, emptyFile(record));
      return;
    }
    const suffix = matchSuffix(record.name, config.tempSuffixes);
    if (suffix !== undefined) {
      removals.set(record.path, tempFile(record, suffix));
    }
  });

  sortedGroups(index.byHash).forEach(([hash, members]) => {
    const survivor = pickFirst(members, compareSurvivors);
    members
      .filter((member) => member !== survivor && !removals.has(member.path))
      .forEach((member) => removals.set(member.path, duplicate(member, survivor, hash)));
  });

  // What is left of a name group after duplicate removal has pairwise
  // distinct contents, so any two remaining members are competing versions.
  sortedGroups(index.byName).forEach(([, members]) => {
    const remaining = members.filter((member) => !removals.has(member.path));
    if (remaining.length < 2) {
      return;
    }
    const keeper = pickFirst(remaining, compareKeepers);
    remaining
      .filter((member) => member !== keeper)
      .forEach((member) => removals.set(member.path, versionConflict(member, keeper)));
  });

  reelectSurvivors(index, removals);
  return removals;
};

/**
 * A duplicate survivor that then lost a version conflict hands its role to
 * the best remaining copy under another name, so the content is kept.
 * Copies sharing the losing name lose the same conflict. Heirs with no
 * other content under their own name come first.
 */
const reelectSurvivors = (index: FingerprintIndex, removals: Map<string, DeletionAction>) => {
  const hasRival = (record: FileRecord) =>
    (index.byName.get(record.name) ?? []).some(
      (other) =>
        !removals.has(other.path) && index.hashOf(other) !== index.hashOf(record),
    );

  sortedGroups(index.byHash).forEach(([hash, members]) => {
    const survivor = members.find((member) => removals.get(member.path)?.kind !== 'DUPLICATE');
    const lost = survivor && removals.get(survivor.path);
    if (!survivor || lost?.kind !== 'VERSION_CONFLICT') {
      return;
    }
    const others = members.filter((member) => member !== survivor);
    const heirs = others.filter((member) => member.name !== survivor.name);
    if (heirs.length === 0) {
      others.forEach((member) => removals.set(member.path, versionConflict(member, lost.keeper)));
      return;
    }
    const heir = [...heirs].sort(
      (a, b) => Number(hasRival(a)) - Number(hasRival(b)) || compareSurvivors(a, b),
    )[0];
    removals.delete(heir.path);
    others
      .filter((member) => member !== heir)
      .forEach((member) => removals.set(member.path, duplicate(member, heir, hash)));
  });
};

/**
 * Turns a completed scan into proposals, ordered by kind precedence and then
 * by path. Destinations for renames and moves are claimed against every
 * scanned file that is not itself proposed for removal and against
 * `otherEntries`, the directories and links the scan listed. Renames claim
 * first, then moves, each in path order; a move keeps the name its rename
 * was given.
 */
export const classify = (
  records: readonly FileRecord[],
  index: FingerprintIndex,
  config: CleanupConfig,
  canonicalRoot: string,
  otherEntries: Iterable<string> = [],
): ProposedAction[] => {
  const removals = proposeRemovals(records, index, config);
  const survivors = records
    .filter((record) => !removals.has(record.path))
    .sort((a, b) => comparePaths(a.path, b.path));

  const allocator = new PathAllocator(
    [...survivors.map((record) => record.path), ...otherEntries],
    config.substitute,
  );
  const proposals: ProposedAction[] = Array.from(removals.values());

  const renamedTo = new Map<string, string>();
  survivors.forEach((record) => {
    const cleanName = sanitizeName(record.name, config.troublesomeChars, config.substitute);
    if (cleanName !== record.name) {
      const proposal = rename(record, allocator.claim(record.dir, cleanName));
      renamedTo.set(record.path, proposal.newName);
      proposals.push(proposal);
    }
  });

  const root = path.resolve(canonicalRoot);
  survivors
    .filter((record) => record.rootKind === 'source')
    .forEach((record) => {
      const finalName = renamedTo.get(record.path) ?? record.name;
      proposals.push(moveOriginal(record, allocator.claim(root, finalName)));
    });

  survivors
    .filter((record) => record.mode !== config.permissions)
    .forEach((record) => proposals.push(permissions(record, config.permissions)));

  return proposals.sort(compareProposals);
};
