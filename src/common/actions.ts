import path from 'path';
import { comparePaths } from './path';
import type {
  ActionKind,
  DeletionAction,
  DuplicateAction,
  EmptyFileAction,
  FileRecord,
  MoveOriginalAction,
  PermissionsAction,
  ProposedAction,
  RenameAction,
  TempFileAction,
  VersionConflictAction,
} from '../types/cleanup';

/** Classifier precedence; the decision engine asks in this order. */
export const ACTION_KINDS: readonly ActionKind[] = [
  'EMPTY_FILE',
  'TEMP_FILE',
  'DUPLICATE',
  'VERSION_CONFLICT',
  'MOVE_ORIGINAL',
  'RENAME',
  'PERMISSIONS',
];

const DELETION_KINDS = new Set<ActionKind>([
  'EMPTY_FILE',
  'TEMP_FILE',
  'DUPLICATE',
  'VERSION_CONFLICT',
]);

export const isDeletion = (action: ProposedAction): action is DeletionAction =>
  DELETION_KINDS.has(action.kind);

export const kindRank = (kind: ActionKind) => ACTION_KINDS.indexOf(kind);

export const compareProposals = (a: ProposedAction, b: ProposedAction) =>
  kindRank(a.kind) - kindRank(b.kind) || comparePaths(a.target.path, b.target.path);

const assertDistinct = (target: FileRecord, other: FileRecord, role: string) => {
  if (target.path === other.path) {
    throw new Error(`${role} of ${target.path} cannot be the file itself`);
  }
};

export const emptyFile = (target: FileRecord): EmptyFileAction => {
  if (target.size !== 0) {
    throw new Error(`${target.path} is not empty`);
  }
  return { kind: 'EMPTY_FILE', target };
};

export const tempFile = (target: FileRecord, suffix: string): TempFileAction => {
  if (!suffix || !target.name.endsWith(suffix)) {
    throw new Error(`${target.name} does not end with ${suffix}`);
  }
  return { kind: 'TEMP_FILE', target, suffix };
};

export const duplicate = (
  target: FileRecord,
  survivor: FileRecord,
  hash: string,
): DuplicateAction => {
  assertDistinct(target, survivor, 'Survivor');
  return { kind: 'DUPLICATE', target, survivor, hash };
};

export const versionConflict = (
  target: FileRecord,
  keeper: FileRecord,
): VersionConflictAction => {
  assertDistinct(target, keeper, 'Keeper');
  if (target.name !== keeper.name) {
    throw new Error(`${target.name} and ${keeper.name} are not versions of one file`);
  }
  return { kind: 'VERSION_CONFLICT', target, keeper };
};

export const moveOriginal = (target: FileRecord, destination: string): MoveOriginalAction => {
  if (target.rootKind !== 'source') {
    throw new Error(`${target.path} already lives in the canonical directory`);
  }
  if (path.resolve(destination) === path.resolve(target.path)) {
    throw new Error(`${target.path} cannot be moved onto itself`);
  }
  return { kind: 'MOVE_ORIGINAL', target, destination };
};

export const rename = (target: FileRecord, destination: string): RenameAction => {
  const newName = path.basename(destination);
  if (!newName || newName === target.name) {
    throw new Error(`Rename of ${target.path} must change its name`);
  }
  if (path.dirname(path.resolve(destination)) !== path.resolve(target.dir)) {
    throw new Error(`Rename of ${target.path} must stay in ${target.dir}`);
  }
  return { kind: 'RENAME', target, newName, destination };
};

export const permissions = (target: FileRecord, mode: number): PermissionsAction => {
  if (!Number.isInteger(mode) || mode < 0 || mode > 0o777) {
    throw new Error(`Invalid permission bits ${mode}`);
  }
  if (mode === target.mode) {
    throw new Error(`${target.path} already has mode ${formatMode(mode)}`);
  }
  return { kind: 'PERMISSIONS', target, mode };
};

export const formatMode = (mode: number) => mode.toString(8).padStart(3, '0');

export const describeAction = (action: ProposedAction): string => {
  switch (action.kind) {
    case 'EMPTY_FILE':
      return 'Delete empty file';
    case 'TEMP_FILE':
      return `Delete temporary file (${action.suffix})`;
    case 'DUPLICATE':
      return `Delete duplicate of ${action.survivor.path}`;
    case 'VERSION_CONFLICT':
      return `Delete older version; newer copy is ${action.keeper.path}`;
    case 'MOVE_ORIGINAL':
      return `Move to ${action.destination}`;
    case 'RENAME':
      return `Rename to ${action.newName}`;
    case 'PERMISSIONS':
      return `Change permissions ${formatMode(action.target.mode)} -> ${formatMode(action.mode)}`;
    default: {
      const exhaustive: never = action;
      throw new Error(`Unsupported action ${String(exhaustive)}`);
    }
  }
};
