import path from 'path';
import { describeAction, isDeletion } from '../common/actions';
import { ActionError, describeCause, errorCode } from '../common/errors';
import { PathAllocator } from '../common/pathAllocator';
import { comparePaths } from '../common/path';
import type {
  ActionKind,
  ActionResult,
  ApprovedAction,
  MoveOriginalAction,
  ProposedAction,
  RenameAction,
} from '../types/cleanup';
import type { FileSystem } from '../types/fileSystem';
import { createLogger } from '../utils/logger';

const logger = createLogger('executor');

/**
 * Total order over action kinds at execution time. Deletions go first so
 * their paths are free, renames precede the chmod and the move so both see
 * the new name, and moves go last.
 */
export const EXECUTION_PHASES: readonly (readonly ActionKind[])[] = [
  ['EMPTY_FILE', 'TEMP_FILE', 'DUPLICATE', 'VERSION_CONFLICT'],
  ['RENAME'],
  ['PERMISSIONS'],
  ['MOVE_ORIGINAL'],
];

export interface ExecutionOptions {
  fileSystem: FileSystem;
  /** Every path the scan found; destinations are planned around them. */
  knownPaths: Iterable<string>;
  /** Separator for disambiguated names, normally the substitute character. */
  separator: string;
}

export interface ExecutionPlan {
  /** Original path -> resolved rename destination */
  renames: Map<string, string>;
  /** Original path -> resolved move destination */
  moves: Map<string, string>;
}

export interface ExecutionReport {
  results: ActionResult[];
  failures: ActionError[];
  applied: number;
}

const byTargetPath = (a: ApprovedAction, b: ApprovedAction) =>
  comparePaths(a.proposal.target.path, b.proposal.target.path);

type ApprovedOfKind<K extends ActionKind> = ApprovedAction & {
  proposal: Extract<ProposedAction, { kind: K }>;
};

const ofKind = <K extends ActionKind>(approved: readonly ApprovedAction[], kind: K) =>
  approved
    .filter((action): action is ApprovedOfKind<K> => action.proposal.kind === kind)
    .sort(byTargetPath);

const noteAdjustment = (proposal: RenameAction | MoveOriginalAction, resolved: string) => {
  if (path.resolve(proposal.destination) !== resolved) {
    logger.warn(`Destination for ${proposal.target.path} adjusted to ${resolved}`);
  }
};

/**
 * Resolves final destinations for the approved set before anything runs.
 * Only approved deletions free their paths, so a destination the classifier
 * proposed may shift when the deletion it relied on was rejected.
 */
export const planExecution = (
  approved: readonly ApprovedAction[],
  knownPaths: Iterable<string>,
  separator: string,
): ExecutionPlan => {
  const deleted = new Set(
    approved
      .filter((action) => isDeletion(action.proposal))
      .map((action) => path.resolve(action.proposal.target.path)),
  );
  const allocator = new PathAllocator(
    Array.from(knownPaths).filter((known) => !deleted.has(path.resolve(known))),
    separator,
  );

  const renames = new Map<string, string>();
  ofKind(approved, 'RENAME').forEach(({ proposal }) => {
    const resolved = allocator.claimPath(proposal.destination);
    noteAdjustment(proposal, resolved);
    renames.set(proposal.target.path, resolved);
  });

  const moves = new Map<string, string>();
  ofKind(approved, 'MOVE_ORIGINAL').forEach(({ proposal }) => {
    // The file arrives under whatever name its approved rename resolved to.
    const renamed = renames.get(proposal.target.path);
    const preferred = path.join(
      path.dirname(proposal.destination),
      renamed === undefined ? proposal.target.name : path.basename(renamed),
    );
    const resolved = allocator.claimPath(preferred);
    noteAdjustment(proposal, resolved);
    moves.set(proposal.target.path, resolved);
  });

  return { renames, moves };
};

const pathExists = async (fileSystem: FileSystem, targetPath: string) => {
  try {
    await fileSystem.stat(targetPath);
    return true;
  } catch (error: unknown) {
    if (errorCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
};

/**
 * Applies approved actions phase by phase. Each action stands alone: a
 * failure is recorded and logged and the run carries on. Nothing is retried
 * or rolled back.
 */
export const executeActions = async (
  approved: readonly ApprovedAction[],
  options: ExecutionOptions,
): Promise<ExecutionReport> => {
  const { fileSystem } = options;
  const plan = planExecution(approved, options.knownPaths, options.separator);
  const results: ActionResult[] = [];
  const failures: ActionError[] = [];
  // Original path -> where the file currently is
  const locations = new Map<string, string>();
  const locate = (filePath: string) => locations.get(filePath) ?? filePath;

  const recordResult = (
    action: ApprovedAction,
    targetPath: string,
    error?: unknown,
  ) => {
    if (error === undefined) {
      results.push({ action, status: 'applied', targetPath });
      logger.info(`${describeAction(action.proposal)}: ${action.proposal.target.path}`);
      return;
    }
    const message = error instanceof ActionError ? error.message : describeCause(error);
    const failure =
      error instanceof ActionError
        ? error
        : new ActionError(
            action.proposal,
            `${action.proposal.kind} failed for ${action.proposal.target.path}: ${message}`,
            error,
          );
    failures.push(failure);
    results.push({ action, status: 'failed', targetPath, message });
    logger.error(failure.message);
  };

  const relocate = async (
    action: ApprovedOfKind<'RENAME' | 'MOVE_ORIGINAL'>,
    planned: Map<string, string>,
    apply: (from: string, to: string) => Promise<void>,
  ) => {
    const source = action.proposal.target.path;
    const from = locate(source);
    const to = planned.get(source) ?? path.resolve(action.proposal.destination);
    try {
      if (await pathExists(fileSystem, to)) {
        throw new ActionError(action.proposal, `Destination already exists: ${to}`);
      }
      await apply(from, to);
      locations.set(source, to);
      recordResult(action, to);
    } catch (error: unknown) {
      recordResult(action, to, error);
    }
  };

  const [deletionKinds] = EXECUTION_PHASES;
  const deletions = approved
    .filter((action) => deletionKinds.includes(action.proposal.kind))
    .sort(byTargetPath);
  // Deletion targets are distinct files, so they can run side by side.
  const outcomes = await Promise.allSettled(
    deletions.map((action) => fileSystem.delete(action.proposal.target.path)),
  );
  deletions.forEach((action, index) => {
    const outcome = outcomes[index];
    recordResult(
      action,
      action.proposal.target.path,
      outcome.status === 'rejected' ? outcome.reason ?? new Error('delete failed') : undefined,
    );
  });

  for (const action of ofKind(approved, 'RENAME')) {
    // eslint-disable-next-line no-await-in-loop
    await relocate(action, plan.renames, (from, to) => fileSystem.rename(from, to));
  }

  for (const action of ofKind(approved, 'PERMISSIONS')) {
    const current = locate(action.proposal.target.path);
    try {
      // eslint-disable-next-line no-await-in-loop
      await fileSystem.setPermissions(current, action.proposal.mode);
      recordResult(action, current);
    } catch (error: unknown) {
      recordResult(action, current, error);
    }
  }

  for (const action of ofKind(approved, 'MOVE_ORIGINAL')) {
    // eslint-disable-next-line no-await-in-loop
    await relocate(action, plan.moves, (from, to) => fileSystem.move(from, to));
  }

  return {
    results,
    failures,
    applied: results.filter((result) => result.status === 'applied').length,
  };
};
