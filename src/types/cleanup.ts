export type RootKind = 'canonical' | 'source';

export interface FileRecord {
  /** Absolute path on disk */
  path: string;
  /** Base file name */
  name: string;
  /** Directory that contains the file */
  dir: string;
  /** Scanned root the file was found under */
  root: string;
  rootKind: RootKind;
  /** File size in bytes */
  size: number;
  mtimeMs: number;
  /** Permission bits (`mode & 0o777`) */
  mode: number;
  /** MIME type inferred from the file extension */
  mimeType: string | null;
}

export type ActionKind =
  | 'EMPTY_FILE'
  | 'TEMP_FILE'
  | 'DUPLICATE'
  | 'VERSION_CONFLICT'
  | 'MOVE_ORIGINAL'
  | 'RENAME'
  | 'PERMISSIONS';

export interface EmptyFileAction {
  kind: 'EMPTY_FILE';
  target: FileRecord;
}

export interface TempFileAction {
  kind: 'TEMP_FILE';
  target: FileRecord;
  /** Configured suffix the name matched */
  suffix: string;
}

export interface DuplicateAction {
  kind: 'DUPLICATE';
  target: FileRecord;
  survivor: FileRecord;
  hash: string;
}

export interface VersionConflictAction {
  kind: 'VERSION_CONFLICT';
  target: FileRecord;
  keeper: FileRecord;
}

export interface MoveOriginalAction {
  kind: 'MOVE_ORIGINAL';
  target: FileRecord;
  destination: string;
}

export interface RenameAction {
  kind: 'RENAME';
  target: FileRecord;
  newName: string;
  destination: string;
}

export interface PermissionsAction {
  kind: 'PERMISSIONS';
  target: FileRecord;
  mode: number;
}

export type DeletionAction =
  | EmptyFileAction
  | TempFileAction
  | DuplicateAction
  | VersionConflictAction;

export type ProposedAction =
  | DeletionAction
  | MoveOriginalAction
  | RenameAction
  | PermissionsAction;

export interface ApprovedAction {
  readonly proposal: Readonly<ProposedAction>;
  /** Position of the proposal in the classifier output */
  readonly index: number;
}

export type Decision = 'yes' | 'no' | 'yes-to-all' | 'no-to-all';

export type DecisionMode = 'unset' | 'always-yes' | 'always-no';

export type DecisionState = Map<ActionKind, DecisionMode>;

export interface CleanupConfig {
  /** Permission bits every file should carry, e.g. 0o644 */
  permissions: number;
  troublesomeChars: string[];
  substitute: string;
  tempSuffixes: string[];
}

export type ActionStatus = 'applied' | 'failed';

export interface ActionResult {
  action: ApprovedAction;
  status: ActionStatus;
  /** Path the operation acted on or produced */
  targetPath: string;
  message?: string;
}
