import type { HashError, ScanError } from '../common/errors';
import type { CleanupConfig, DecisionState, ProposedAction } from '../types/cleanup';
import type { FileSystem } from '../types/fileSystem';
import { createLogger } from '../utils/logger';
import { executeActions, type ExecutionReport } from './actionExecutor';
import { classify } from './classifier';
import { pruneEmptyDirectories } from './cleanupPass';
import { DecisionEngine, type DecisionOutcome, type Prompter } from './decisionEngine';
import { buildFingerprintIndex } from './fingerprintIndex';
import { scanRoots, type ScanRoot } from './scanner';

const logger = createLogger('pipeline');

export interface RunOptions {
  /** Canonical directory first, then the source directories */
  roots: readonly string[];
  config: CleanupConfig;
  fileSystem: FileSystem;
  prompter: Prompter;
  /** Stop after classification */
  dryRun?: boolean;
  /**
   * Called once the proposals are known; returning false skips the decision
   * and execution phases entirely.
   */
  confirmStart?: (proposals: readonly ProposedAction[]) => Promise<boolean>;
  decisionState?: DecisionState;
}

export interface RunReport {
  roots: ScanRoot[];
  readableRoots: string[];
  scanWarnings: ScanError[];
  hashWarnings: readonly HashError[];
  proposals: ProposedAction[];
  decisions?: DecisionOutcome;
  execution?: ExecutionReport;
  prunedDirectories: string[];
  cancelled: boolean;
}

export const runCleanup = async (options: RunOptions): Promise<RunReport> => {
  const { config, fileSystem } = options;
  const scan = await scanRoots(options.roots, fileSystem);
  const report: RunReport = {
    roots: scan.roots,
    readableRoots: scan.readableRoots,
    scanWarnings: scan.warnings,
    hashWarnings: [],
    proposals: [],
    prunedDirectories: [],
    cancelled: false,
  };

  const [canonical] = scan.roots;
  if (!canonical || scan.readableRoots.length === 0) {
    logger.error('No readable directories to process');
    return report;
  }

  const index = await buildFingerprintIndex(scan.records, fileSystem, config);
  report.hashWarnings = index.warnings;
  report.proposals = classify(scan.records, index, config, canonical.path, scan.otherEntries);
  logger.info(`Classified ${scan.records.length} file(s) into ${report.proposals.length} proposal(s)`);

  if (options.dryRun) {
    return report;
  }

  if (report.proposals.length > 0) {
    if (options.confirmStart && !(await options.confirmStart(report.proposals))) {
      report.cancelled = true;
      return report;
    }

    const engine = new DecisionEngine(options.prompter, options.decisionState);
    report.decisions = await engine.decide(report.proposals);

    report.execution = await executeActions(report.decisions.approved, {
      fileSystem,
      knownPaths: [...scan.records.map((record) => record.path), ...scan.otherEntries],
      separator: config.substitute,
    });
  }

  const cleanup = await pruneEmptyDirectories(
    scan.readableRoots,
    canonical.path,
    fileSystem,
  );
  report.prunedDirectories = cleanup.removed;
  report.scanWarnings.push(...cleanup.warnings);

  return report;
};
