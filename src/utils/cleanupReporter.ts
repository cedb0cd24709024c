import { bold, cyan, dim, green, magenta, red, yellow, blue } from 'colorette';
import { describeAction, formatMode } from '../common/actions';
import type { ActionKind, ProposedAction } from '../types/cleanup';
import type { PromptContext } from '../main/decisionEngine';
import type { RunReport } from '../main/pipeline';

const numberFormatter = new Intl.NumberFormat('en-US');

const formatNumber = (value: number) => numberFormatter.format(value);

const formatSize = (bytes: number) => {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KiB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
};

const KIND_LABELS: Record<ActionKind, string> = {
  EMPTY_FILE: red('EMPTY_FILE'),
  TEMP_FILE: red('TEMP_FILE'),
  DUPLICATE: magenta('DUPLICATE'),
  VERSION_CONFLICT: magenta('VERSION_CONFLICT'),
  MOVE_ORIGINAL: blue('MOVE_ORIGINAL'),
  RENAME: cyan('RENAME'),
  PERMISSIONS: yellow('PERMISSIONS'),
};

type Sink = (line: string) => void;

// eslint-disable-next-line no-console
const defaultSink: Sink = (line) => console.log(line);

const emit = (header: string, details: string[] = [], sink: Sink = defaultSink) => {
  sink(header);
  details.forEach((detail) => sink(`   ${detail}`));
};

export const describeTarget = (proposal: ProposedAction) => {
  const { target } = proposal;
  const facts = [
    formatSize(target.size),
    `mode ${formatMode(target.mode)}`,
    target.mimeType ?? 'unknown type',
    target.rootKind,
  ];
  return `${target.path} ${dim(`(${facts.join(', ')})`)}`;
};

export const formatProposal = (proposal: ProposedAction, position: number) =>
  `${dim(`#${position + 1}`)} ${KIND_LABELS[proposal.kind]} ${describeTarget(proposal)}\n      ${bold(describeAction(proposal))}`;

export const printProposals = (proposals: readonly ProposedAction[], sink: Sink = defaultSink) => {
  if (proposals.length === 0) {
    emit(green('Nothing to clean up; every file is in order.'), [], sink);
    return;
  }
  emit(bold(`Proposed actions (${formatNumber(proposals.length)})`), [], sink);
  proposals.forEach((proposal, index) => sink(formatProposal(proposal, index)));
};

export const formatPrompt = (proposal: ProposedAction, context: PromptContext) => {
  const more = context.remainingOfKind > 0 ? dim(` (+${context.remainingOfKind} more of this type)`) : '';
  return [
    `${dim(`[${context.position + 1}/${context.total}]`)} ${KIND_LABELS[proposal.kind]}${more}`,
    `   File:   ${describeTarget(proposal)}`,
    `   Action: ${bold(describeAction(proposal))}`,
    `Apply? [y]es, [n]o, [a]ll of this type, [s]kip all of this type: `,
  ].join('\n');
};

export const printRunSummary = (report: RunReport, sink: Sink = defaultSink) => {
  const warnings = [...report.scanWarnings, ...report.hashWarnings];
  const details = [
    `Roots scanned: ${formatNumber(report.readableRoots.length)} of ${formatNumber(report.roots.length)}`,
    `Proposals: ${formatNumber(report.proposals.length)}`,
  ];
  if (report.decisions) {
    details.push(
      `Approved: ${formatNumber(report.decisions.approved.length)}, rejected: ${formatNumber(report.decisions.rejected.length)}, prompts: ${formatNumber(report.decisions.prompts)}`,
    );
  }
  if (report.execution) {
    details.push(`Applied: ${formatNumber(report.execution.applied)}`);
  }
  if (report.prunedDirectories.length) {
    details.push(`Empty directories removed: ${formatNumber(report.prunedDirectories.length)}`);
  }
  if (warnings.length) {
    details.push(yellow(`Warnings: ${formatNumber(warnings.length)}`));
    warnings.forEach((warning) => details.push(`  ${dim(warning.message)}`));
  }

  const failures = report.execution?.failures ?? [];
  if (failures.length) {
    details.push(red(`Failed actions: ${formatNumber(failures.length)}`));
    failures.forEach((failure) => details.push(`  ${red('x')} ${failure.message}`));
  }

  let header = green('Cleanup finished');
  if (report.cancelled) {
    header = yellow('Cleanup cancelled before any change');
  } else if (failures.length) {
    header = yellow('Cleanup finished with failures');
  }
  emit(header, details, sink);
};
