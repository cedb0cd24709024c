import { ACTION_KINDS } from '../common/actions';
import type {
  ActionKind,
  ApprovedAction,
  Decision,
  DecisionMode,
  DecisionState,
  ProposedAction,
} from '../types/cleanup';
import { createLogger } from '../utils/logger';

const logger = createLogger('decisions');

export interface PromptContext {
  /** Zero-based position of the proposal in the run */
  position: number;
  total: number;
  /** Proposals of the same kind still waiting after this one */
  remainingOfKind: number;
}

export interface Prompter {
  ask(proposal: ProposedAction, context: PromptContext): Promise<Decision>;
}

export interface DecisionOutcome {
  approved: ApprovedAction[];
  rejected: ProposedAction[];
  /** How many times the operator was actually asked */
  prompts: number;
}

export const createDecisionState = (): DecisionState =>
  new Map<ActionKind, DecisionMode>(ACTION_KINDS.map((kind) => [kind, 'unset']));

const approve = (proposal: ProposedAction, index: number): ApprovedAction =>
  Object.freeze({ proposal: Object.freeze({ ...proposal }), index });

/** Answers "yes to all" for every kind; backs the `--yes` flag. */
export const approveAll: Prompter = {
  ask: async () => 'yes-to-all',
};

/**
 * Runs the batch confirmation protocol. The state is owned by the caller so
 * one run can share it across several `decide` calls; once a kind is fixed
 * to always-yes or always-no it is never prompted for again.
 */
export class DecisionEngine {
  constructor(
    private readonly prompter: Prompter,
    readonly state: DecisionState = createDecisionState(),
  ) {}

  modeFor(kind: ActionKind): DecisionMode {
    return this.state.get(kind) ?? 'unset';
  }

  async decide(proposals: readonly ProposedAction[]): Promise<DecisionOutcome> {
    const approved: ApprovedAction[] = [];
    const rejected: ProposedAction[] = [];
    let prompts = 0;

    const remaining = new Map<ActionKind, number>();
    proposals.forEach((proposal) => {
      remaining.set(proposal.kind, (remaining.get(proposal.kind) ?? 0) + 1);
    });

    for (let position = 0; position < proposals.length; position += 1) {
      const proposal = proposals[position];
      const left = (remaining.get(proposal.kind) ?? 1) - 1;
      remaining.set(proposal.kind, left);

      let accepted: boolean;
      const mode = this.modeFor(proposal.kind);
      if (mode === 'always-yes') {
        accepted = true;
      } else if (mode === 'always-no') {
        accepted = false;
      } else {
        prompts += 1;
        // Prompts are strictly one at a time so "all of this type" applies
        // to everything after the answer.
        // eslint-disable-next-line no-await-in-loop
        const decision = await this.prompter.ask(proposal, {
          position,
          total: proposals.length,
          remainingOfKind: left,
        });
        accepted = decision === 'yes' || decision === 'yes-to-all';
        if (decision === 'yes-to-all' || decision === 'no-to-all') {
          const fixed: DecisionMode = decision === 'yes-to-all' ? 'always-yes' : 'always-no';
          this.state.set(proposal.kind, fixed);
          logger.info(`${proposal.kind} fixed to ${fixed} for the rest of the run`);
        }
      }

      if (accepted) {
        approved.push(approve(proposal, position));
      } else {
        rejected.push(proposal);
      }
    }

    return { approved, rejected, prompts };
  }
}
