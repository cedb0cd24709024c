import { createInterface, type Interface } from 'readline';
import type { Decision, ProposedAction } from '../types/cleanup';
import { formatPrompt } from '../utils/cleanupReporter';
import type { PromptContext, Prompter } from './decisionEngine';

const ANSWERS = new Map<string, Decision>([
  ['y', 'yes'],
  ['yes', 'yes'],
  ['n', 'no'],
  ['no', 'no'],
  ['a', 'yes-to-all'],
  ['all', 'yes-to-all'],
  ['s', 'no-to-all'],
  ['skip', 'no-to-all'],
]);

export const parseAnswer = (answer: string): Decision | undefined =>
  ANSWERS.get(answer.trim().toLowerCase());

/**
 * Reads answers line by line. Lines that arrive before a question is asked
 * are queued, so piped input works as well as a terminal. Once input ends
 * every remaining question is answered "skip all", which rejects the rest of
 * the run.
 */
export class ConsolePrompter implements Prompter {
  private closed = false;

  private readonly pending: string[] = [];

  private waiting: ((line: string | null) => void) | null = null;

  private readonly rl: Interface;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = createInterface({ input, terminal: false });
    this.rl.on('line', (line) => this.deliver(line));
    this.rl.on('close', () => {
      this.closed = true;
      this.deliver(null);
    });
  }

  private deliver(line: string | null) {
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting(line);
    } else if (line !== null) {
      this.pending.push(line);
    }
  }

  question(message: string): Promise<string | null> {
    this.output.write(message);
    const queued = this.pending.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  async confirm(message: string): Promise<boolean> {
    const answer = await this.question(`${message} (y/N) `);
    return parseAnswer(answer ?? '') === 'yes';
  }

  async ask(proposal: ProposedAction, context: PromptContext): Promise<Decision> {
    let message = formatPrompt(proposal, context);
    // eslint-disable-next-line no-constant-condition
    while (true) {
      // eslint-disable-next-line no-await-in-loop
      const answer = await this.question(message);
      if (answer === null) {
        this.output.write('\n');
        return 'no-to-all';
      }
      const decision = parseAnswer(answer);
      if (decision) {
        return decision;
      }
      message = 'Unknown answer. Use y, n, a or s: ';
    }
  }

  close() {
    this.rl.close();
  }
}
