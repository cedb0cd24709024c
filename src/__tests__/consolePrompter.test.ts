import { PassThrough } from 'stream';
import { tempFile } from '../common/actions';
import { ConsolePrompter, parseAnswer } from '../main/consolePrompter';
import { makeRecord } from './fixtures';

const proposal = tempFile(makeRecord('/y/a.tmp'), '.tmp');
const context = { position: 0, total: 1, remainingOfKind: 0 };

const collect = (stream: PassThrough) => {
  const chunks: string[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString()));
  return async () => {
    await new Promise((resolve) => setImmediate(resolve));
    return chunks.join('');
  };
};

describe('parseAnswer', () => {
  it('accepts short and long answers in any case', () => {
    expect(parseAnswer('Y')).toBe('yes');
    expect(parseAnswer(' no ')).toBe('no');
    expect(parseAnswer('a')).toBe('yes-to-all');
    expect(parseAnswer('SKIP')).toBe('no-to-all');
    expect(parseAnswer('constructor')).toBeUndefined();
  });
});

describe('ConsolePrompter', () => {
  it('reads answers that were piped in before the question', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompter = new ConsolePrompter(input, output);
    input.write('a\n');

    await new Promise((resolve) => setImmediate(resolve));
    const decision = await prompter.ask(proposal, context);

    expect(decision).toBe('yes-to-all');
    prompter.close();
  });

  it('asks again after an unknown answer', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const written = collect(output);
    const prompter = new ConsolePrompter(input, output);

    const pending = prompter.ask(proposal, context);
    input.write('maybe\n');
    input.write('n\n');

    expect(await pending).toBe('no');
    expect(await written()).toContain('Unknown answer. Use y, n, a or s: ');
    prompter.close();
  });

  it('skips everything once input ends', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompter = new ConsolePrompter(input, output);

    const pending = prompter.ask(proposal, context);
    input.end();

    expect(await pending).toBe('no-to-all');
    expect(await prompter.ask(proposal, context)).toBe('no-to-all');
  });

  it('confirms only on an explicit yes', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const written = collect(output);
    const prompter = new ConsolePrompter(input, output);
    input.write('y\n');
    input.write('\n');
    input.end();

    expect(await prompter.confirm('Start?')).toBe(true);
    expect(await prompter.confirm('Start?')).toBe(false);
    expect(await written()).toContain('Start? (y/N) ');
  });
});
