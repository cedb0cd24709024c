import fs from 'fs/promises';
import path from 'path';
import { PassThrough } from 'stream';
import { parseArgs, runCli, USAGE } from '../src/main/cli';
import { createNodeFileSystem } from '../src/main/nodeFileSystem';
import { exists, makeTempDir, removeTempDir, writeFile } from '../src/__tests__/fixtures';

describe('parseArgs', () => {
  it('splits the canonical directory from the sources', () => {
    const options = parseArgs(['x', 'y', 'z', '--yes', '--config', '/etc/clean.ini']);

    expect(options).toEqual({
      canonical: path.resolve('x'),
      sources: [path.resolve('y'), path.resolve('z')],
      configPath: '/etc/clean.ini',
      yes: true,
      dryRun: false,
    });
  });

  it('rejects unknown options and missing directories', () => {
    expect(() => parseArgs(['x', 'y', '--force'])).toThrow('Unknown option --force');
    expect(() => parseArgs(['x'])).toThrow(
      'A canonical directory and at least one source directory are required',
    );
    expect(() => parseArgs(['x', 'y', '--config'])).toThrow('--config needs a file path');
  });
});

describe('runCli', () => {
  let tempDir: string | null = null;
  let canonical: string;
  let source: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await makeTempDir('cli-test');
    canonical = path.join(tempDir, 'x');
    source = path.join(tempDir, 'y');
    configPath = path.join(tempDir, '.clean_files');
    await fs.mkdir(canonical);
    await writeFile(source, 'a.txt', 'alpha');
    await writeFile(source, 'b.tmp', 'scratch');
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
    tempDir = null;
  });

  const invoke = async (args: string[], answers: string[] = []) => {
    const input = new PassThrough();
    const output = new PassThrough();
    const chunks: string[] = [];
    output.on('data', (chunk: Buffer) => chunks.push(chunk.toString()));
    answers.forEach((answer) => input.write(`${answer}\n`));
    input.end();
    const code = await runCli(args, { input, output, fileSystem: createNodeFileSystem() });
    await new Promise((resolve) => setImmediate(resolve));
    return { code, text: chunks.join('') };
  };

  it('prints the usage on --help', async () => {
    const { code, text } = await invoke(['--help']);

    expect(code).toBe(0);
    expect(text).toBe(`${USAGE}\n`);
  });

  it('fails on a missing source directory argument', async () => {
    const { code, text } = await invoke([canonical]);

    expect(code).toBe(1);
    expect(text).toContain(USAGE);
  });

  it('fails when the canonical directory does not exist', async () => {
    const missing = path.join(canonical, 'nope');
    const { code, text } = await invoke([missing, source, '--config', configPath]);

    expect(code).toBe(1);
    expect(text).toContain(`Canonical directory ${missing} is not readable`);
  });

  it('applies everything with --yes and writes a default configuration', async () => {
    const { code, text } = await invoke([canonical, source, '--yes', '--config', configPath]);

    expect(code).toBe(0);
    expect(text).toContain('Proposed actions (2)');
    expect(text).toContain('Cleanup finished');
    expect(await exists(configPath)).toBe(true);
    expect(await fs.readFile(path.join(canonical, 'a.txt'), 'utf8')).toBe('alpha');
    expect(await exists(source)).toBe(false);
  });

  it('leaves the tree alone on a dry run', async () => {
    const { code, text } = await invoke([canonical, source, '--dry-run', '--config', configPath]);

    expect(code).toBe(0);
    expect(text).toContain('Proposed actions (2)');
    expect(await exists(path.join(source, 'b.tmp'))).toBe(true);
  });

  it('follows answers piped on standard input', async () => {
    const { code, text } = await invoke([canonical, source, '--config', configPath], ['y', 'n', 'a']);

    expect(code).toBe(0);
    expect(text).toContain('Start interactive confirmation? (y/N) ');
    expect(await exists(path.join(source, 'b.tmp'))).toBe(true);
    expect(await exists(path.join(canonical, 'a.txt'))).toBe(true);
  });

  it('cancels when the start is not confirmed', async () => {
    const { code, text } = await invoke([canonical, source, '--config', configPath]);

    expect(code).toBe(0);
    expect(text).toContain('Cleanup cancelled before any change');
    expect(await exists(path.join(source, 'a.txt'))).toBe(true);
  });
});
