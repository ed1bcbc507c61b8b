import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { createProgram } from '../main/main';

describe('tagfold command line', () => {
  let root: string;
  let workDir: string;
  let configPath: string;
  let output: string[];
  let exitCodes: number[];
  let answers: string[];
  let prompt: jest.Mock<Promise<string>, [string]>;

  const run = async (...args: string[]) => {
    const program = createProgram({
      stdout: { write: (chunk: string) => output.push(chunk) },
      prompt,
      env: {},
      setExitCode: (code) => exitCodes.push(code),
    });
    await program.parseAsync(['node', 'tagfold', '-c', configPath, ...args]);
  };

  const exists = async (target: string) =>
    fs.access(target).then(
      () => true,
      () => false,
    );

  beforeEach(async () => {
    root = path.resolve(await fs.mkdtemp(path.join(os.tmpdir(), 'cli-root-')));
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-work-'));
    configPath = path.join(workDir, 'tagfold.config.json');
    await fs.writeFile(configPath, JSON.stringify({ index: { filePath: path.join(workDir, 'index.json') } }));
    await fs.writeFile(path.join(root, 'invoice-may.txt'), 'invoice payment');
    await fs.writeFile(path.join(root, 'receipt-june.txt'), 'receipt');
    await fs.writeFile(path.join(root, 'notes.txt'), 'hello');

    output = [];
    exitCodes = [];
    answers = [];
    prompt = jest.fn(async (_question: string) => answers.shift() ?? '');
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('syncs a folder and finds files by tag', async () => {
    await run('sync', root);
    expect(output).toEqual([`Synced ${root}: added 3, updated 0, removed 0, unchanged 0.\n`]);

    output = [];
    await run('search', 'financial', '--limit', '1');
    expect(output).toEqual([`${path.join(root, 'invoice-may.txt')}  [financial, invoice, may, text]\n`]);

    output = [];
    await run('search', 'nothing-like-this');
    expect(output).toEqual(['No matching files.\n']);
    expect(exitCodes).toEqual([]);
  });

  it('tags a single file and only stores the tags when asked', async () => {
    const invoice = path.join(root, 'invoice-may.txt');
    const tagLines = `Tags for ${invoice}:\n  financial 3\n  invoice 1\n  may 1\n  text 0.5\n`;

    await run('tag', invoice);
    expect(output).toEqual([tagLines]);

    output = [];
    await run('search', 'financial');
    expect(output).toEqual(['No matching files.\n']);

    output = [];
    await run('tag', invoice, '--save');
    expect(output).toEqual([tagLines, 'Saved to the file index.\n']);

    output = [];
    await run('search', 'financial');
    expect(output).toEqual([`${invoice}  [financial, invoice, may, text]\n`]);
    expect(exitCodes).toEqual([]);
  });

  it('fails to tag a file that does not exist', async () => {
    await run('tag', path.join(root, 'missing.txt'));

    expect(output).toEqual([]);
    expect(exitCodes).toEqual([1]);
  });

  it('asks before moving and honours a refusal', async () => {
    answers.push('n');

    await run('organise', root);

    expect(prompt).toHaveBeenCalledWith('Create 2 directories, move 3 files? [y/N]: ');
    expect(output[0].split('\n')[0]).toBe(`Proposed changes under ${root}:`);
    expect(output[output.length - 1]).toBe('Apply was not confirmed; nothing was moved.\n');
    expect(await exists(path.join(root, 'notes.txt'))).toBe(true);
  });

  it('moves without asking when told yes', async () => {
    await run('organize', root, '--yes');

    expect(prompt).not.toHaveBeenCalled();
    expect(output).toEqual(['Moved 3, skipped 0, failed 0.\n']);
    expect(await exists(path.join(root, 'financial', 'receipt-june.txt'))).toBe(true);
    expect(await exists(path.join(root, 'misc', 'notes.txt'))).toBe(true);
    expect(exitCodes).toEqual([]);
  });

  it('only shows the plan on a dry run', async () => {
    await run('organise', root, '--dry-run');

    expect(output).toHaveLength(2);
    expect(output[0].trimEnd().split('\n').slice(-1)).toEqual(['Create 2 directories, move 3 files.']);
    expect(output[1]).toBe('Would move 3, skipped 0, would fail 0.\n');
    expect(await exists(path.join(root, 'financial'))).toBe(false);
  });

  it('sets a failing exit code when the configuration cannot be read', async () => {
    configPath = path.join(workDir, 'missing.json');

    await run('sync', root);

    expect(exitCodes).toEqual([1]);
    expect(output).toEqual([]);
  });
});
