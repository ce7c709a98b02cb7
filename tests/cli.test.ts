import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'node:path';
import { makeTmpDir, rmTmpDir, writeWork, readWork, fs } from './helpers.js';
import { run, type CliIO } from '../src/cli.js';

const ANSI = /\x1b\[[0-9;]*m/g;

let root: string;
let answers: boolean[];
let prompts: string[];
let editorText: string;

beforeEach(() => {
  root = path.resolve(makeTmpDir());
  answers = [];
  prompts = [];
  editorText = 'from editor';
});

afterEach(() => rmTmpDir(root));

async function cli(args: string[], cwd = root): Promise<{ code: number; out: string[]; err: string[] }> {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    cwd,
    env: {},
    out: (line) => out.push(line.replace(ANSI, '')),
    err: (line) => err.push(line.replace(ANSI, '')),
    confirm: async (message) => {
      prompts.push(message);
      return answers.shift() ?? false;
    },
    editMessage: async () => editorText,
  };
  const code = await run(['node', 'snapvc', ...args], io);
  return { code, out, err };
}

async function commit(files: Record<string, string>, message: string): Promise<string> {
  for (const [rel, content] of Object.entries(files)) writeWork(root, rel, content);
  await cli(['add', ...Object.keys(files)]);
  const { out } = await cli(['commit', '-m', message]);
  const match = /^Commit ([0-9a-f]{40})$/.exec(out[0] ?? '');
  if (!match) throw new Error(`unexpected commit output: ${out.join('\n')}`);
  return match[1];
}

describe('init', () => {
  it('creates the repository once', async () => {
    expect(await cli(['init'])).toEqual({
      code: 0,
      out: [`Initialized snapvc repository in ${path.join(root, '.snapvc')}`],
      err: [],
    });
    expect(await cli(['init'])).toEqual({
      code: 0,
      out: [`Repository already initialized at ${root}`],
      err: [],
    });
  });
});

describe('without a repository', () => {
  it('reports an error and exits 1', async () => {
    const result = await cli(['status']);
    expect(result.code).toBe(1);
    expect(result.out).toEqual([]);
    expect(result.err).toHaveLength(1);
    expect(result.err[0]).toMatch(/^error: Not a snapvc repository: /);
  });
});

describe('with a repository', () => {
  beforeEach(async () => {
    await cli(['init']);
  });

  it('add and status', async () => {
    writeWork(root, 'a.txt', 'a');
    writeWork(root, 'dir/b.txt', 'b');
    expect((await cli(['add', 'a.txt', 'dir/b.txt'])).out).toEqual(['Staged 2 files']);
    expect((await cli(['status'])).out).toEqual([
      `Status of repository at ${root}:`,
      '2 files staged for commit:',
      '- a.txt',
      `- ${path.join('dir', 'b.txt')}`,
      'HEAD is checked out.',
    ]);
  });

  it('status with nothing staged', async () => {
    expect((await cli(['status'])).out).toEqual([
      `Status of repository at ${root}:`,
      'No files staged for commit.',
      'HEAD is checked out.',
    ]);
  });

  it('add from a subdirectory resolves against it', async () => {
    const sub = path.join(root, 'sub');
    writeWork(root, 'sub/x.txt', 'x');
    expect((await cli(['add', 'x.txt'], sub)).out).toEqual(['Staged 1 file']);
    const status = await cli(['status'], sub);
    expect(status.out[1]).toBe('1 file staged for commit:');
    expect(status.out[2]).toBe('- x.txt');
  });

  it('add warns about already staged files', async () => {
    writeWork(root, 'a.txt', 'a');
    writeWork(root, 'b.txt', 'b');
    await cli(['add', 'a.txt']);
    expect(await cli(['add', 'a.txt', 'b.txt'])).toEqual({
      code: 0,
      out: ['Staged 1 file'],
      err: ['a.txt already staged'],
    });
  });

  it('add of a missing file fails', async () => {
    const result = await cli(['add', 'missing.txt']);
    expect(result.code).toBe(1);
    expect(result.err).toEqual([`error: File not found: ${path.join(root, 'missing.txt')}`]);
  });

  it('remove unstages a file', async () => {
    writeWork(root, 'a.txt', 'a');
    await cli(['add', 'a.txt']);
    expect((await cli(['remove', 'a.txt'])).out).toEqual(['Unstaged a.txt']);
    expect((await cli(['status'])).out[1]).toBe('No files staged for commit.');
  });

  it('commit with nothing staged fails', async () => {
    expect(await cli(['commit', '-m', 'empty'])).toEqual({
      code: 1,
      out: [],
      err: ['error: Nothing to commit: no staged files and no deleted tracked files'],
    });
  });

  it('commit without -m asks the editor', async () => {
    editorText = 'typed in editor';
    writeWork(root, 'a.txt', 'a');
    await cli(['add', 'a.txt']);
    const result = await cli(['commit']);
    expect(result.code).toBe(0);
    expect((await cli(['log', '-s'])).out[2]).toMatch(/^[0-9a-f]{40} typed in editor$/);
  });

  it('log -s prints one line per commit, oldest first', async () => {
    const h1 = await commit({ 'a.txt': 'a' }, 'first\nmore detail');
    const h2 = await commit({ 'b.txt': 'b' }, 'second');
    expect((await cli(['log', '-s'])).out).toEqual(['2 commits', '', `${h1} first`, `${h2} second`]);
  });

  it('log prints full messages with dates', async () => {
    const h1 = await commit({ 'a.txt': 'a' }, 'first\nmore detail');
    const h2 = await commit({ 'b.txt': 'b' }, 'second');
    const out = (await cli(['log'])).out;
    expect(out[0]).toBe('2 commits');
    expect(out[2]).toBe(`Commit ${h1}`);
    expect(out[3]).toMatch(/^Date: \d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    expect(out.slice(4, 10)).toEqual(['', 'first\nmore detail', '', '---', '', `Commit ${h2}`]);
    expect(out.slice(11)).toEqual(['', 'second']);
  });

  it('log of an empty history', async () => {
    expect((await cli(['log'])).out).toEqual(['0 commits']);
  });

  it('checkout asks before leaving HEAD and can be declined', async () => {
    const h1 = await commit({ 'a.txt': 'one' }, 'first');
    await commit({ 'a.txt': 'two' }, 'second');

    answers = [false];
    const result = await cli(['checkout', h1.slice(0, 7)]);
    expect(result).toEqual({ code: 1, out: ['Checkout aborted'], err: [] });
    expect(prompts).toEqual([`Uncommitted changes to tracked files will be lost. Check out ${h1}?`]);
    expect(readWork(root, 'a.txt')).toBe('two');
  });

  it('checkout to an older commit and back', async () => {
    const h1 = await commit({ 'a.txt': 'one' }, 'first');
    await commit({ 'a.txt': 'two' }, 'second');

    answers = [true];
    expect((await cli(['checkout', h1.slice(0, 7)])).out).toEqual([`Checked out commit ${h1}`]);
    expect(readWork(root, 'a.txt')).toBe('one');
    expect((await cli(['status'])).out[2]).toBe(
      `HEAD is not checked out (at ${h1}); some commands are unavailable.`,
    );

    writeWork(root, 'b.txt', 'b');
    const refused = await cli(['add', 'b.txt']);
    expect(refused.code).toBe(1);
    expect(refused.err).toEqual(['error: Cannot add files when HEAD is not checked out']);

    expect((await cli(['checkout', 'HEAD'])).out).toEqual(['Checked out HEAD']);
    expect(readWork(root, 'a.txt')).toBe('two');
    expect(prompts).toHaveLength(1);
  });

  it('checkout -q skips the prompt', async () => {
    const h1 = await commit({ 'a.txt': 'one' }, 'first');
    await commit({ 'a.txt': 'two' }, 'second');
    expect((await cli(['checkout', '-q', h1])).out).toEqual([`Checked out commit ${h1}`]);
    expect(prompts).toEqual([]);
  });

  it('checkout of an unknown prefix fails', async () => {
    await commit({ 'a.txt': 'one' }, 'first');
    expect((await cli(['checkout', 'zzzz'])).err).toEqual(["error: No commit matches 'zzzz'"]);
  });

  it('reset asks for confirmation', async () => {
    const h1 = await commit({ 'a.txt': 'one' }, 'first');
    await commit({ 'a.txt': 'two' }, 'second');

    answers = [false];
    expect(await cli(['reset', h1])).toEqual({ code: 1, out: ['Reset aborted'], err: [] });
    expect(prompts).toEqual([`All commits after ${h1} will be deleted. This cannot be undone. Proceed?`]);

    answers = [true];
    expect((await cli(['reset', h1])).out).toEqual([`Reset to ${h1}; removed 1 commit`]);
    expect((await cli(['log', '-s'])).out).toEqual(['1 commit', '', `${h1} first`]);
  });

  it('reset -y skips the prompt', async () => {
    const h1 = await commit({ 'a.txt': 'one' }, 'first');
    await commit({ 'a.txt': 'two' }, 'second');
    await commit({ 'a.txt': 'three' }, 'third');
    expect((await cli(['reset', '-y', h1])).out).toEqual([`Reset to ${h1}; removed 2 commits`]);
    expect(prompts).toEqual([]);
    expect(readWork(root, 'a.txt')).toBe('one');
  });

  it('reset while detached fails before prompting', async () => {
    const h1 = await commit({ 'a.txt': 'one' }, 'first');
    await commit({ 'a.txt': 'two' }, 'second');
    await cli(['checkout', '-q', h1]);

    const result = await cli(['reset', h1]);
    expect(result.code).toBe(1);
    expect(result.err).toEqual(['error: Cannot reset when HEAD is not checked out']);
    expect(prompts).toEqual([]);
  });

  it('honors SNAPVC_DIR', async () => {
    const out: string[] = [];
    const code = await run(['node', 'snapvc', 'init'], {
      cwd: root,
      env: { SNAPVC_DIR: '.alt' },
      out: (line) => out.push(line),
      err: () => undefined,
      confirm: async () => false,
      editMessage: async () => '',
    });
    expect(code).toBe(0);
    expect(out).toEqual([`Initialized snapvc repository in ${path.join(root, '.alt')}`]);
    expect(fs.existsSync(path.join(root, '.alt', 'commits.json'))).toBe(true);
  });
});

describe('configuration errors', () => {
  async function runWithEnv(env: NodeJS.ProcessEnv): Promise<{ code: number; err: string[] }> {
    const err: string[] = [];
    const code = await run(['node', 'snapvc', 'status'], {
      cwd: root,
      env,
      out: () => undefined,
      err: (line) => err.push(line.replace(ANSI, '')),
      confirm: async () => false,
      editMessage: async () => '',
    });
    return { code, err };
  }

  it('bad metadata directory exits 1 with one line', async () => {
    expect(await runWithEnv({ SNAPVC_DIR: 'a/b' })).toEqual({
      code: 1,
      err: ['error: invalid configuration: metadataDir: metadataDir must be a single path segment'],
    });
  });

  it('bad log level exits 1 with one line', async () => {
    const result = await runWithEnv({ SNAPVC_LOG_LEVEL: 'loud' });
    expect(result.code).toBe(1);
    expect(result.err).toHaveLength(1);
    expect(result.err[0]).toMatch(/^error: invalid configuration: logLevel: .*'loud'/);
  });
});

describe('argument errors', () => {
  it('unknown command exits non-zero', async () => {
    const result = await cli(['frobnicate']);
    expect(result.code).toBe(1);
    expect(result.err.join('\n')).toMatch(/unknown command 'frobnicate'/);
  });

  it('add without files exits non-zero', async () => {
    const result = await cli(['add']);
    expect(result.code).toBe(1);
    expect(result.err.join('\n')).toMatch(/missing required argument 'files'/);
  });
});
