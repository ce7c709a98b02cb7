/**
 * `snapvc` command-line interface.
 *
 * Thin wrapper over Repository: argument parsing, path resolution against
 * the current directory, confirmation prompts, and output formatting.
 */

import * as path from 'node:path';
import { confirm, editor } from '@inquirer/prompts';
import chalk from 'chalk';
import { Command, CommanderError } from 'commander';
import { ZodError } from 'zod';
import { Repository, type RepositoryOpenOptions } from './repository.js';
import { findRepositoryRoot } from './locate.js';
import { loadOptionsFromEnv, resolveOptions } from './config.js';
import { Logger } from './logger.js';
import {
  NotConfirmedError,
  RepositoryNotMutableError,
  SnapvcError,
  type CheckoutResult,
  type FsModule,
} from './types.js';

/** Everything the CLI needs from its environment. */
export interface CliIO {
  cwd: string;
  env: NodeJS.ProcessEnv;
  out(line: string): void;
  err(line: string): void;
  confirm(message: string): Promise<boolean>;
  editMessage(): Promise<string>;
  fs?: FsModule;
}

export function defaultIO(): CliIO {
  return {
    cwd: process.cwd(),
    env: process.env,
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
    confirm: (message) => confirm({ message, default: false }),
    editMessage: async () => (await editor({ message: 'Commit message' })).replace(/\s+$/, ''),
  };
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

/**
 * Build the commander program. Actions write through `io` and record a
 * non-zero exit code in `status` when the user aborts.
 */
export function createProgram(io: CliIO, status: { exitCode: number }): Command {
  const envOptions = loadOptionsFromEnv(io.env);
  const options = resolveOptions(envOptions);
  const openOpts: RepositoryOpenOptions = {
    ...envOptions,
    fs: io.fs,
    logger: new Logger({ level: options.logLevel }),
  };

  const display = (abs: string): string => path.relative(io.cwd, abs) || '.';

  async function openRepo(): Promise<Repository> {
    const root = await findRepositoryRoot(io.cwd, { metadataDir: options.metadataDir, fs: io.fs });
    return Repository.open(root, openOpts);
  }

  const program = new Command('snapvc')
    .description('Minimal local version control: stage, commit, and restore snapshots')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.out(str.replace(/\n$/, '')),
      writeErr: (str) => io.err(str.replace(/\n$/, '')),
    });

  program
    .command('init')
    .description('Create a repository in the current directory')
    .action(async () => {
      const result = await new Repository(io.cwd, openOpts).init();
      if (result.created) {
        io.out(`Initialized snapvc repository in ${path.join(result.root, options.metadataDir)}`);
      } else {
        io.out(`Repository already initialized at ${result.root}`);
      }
    });

  program
    .command('add')
    .description('Stage files for the next commit')
    .argument('<files...>', 'files to stage')
    .action(async (files: string[]) => {
      const repo = await openRepo();
      const result = await repo.stage(files.map((f) => path.resolve(io.cwd, f)));
      for (const file of result.alreadyStaged) io.err(chalk.yellow(`${display(file)} already staged`));
      io.out(`Staged ${plural(result.added.length, 'file')}`);
    });

  program
    .command('remove')
    .description('Unstage a file')
    .argument('<file>', 'file to unstage')
    .action(async (file: string) => {
      const repo = await openRepo();
      const abs = await repo.unstage(path.resolve(io.cwd, file));
      io.out(`Unstaged ${display(abs)}`);
    });

  program
    .command('commit')
    .description('Commit staged files and deletions of tracked files')
    .option('-m, --message <text>', 'commit message (opens an editor when omitted)')
    .action(async (opts: { message?: string }) => {
      const repo = await openRepo();
      const result = await repo.commit(opts.message ?? { requestMessage: () => io.editMessage() });
      for (const w of result.warnings) io.err(chalk.yellow(`warning: ${w.path}: ${w.error}`));
      io.out(`Commit ${result.hash}`);
    });

  program
    .command('log')
    .description('List commits, oldest first')
    .option('-s, --short', 'only the first line of each message')
    .action(async (opts: { short?: boolean }) => {
      const repo = await openRepo();
      const lines: string[] = [];
      let count = 0;
      for await (const entry of repo.log(opts.short ? 'short' : 'full')) {
        if (opts.short) {
          lines.push(`${chalk.yellow(entry.hash)} ${entry.message}`);
        } else {
          if (count > 0) lines.push('', '---', '');
          lines.push(`${chalk.yellow(`Commit ${entry.hash}`)}`);
          lines.push(`Date: ${new Date(entry.timestamp).toISOString()}`, '', entry.message);
        }
        count++;
      }
      io.out(plural(count, 'commit'));
      if (count > 0) io.out('');
      for (const line of lines) io.out(line);
    });

  program
    .command('status')
    .description('Show staged files and whether HEAD is checked out')
    .action(async () => {
      const repo = await openRepo();
      const report = await repo.status();
      io.out(`Status of repository at ${report.root}:`);
      if (report.staged.length === 0) {
        io.out('No files staged for commit.');
      } else {
        io.out(`${plural(report.staged.length, 'file')} staged for commit:`);
        for (const file of report.staged) io.out(`- ${display(file)}`);
      }
      if (report.head) {
        io.out('HEAD is checked out.');
      } else {
        io.out(`HEAD is not checked out (at ${report.current ?? 'nothing'}); some commands are unavailable.`);
      }
    });

  program
    .command('checkout')
    .description('Restore the working tree to a commit (hash prefix or HEAD)')
    .argument('<ref>', 'commit hash prefix, or HEAD')
    .option('-q, --quiet', 'do not ask before discarding uncommitted changes')
    .action(async (ref: string, opts: { quiet?: boolean }) => {
      const repo = await openRepo();
      let result: CheckoutResult;
      try {
        result = await repo.checkout(ref, { confirmed: opts.quiet === true });
      } catch (err) {
        if (!(err instanceof NotConfirmedError)) throw err;
        const target = await repo.resolve(ref);
        const ok = await io.confirm(`Uncommitted changes to tracked files will be lost. Check out ${target.hash}?`);
        if (!ok) {
          io.out('Checkout aborted');
          status.exitCode = 1;
          return;
        }
        result = await repo.checkout(target.hash, { confirmed: true });
      }
      io.out(result.head ? 'Checked out HEAD' : `Checked out commit ${result.hash}`);
    });

  program
    .command('reset')
    .description('Restore a commit and permanently delete every later commit')
    .argument('<ref>', 'commit hash prefix, or HEAD')
    .option('-y, --yes', 'do not ask for confirmation')
    .action(async (ref: string, opts: { yes?: boolean }) => {
      const repo = await openRepo();
      if (!(await repo.isHead())) throw new RepositoryNotMutableError('reset');
      const target = await repo.resolve(ref);
      if (!opts.yes) {
        const ok = await io.confirm(
          `All commits after ${target.hash} will be deleted. This cannot be undone. Proceed?`,
        );
        if (!ok) {
          io.out('Reset aborted');
          status.exitCode = 1;
          return;
        }
      }
      const result = await repo.reset(target.hash, { confirmed: true });
      io.out(`Reset to ${result.hash}; removed ${plural(result.removed.length, 'commit')}`);
    });

  return program;
}

/**
 * Parse `argv` (including the node and script entries) and run the command.
 *
 * @returns Process exit code.
 */
export async function run(argv: readonly string[], io: CliIO = defaultIO()): Promise<number> {
  const status = { exitCode: 0 };
  try {
    await createProgram(io, status).parseAsync([...argv]);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    if (err instanceof SnapvcError) {
      io.err(chalk.red(`error: ${err.message}`));
      return 1;
    }
    if (err instanceof ZodError) {
      const issues = err.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
      io.err(chalk.red(`error: invalid configuration: ${issues.join('; ')}`));
      return 1;
    }
    throw err;
  }
  return status.exitCode;
}
