import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  Logger,
  Repository,
  type LogRecord,
  type LogTransport,
  type RepositoryOpenOptions,
} from '../src/index.js';

export function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'snapvc-test-'));
}

export function rmTmpDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Collects log records in memory. */
export class MemoryTransport implements LogTransport {
  records: LogRecord[] = [];

  log(entry: LogRecord): void {
    this.records.push(entry);
  }

  messages(level: LogRecord['level']): string[] {
    return this.records.filter((r) => r.level === level).map((r) => r.message);
  }
}

export function memoryLogger(): { logger: Logger; logs: MemoryTransport } {
  const logs = new MemoryTransport();
  return { logger: new Logger({ level: 'debug', transports: [logs] }), logs };
}

/** Create an initialized repository in a fresh temporary directory. */
export async function freshRepo(opts: RepositoryOpenOptions = {}): Promise<{
  repo: Repository;
  root: string;
  logs: MemoryTransport;
}> {
  const root = makeTmpDir();
  const { logger, logs } = memoryLogger();
  const repo = await Repository.open(root, { logger, ...opts, create: true });
  return { repo, root, logs };
}

export function writeWork(root: string, rel: string, content: string | Uint8Array): void {
  const full = path.join(root, rel);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, content);
}

export function readWork(root: string, rel: string): string {
  return fs.readFileSync(path.join(root, rel), 'utf8');
}

export function existsWork(root: string, rel: string): boolean {
  return fs.existsSync(path.join(root, rel));
}

/** Sorted repo paths of every file in a directory tree. */
export function listFiles(dir: string, relDir = ''): string[] {
  const result: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const rel = relDir ? `${relDir}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      result.push(...listFiles(path.join(dir, entry.name), rel));
    } else {
      result.push(rel);
    }
  }
  return result.sort();
}

/** Stage the given files and commit them. */
export async function commitFiles(
  repo: Repository,
  root: string,
  files: Record<string, string>,
  message: string,
): Promise<string> {
  for (const [rel, content] of Object.entries(files)) writeWork(root, rel, content);
  await repo.stage(Object.keys(files));
  const result = await repo.commit(message);
  return result.hash;
}

export async function collect<T>(iter: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of iter) out.push(item);
  return out;
}

export { fs };
