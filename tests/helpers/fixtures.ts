import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { NANOS_PER_MS } from '../../src/types/LegacyCache.js';
import type { CacheKey } from '../../src/types/Records.js';

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `workdex-${prefix}-`));
}

export async function removeTempDir(dir: string | undefined): Promise<void> {
  if (dir) await fs.remove(dir);
}

export interface LegacyFileOptions {
  timestamp?: string;
  ttlMs?: number;
}

/** Write `<key>.json` in the envelope older builds produced; returns the file path. */
export async function writeLegacyFile(
  dir: string,
  key: CacheKey,
  data: unknown,
  options: LegacyFileOptions = {}
): Promise<string> {
  const file = path.join(dir, `${key}.json`);
  const envelope = {
    data,
    timestamp: options.timestamp ?? '2024-05-01T10:00:00.123456789+02:00',
    ttl: (options.ttlMs ?? 300_000) * NANOS_PER_MS,
  };
  await fs.outputFile(file, JSON.stringify(envelope, null, 2));
  return file;
}

/** Create a working tree with a `.git` dir holding config and HEAD. */
export async function makeGitRepo(
  dir: string,
  options: { remote?: string; branch?: string | null } = {}
): Promise<string> {
  const gitDir = path.join(dir, '.git');
  const config = options.remote
    ? `[core]\n\trepositoryformatversion = 0\n[remote "origin"]\n\turl = ${options.remote}\n\tfetch = +refs/heads/*:refs/remotes/origin/*\n`
    : '[core]\n\trepositoryformatversion = 0\n';
  const head = options.branch === null ? '3f1c2a9d0b7e4c6a8f5d2e1b0c9a8d7e6f5a4b3c\n' : `ref: refs/heads/${options.branch ?? 'main'}\n`;
  await fs.outputFile(path.join(gitDir, 'config'), config);
  await fs.outputFile(path.join(gitDir, 'HEAD'), head);
  return dir;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
