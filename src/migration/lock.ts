import { randomUUID } from 'node:crypto';
import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import { isErrno } from '../errors.js';
import { getMigrationLockPath } from '../storage/paths.js';
import { createLogger } from '../utils/log.js';

const log = createLogger('MigrationLock');

export const DEFAULT_LOCK_WAIT_MS = 30_000;
const LOCK_POLL_MS = 50;
/** A lock file nobody could parse is treated as abandoned after this long. */
const UNREADABLE_LOCK_GRACE_MS = 5_000;

const LockStateSchema = z.object({
  pid: z.number().int(),
  token: z.string(),
  startedAt: z.string(),
});

export type MigrationLockState = z.infer<typeof LockStateSchema>;

export interface MigrationLock {
  readonly state: MigrationLockState;
  release(): Promise<void>;
}

export interface LockOptions {
  /** How long to wait for a concurrent run before giving up. */
  waitMs?: number;
  pollMs?: number;
}

interface ObservedLock {
  raw: string;
  state: MigrationLockState | null;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function isPidAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return isErrno(error, 'EPERM');
  }
}

function parseLockState(raw: string): MigrationLockState | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = LockStateSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

async function readLock(file: string): Promise<ObservedLock | null> {
  try {
    const raw = await fs.readFile(file, 'utf8');
    return { raw, state: parseLockState(raw) };
  } catch (error) {
    if (isErrno(error, 'ENOENT')) return null;
    throw error;
  }
}

async function isStale(file: string, observed: ObservedLock): Promise<boolean> {
  if (observed.state) return !isPidAlive(observed.state.pid);
  // Possibly a writer between create and write; give it time.
  try {
    const { mtimeMs } = await fs.stat(file);
    return Date.now() - mtimeMs > UNREADABLE_LOCK_GRACE_MS;
  } catch (error) {
    if (isErrno(error, 'ENOENT')) return false;
    throw error;
  }
}

/** Unlink the lock only while it still holds what we saw. */
async function removeIfUnchanged(file: string, raw: string): Promise<void> {
  const current = await readLock(file);
  if (!current || current.raw !== raw) return;
  try {
    await fs.unlink(file);
  } catch (error) {
    if (!isErrno(error, 'ENOENT')) throw error;
  }
}

/**
 * Exclusive claim on migration and rollback for one cache dir, shared by every
 * process that points at it. The lock file is created with `wx`, so exactly one
 * claimant wins; a lock left by a dead process is removed and retried.
 *
 * Resolves to null when another live run still holds the lock after `waitMs`.
 */
export async function acquireMigrationLock(cacheDir: string, options: LockOptions = {}): Promise<MigrationLock | null> {
  const file = getMigrationLockPath(cacheDir);
  const waitMs = options.waitMs ?? DEFAULT_LOCK_WAIT_MS;
  const pollMs = options.pollMs ?? LOCK_POLL_MS;
  const deadline = Date.now() + waitMs;
  await fs.ensureDir(path.dirname(file));

  for (;;) {
    const state: MigrationLockState = { pid: process.pid, token: randomUUID(), startedAt: new Date().toISOString() };
    const raw = JSON.stringify(state);
    try {
      await fs.writeFile(file, raw, { encoding: 'utf8', flag: 'wx' });
      log.debug(`Acquired ${file}`);
      return { state, release: () => removeIfUnchanged(file, raw) };
    } catch (error) {
      if (!isErrno(error, 'EEXIST')) throw error;
    }

    const observed = await readLock(file);
    if (observed && (await isStale(file, observed))) {
      log.warn(`Removing stale migration lock${observed.state ? ` left by pid ${observed.state.pid}` : ''}`);
      await removeIfUnchanged(file, observed.raw);
      continue;
    }
    if (Date.now() >= deadline) {
      return null;
    }
    await sleep(pollMs);
  }
}

export async function readMigrationLock(cacheDir: string): Promise<MigrationLockState | null> {
  const observed = await readLock(getMigrationLockPath(cacheDir));
  return observed?.state ?? null;
}
