import * as fs from 'fs-extra';
import * as path from 'path';
import { errorMessage } from '../errors.js';
import { createLogger } from '../utils/log.js';
import type { DiscoveredRepository, RepositoryScanner } from './types.js';

const log = createLogger('GitDirectoryScanner');

const DEFAULT_SKIP = new Set(['node_modules', 'vendor', '.cache', '.venv', 'target', 'dist']);

export interface GitDirectoryScannerOptions {
  /** Directory levels below the root to descend. */
  maxDepth?: number;
  skip?: Iterable<string>;
}

/**
 * Remote URL from a git config file: `origin` when present, otherwise the
 * first remote that has a url.
 */
export function parseRemoteFromConfig(config: string): string | null {
  let section: string | null = null;
  const remotes = new Map<string, string>();
  for (const rawLine of config.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) continue;
    const header = /^\[\s*remote\s+"([^"]+)"\s*\]$/.exec(line);
    if (header) {
      section = header[1] ?? null;
      continue;
    }
    if (line.startsWith('[')) {
      section = null;
      continue;
    }
    const kv = /^url\s*=\s*(.+)$/.exec(line);
    if (section && kv?.[1] && !remotes.has(section)) {
      remotes.set(section, kv[1].trim());
    }
  }
  const [first] = [...remotes.values()];
  return remotes.get('origin') ?? first ?? null;
}

/** Branch name from HEAD, or null when detached. */
export function parseBranchFromHead(head: string): string | null {
  const match = /^ref:\s*refs\/heads\/(.+)$/.exec(head.trim());
  return match?.[1] ?? null;
}

/**
 * Walks a directory tree looking for `.git` entries. Reads `.git/config` and
 * `.git/HEAD` directly so no git binary is needed. Unreadable directories are
 * logged and skipped.
 */
export class GitDirectoryScanner implements RepositoryScanner {
  private readonly maxDepth: number;
  private readonly skip: Set<string>;

  constructor(options: GitDirectoryScannerOptions = {}) {
    this.maxDepth = options.maxDepth ?? 4;
    this.skip = new Set(options.skip ?? DEFAULT_SKIP);
  }

  async *scan(root: string, signal?: AbortSignal): AsyncIterable<DiscoveredRepository> {
    const base = path.resolve(root);
    const queue: Array<{ dir: string; depth: number }> = [{ dir: base, depth: 0 }];

    while (queue.length > 0) {
      signal?.throwIfAborted();
      const next = queue.shift();
      if (!next) break;

      let entries: fs.Dirent[];
      try {
        entries = await fs.readdir(next.dir, { withFileTypes: true });
      } catch (error) {
        log.debug(`Skipping ${next.dir}: ${errorMessage(error)}`);
        continue;
      }

      const hasGit = entries.some((e) => e.name === '.git' && (e.isDirectory() || e.isFile()));
      if (hasGit && next.dir !== base) {
        yield await this.describe(next.dir, base);
      }

      if (next.depth >= this.maxDepth) continue;
      for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
        if (!entry.isDirectory() || entry.name === '.git' || this.skip.has(entry.name)) continue;
        queue.push({ dir: path.join(next.dir, entry.name), depth: next.depth + 1 });
      }
    }
  }

  private async describe(dir: string, root: string): Promise<DiscoveredRepository> {
    const gitDir = await this.resolveGitDir(dir);
    const [config, head, mtime] = await Promise.all([
      this.readOptional(path.join(gitDir, 'config')),
      this.readOptional(path.join(gitDir, 'HEAD')),
      this.mtimeOf(gitDir),
    ]);
    return {
      path: dir,
      name: path.basename(dir),
      root,
      remoteUrl: config ? parseRemoteFromConfig(config) : null,
      branch: head ? parseBranchFromHead(head) : null,
      lastModified: mtime,
    };
  }

  // Worktrees and submodules have a `.git` file pointing at the real git dir.
  private async resolveGitDir(dir: string): Promise<string> {
    const dotGit = path.join(dir, '.git');
    const stat = await fs.stat(dotGit);
    if (stat.isDirectory()) return dotGit;
    const content = await fs.readFile(dotGit, 'utf8');
    const match = /^gitdir:\s*(.+)$/m.exec(content);
    return match?.[1] ? path.resolve(dir, match[1].trim()) : dotGit;
  }

  private async mtimeOf(file: string): Promise<string | null> {
    try {
      return (await fs.stat(file)).mtime.toISOString();
    } catch (error) {
      log.debug(`Cannot stat ${file}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async readOptional(file: string): Promise<string | null> {
    try {
      return await fs.readFile(file, 'utf8');
    } catch (error) {
      log.debug(`Cannot read ${file}: ${errorMessage(error)}`);
      return null;
    }
  }
}
