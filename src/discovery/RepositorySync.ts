import { errorMessage } from '../errors.js';
import type { RecordStore } from '../storage/StorageAdapter.js';
import { createLogger } from '../utils/log.js';
import { linkProjectsToRepos, parseRemoteSlug } from './linking.js';
import type { ItemFailure, RepoMetadataSource } from './types.js';

const log = createLogger('RepositorySync');

export interface SyncTarget {
  owner: string;
  name: string;
}

export interface SyncResult {
  synced: number;
  notFound: string[];
  failures: ItemFailure[];
  aborted: boolean;
  linkedProjects: number;
}

/**
 * Imports remote repository metadata one repository at a time. Each record is
 * committed as soon as it arrives, so an abort or a failed lookup keeps
 * everything synced before it.
 */
export class RepositorySync {
  constructor(
    private readonly store: RecordStore,
    private readonly source: RepoMetadataSource
  ) {}

  /** Remotes named by stored projects, deduplicated. */
  async targetsFromProjects(): Promise<SyncTarget[]> {
    const slugs = new Set<string>();
    for (const project of await this.store.listProjects()) {
      const slug = project.remoteUrl ? parseRemoteSlug(project.remoteUrl) : null;
      if (slug) slugs.add(slug);
    }
    return [...slugs].sort().flatMap((slug) => {
      const [owner, name] = slug.split('/');
      return owner && name ? [{ owner, name }] : [];
    });
  }

  async sync(targets?: SyncTarget[], options: { signal?: AbortSignal } = {}): Promise<SyncResult> {
    const { signal } = options;
    const list = targets ?? (await this.targetsFromProjects());
    const result: SyncResult = { synced: 0, notFound: [], failures: [], aborted: false, linkedProjects: 0 };

    for (const target of list) {
      if (signal?.aborted) {
        result.aborted = true;
        break;
      }
      const slug = `${target.owner}/${target.name}`;
      try {
        const metadata = await this.source.fetch(target.owner, target.name, signal);
        if (!metadata) {
          result.notFound.push(slug);
          continue;
        }
        await this.store.upsertGitHubRepo(metadata);
        result.synced++;
      } catch (error) {
        if (signal?.aborted) {
          result.aborted = true;
          break;
        }
        log.warn(`Sync of ${slug} failed: ${errorMessage(error)}`);
        result.failures.push({ item: slug, error: errorMessage(error) });
      }
    }

    result.linkedProjects = await linkProjectsToRepos(this.store);
    log.info(
      `Synced ${result.synced}/${list.length} repositories` +
        (result.failures.length ? `, ${result.failures.length} failed` : '') +
        (result.aborted ? ' (aborted)' : '')
    );
    return result;
  }
}
