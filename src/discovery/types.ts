import type { GitHubRepoInput } from '../types/Records.js';

export interface DiscoveredRepository {
  /** Absolute path of the working tree. */
  path: string;
  name: string;
  /** The scan root it was found under. */
  root: string;
  remoteUrl: string | null;
  branch: string | null;
  lastModified: string | null;
}

/** Finds git working trees below a root directory. */
export interface RepositoryScanner {
  scan(root: string, signal?: AbortSignal): AsyncIterable<DiscoveredRepository>;
}

export type RepoMetadata = GitHubRepoInput;

/**
 * Remote hosting metadata lookup. Resolves null when the repository does not
 * exist or is not visible; rejects on transport failures.
 */
export interface RepoMetadataSource {
  fetch(owner: string, name: string, signal?: AbortSignal): Promise<RepoMetadata | null>;
}

export interface ItemFailure {
  item: string;
  error: string;
}
