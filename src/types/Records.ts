export type TableName = 'projects' | 'project_dirs' | 'github_repos' | 'dir_usage' | 'cache_metadata';

export const TABLES: readonly TableName[] = ['projects', 'project_dirs', 'github_repos', 'dir_usage', 'cache_metadata'];

/** Natural key column of each table; upserts resolve conflicts on it. */
export const NATURAL_KEYS: Record<TableName, string> = {
  projects: 'path',
  project_dirs: 'path',
  github_repos: 'full_name',
  dir_usage: 'path',
  cache_metadata: 'cache_key',
};

export type CacheKey = 'projects' | 'project-dirs' | 'dirs';

export const CACHE_KEYS: readonly CacheKey[] = ['projects', 'project-dirs', 'dirs'];

// All timestamps are ISO-8601 UTC strings.

export interface Project {
  id: number;
  path: string;
  name: string;
  remoteUrl: string | null;
  branch: string | null;
  lastModified: string | null;
  gitCount: number;
  githubRepoId: number | null;
  rootPath: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface ProjectInput {
  path: string;
  name: string;
  remoteUrl?: string | null;
  branch?: string | null;
  lastModified?: string | null;
  gitCount?: number;
  /** Omit to keep whatever link is already stored. */
  githubRepoId?: number | null;
  rootPath?: string | null;
}

export interface ProjectDir {
  id: number;
  path: string;
  lastScanned: string | null;
  gitCount: number;
  createdAt: string;
  updatedAt: string;
}

export interface ProjectDirInput {
  path: string;
  lastScanned?: string | null;
  gitCount?: number;
}

export interface DirUsage {
  id: number;
  path: string;
  frequency: number;
  lastSeen: string;
  createdAt: string;
  updatedAt: string;
}

export interface DirUsageInput {
  path: string;
  /** Initial frequency for a new row; existing rows are incremented by one. */
  frequency?: number;
  lastSeen?: string;
}

export interface GitHubRepo {
  id: number;
  name: string;
  fullName: string;
  description: string | null;
  url: string | null;
  cloneUrl: string | null;
  sshUrl: string | null;
  isPrivate: boolean;
  isFork: boolean;
  updatedAt: string | null;
  lastDiscovered: string;
  createdAt: string;
}

export interface GitHubRepoInput {
  name: string;
  fullName: string;
  description?: string | null;
  url?: string | null;
  cloneUrl?: string | null;
  sshUrl?: string | null;
  isPrivate?: boolean;
  isFork?: boolean;
  updatedAt?: string | null;
}

export interface CacheMetadata {
  id: number;
  cacheKey: string;
  lastUpdated: string;
  ttlSeconds: number;
  dataHash: string | null;
  createdAt: string;
}

export interface CacheMetadataInput {
  cacheKey: string;
  lastUpdated?: string;
  ttlSeconds: number;
  dataHash?: string | null;
}

export type StoreStats = Record<TableName, number>;

export interface RankedDirUsage extends DirUsage {
  score: number;
}
