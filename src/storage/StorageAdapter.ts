import type {
  CacheMetadata,
  CacheMetadataInput,
  DirUsage,
  DirUsageInput,
  GitHubRepo,
  GitHubRepoInput,
  Project,
  ProjectDir,
  ProjectDirInput,
  ProjectInput,
  RankedDirUsage,
  StoreStats,
  TableName,
} from '../types/Records.js';

export interface ProjectLink {
  path: string;
  githubRepoId: number;
}

/**
 * Record store interface used by the caches, the migrator and discovery.
 * Every write resolves conflicts on the record's natural key in one statement.
 */
export interface RecordStore {
  // Single-record upserts
  upsertProject(project: ProjectInput): Promise<void>;
  upsertProjectDir(dir: ProjectDirInput): Promise<void>;
  /** Records a visit: new rows start at `frequency` (default 1), existing rows get +1. */
  upsertDirUsage(usage: DirUsageInput): Promise<void>;
  /** Imports a usage row without inflating it: frequency becomes max(stored, imported). */
  importDirUsage(usage: DirUsageInput): Promise<void>;
  upsertGitHubRepo(repo: GitHubRepoInput): Promise<void>;
  upsertCacheMetadata(meta: CacheMetadataInput): Promise<void>;

  // Batch operations run inside one transaction
  upsertProjects(projects: ProjectInput[]): Promise<number>;
  upsertProjectDirs(dirs: ProjectDirInput[]): Promise<number>;
  importDirUsages(usages: DirUsageInput[]): Promise<number>;
  upsertGitHubRepos(repos: GitHubRepoInput[]): Promise<number>;
  replaceProjects(projects: ProjectInput[]): Promise<number>;
  replaceProjectDirs(dirs: ProjectDirInput[]): Promise<number>;
  /** Points each project at a remote repo id; rows not listed keep their link. */
  setProjectLinks(links: ProjectLink[]): Promise<number>;

  // Queries
  listProjects(): Promise<Project[]>;
  listProjectDirs(): Promise<ProjectDir[]>;
  listGitHubRepos(): Promise<GitHubRepo[]>;
  listDirUsage(options?: { limit?: number; now?: Date }): Promise<RankedDirUsage[]>;
  listCacheMetadata(): Promise<CacheMetadata[]>;
  getProject(path: string): Promise<Project | null>;
  getGitHubRepo(fullName: string): Promise<GitHubRepo | null>;
  getDirUsage(path: string): Promise<DirUsage | null>;
  getCacheMetadata(cacheKey: string): Promise<CacheMetadata | null>;

  // Similarity search
  rankProjects(query: string, limit?: number): Promise<Project[]>;
  searchProjects(query: string, limit?: number): Promise<Project[]>;
  similarProjects(targetPath: string, limit?: number): Promise<Project[]>;

  // Maintenance
  clear(tables: readonly TableName[]): Promise<void>;
  stats(): Promise<StoreStats>;
  countLinkedProjects(): Promise<number>;

  close(): void;
}
