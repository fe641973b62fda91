export * from './errors.js';
export * from './types/Records.js';
export {
  parseLegacyTime,
  parsePayload,
  serializePayload,
  isCacheKey,
  type LegacyProject,
  type LegacyProjectDir,
  type LegacyDir,
  type LegacyPayload,
} from './types/LegacyCache.js';

export { loadConfig, resolveBaseDir, type WorkdexConfig, type LoadConfigOptions, type OutputFormat } from './config.js';
export { createLogger, setVerbose, type Logger } from './utils/log.js';

export type { RecordStore, ProjectLink } from './storage/StorageAdapter.js';
export { SqliteStore, type SqliteStoreOptions } from './storage/SqliteStore.js';
export { withBusyRetry, DEFAULT_RETRY, type RetryOptions } from './storage/retry.js';
export { SCHEMA_VERSION } from './storage/schema.js';
export { getDatabasePath, getLegacyCacheDir, getBackupDir, getManifestPath, getMigrationLockPath } from './storage/paths.js';

export { frecencyScore, rankByFrecency, type FrecencyInput, type Scored } from './ranking/frecency.js';

export { FileCache, DEFAULT_TTLS, readLegacyFile, type CacheLookup, type CacheEntryInfo } from './cache/FileCache.js';
export { StoreCache, type StoreCacheOptions, type CacheStats, type CacheKeyStatus } from './cache/StoreCache.js';

export {
  MigrationManager,
  type MigrateOptions,
  type MigrationProgress,
  type MigrationResult,
  type MigrationState,
  type MigrationStatus,
  type MigrationValidationResult,
  type RollbackResult,
} from './migration/MigrationManager.js';

export { acquireMigrationLock, readMigrationLock, type MigrationLock, type MigrationLockState } from './migration/lock.js';

export { IntegrityChecker, type IntegrityReport, type IntegrityCheck } from './integrity/IntegrityChecker.js';

export { GitDirectoryScanner } from './discovery/GitDirectoryScanner.js';
export { ProjectIndexer, type DiscoveryResult } from './discovery/ProjectIndexer.js';
export { RepositorySync, type SyncResult, type SyncTarget } from './discovery/RepositorySync.js';
export { linkProjectsToRepos, parseRemoteSlug } from './discovery/linking.js';
export type { DiscoveredRepository, RepositoryScanner, RepoMetadataSource } from './discovery/types.js';

export { WorkdexCLI } from './cli/workdex-cli.js';
