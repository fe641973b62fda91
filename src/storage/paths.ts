import * as path from 'path';
import type { CacheKey } from '../types/Records.js';

export const DB_FILENAME = 'workdex.db';
export const BACKUP_DIRNAME = 'backup';
export const MANIFEST_FILENAME = 'manifest.json';
export const MIGRATION_LOCK_FILENAME = 'migration.lock';

export function getDatabasePath(baseDir: string): string {
  return path.join(baseDir, DB_FILENAME);
}

// Legacy cache files live directly in the base dir, one per key.
export function getLegacyCacheDir(baseDir: string): string {
  return baseDir;
}

export function getCacheFile(cacheDir: string, key: string): string {
  return path.join(cacheDir, `${key}.json`);
}

export function getBackupDir(cacheDir: string): string {
  return path.join(cacheDir, BACKUP_DIRNAME);
}

export function getBackupFile(cacheDir: string, key: CacheKey): string {
  return path.join(getBackupDir(cacheDir), `${key}.json`);
}

export function getManifestPath(cacheDir: string): string {
  return path.join(getBackupDir(cacheDir), MANIFEST_FILENAME);
}

export function getMigrationLockPath(cacheDir: string): string {
  return path.join(getBackupDir(cacheDir), MIGRATION_LOCK_FILENAME);
}
