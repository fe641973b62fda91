import { createHash, randomUUID } from 'node:crypto';
import * as fs from 'fs-extra';
import { z } from 'zod';
import { MigrationError, errorMessage } from '../errors.js';
import { getManifestPath } from '../storage/paths.js';
import type { CacheKey } from '../types/Records.js';

export const MANIFEST_VERSION = 1;

/**
 * Per-file progress. A file moves backed-up → imported → removed; a run that
 * stops anywhere along the way resumes from the recorded status.
 */
export type ManifestFileStatus = 'backed-up' | 'imported' | 'removed';

const ManifestFileSchema = z.object({
  key: z.enum(['projects', 'project-dirs', 'dirs']),
  /** File name relative to the cache dir. */
  file: z.string(),
  /** File name relative to the backup dir. */
  backup: z.string(),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
  sizeBytes: z.number().int().nonnegative(),
  /** Distinct records imported from the file. */
  records: z.number().int().nonnegative(),
  /** Entries rejected by validation. */
  skipped: z.number().int().nonnegative(),
  status: z.enum(['backed-up', 'imported', 'removed']),
  updatedAt: z.string(),
});

const ManifestSchema = z.object({
  version: z.literal(MANIFEST_VERSION),
  startedAt: z.string(),
  completedAt: z.string().nullable(),
  linkedProjects: z.number().int().nonnegative().default(0),
  files: z.array(ManifestFileSchema),
});

export type ManifestFile = z.infer<typeof ManifestFileSchema>;
export type Manifest = z.infer<typeof ManifestSchema>;

export function createManifest(now: Date): Manifest {
  return { version: MANIFEST_VERSION, startedAt: now.toISOString(), completedAt: null, linkedProjects: 0, files: [] };
}

export async function readManifest(cacheDir: string): Promise<Manifest | null> {
  const file = getManifestPath(cacheDir);
  if (!(await fs.pathExists(file))) return null;
  let raw: unknown;
  try {
    raw = await fs.readJson(file);
  } catch (error) {
    throw new MigrationError(`Migration manifest is unreadable: ${errorMessage(error)}`, { file }, { cause: error });
  }
  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MigrationError(`Migration manifest is invalid: ${parsed.error.issues[0]?.message ?? 'unknown'}`, { file });
  }
  return parsed.data;
}

/** Atomic replace so an interrupted write leaves the previous manifest intact. */
export async function writeManifest(cacheDir: string, manifest: Manifest): Promise<void> {
  const file = getManifestPath(cacheDir);
  const tmp = `${file}.${process.pid}.${randomUUID()}.tmp`;
  try {
    await fs.outputFile(tmp, JSON.stringify(manifest, null, 2));
    await fs.rename(tmp, file);
  } catch (error) {
    await fs.remove(tmp);
    throw error;
  }
}

export function findEntry(manifest: Manifest, key: CacheKey): ManifestFile | undefined {
  return manifest.files.find((f) => f.key === key);
}

export function upsertEntry(manifest: Manifest, entry: ManifestFile): void {
  const index = manifest.files.findIndex((f) => f.key === entry.key);
  if (index >= 0) {
    manifest.files[index] = entry;
  } else {
    manifest.files.push(entry);
  }
}

export function removeEntry(manifest: Manifest, key: CacheKey): void {
  manifest.files = manifest.files.filter((f) => f.key !== key);
}

export async function fileDigest(file: string): Promise<{ sha256: string; sizeBytes: number }> {
  const content = await fs.readFile(file);
  return { sha256: createHash('sha256').update(content).digest('hex'), sizeBytes: content.length };
}
