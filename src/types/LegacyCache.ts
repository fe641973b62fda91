import { z } from 'zod';
import type { CacheKey } from './Records.js';

export const NANOS_PER_MS = 1_000_000;

/**
 * Timestamps written by older builds carry nanosecond fractions and zone
 * offsets (`2024-03-01T09:15:02.123456789+01:00`); Date only reads three
 * fraction digits. The zero time (`0001-01-01T00:00:00Z`) means "never".
 */
export function parseLegacyTime(value: string): string | null | undefined {
  const trimmed = value.trim().replace(/(\.\d{3})\d+/, '$1');
  const ms = Date.parse(trimmed);
  if (Number.isNaN(ms)) return undefined;
  if (new Date(ms).getUTCFullYear() <= 1) return null;
  return new Date(ms).toISOString();
}

const LegacyTime = z.string().transform((value, ctx): string | null => {
  const parsed = parseLegacyTime(value);
  if (parsed === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

// Older writers used exported field names without JSON tags ("Path", "Remote")
// and readers matched them case-insensitively. Fold keys before validating.
function foldKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return value;
  return Object.fromEntries(Object.entries(value).map(([k, v]) => [k.toLowerCase().replace(/_/g, ''), v]));
}

// ─── Payload items ────────────────────────────────────────────────────────────

export interface LegacyProject {
  path: string;
  remote: string | null;
  branch: string | null;
}

export interface LegacyProjectDir {
  path: string;
  lastScanned: string | null;
  gitCount: number;
}

export interface LegacyDir {
  path: string;
  frequency: number;
  lastSeen: string | null;
}

export interface LegacyItemMap {
  projects: LegacyProject;
  'project-dirs': LegacyProjectDir;
  dirs: LegacyDir;
}

export type LegacyPayload<K extends CacheKey> = Array<LegacyItemMap[K]>;

const Path = z.string().min(1);

export const LegacyProjectSchema: z.ZodType<LegacyProject, z.ZodTypeDef, unknown> = z.preprocess(
  foldKeys,
  z
    .object({
      path: Path,
      remote: z.string().nullish(),
      branch: z.string().nullish(),
    })
    .transform((p) => ({ path: p.path, remote: p.remote || null, branch: p.branch || null }))
);

export const LegacyProjectDirSchema: z.ZodType<LegacyProjectDir, z.ZodTypeDef, unknown> = z.preprocess(
  foldKeys,
  z
    .object({
      path: Path,
      lastscanned: LegacyTime.nullish(),
      gitcount: z.number().int().nonnegative().optional(),
    })
    .transform((d) => ({ path: d.path, lastScanned: d.lastscanned ?? null, gitCount: d.gitcount ?? 0 }))
);

export const LegacyDirSchema: z.ZodType<LegacyDir, z.ZodTypeDef, unknown> = z.preprocess(
  foldKeys,
  z
    .object({
      path: Path,
      frequency: z.number().int().positive().optional(),
      lastseen: LegacyTime.nullish(),
    })
    .transform((d) => ({ path: d.path, frequency: d.frequency ?? 1, lastSeen: d.lastseen ?? null }))
);

const ITEM_SCHEMAS: { [K in CacheKey]: z.ZodType<LegacyItemMap[K], z.ZodTypeDef, unknown> } = {
  projects: LegacyProjectSchema,
  'project-dirs': LegacyProjectDirSchema,
  dirs: LegacyDirSchema,
};

// Written back in the field names older readers expect.
const SERIALIZERS: { [K in CacheKey]: (item: LegacyItemMap[K]) => Record<string, unknown> } = {
  projects: (p) => ({ Path: p.path, Remote: p.remote ?? '', Branch: p.branch ?? '' }),
  'project-dirs': (d) => ({ path: d.path, last_scanned: d.lastScanned ?? '0001-01-01T00:00:00Z', git_count: d.gitCount }),
  dirs: (d) => ({ path: d.path, frequency: d.frequency, last_seen: d.lastSeen ?? '0001-01-01T00:00:00Z' }),
};

// ─── Envelope ─────────────────────────────────────────────────────────────────

export const LegacyEnvelopeSchema = z.object({
  data: z.unknown(),
  timestamp: z.string().refine((v) => typeof parseLegacyTime(v) === 'string', 'invalid timestamp'),
  /** Nanoseconds. */
  ttl: z.number().nonnegative(),
});

export type LegacyEnvelope = z.infer<typeof LegacyEnvelopeSchema>;

export interface ParsedPayload<T> {
  items: T[];
  /** Entries of the list that failed validation. */
  skipped: number;
  errors: string[];
}

/**
 * Validate each entry of a payload list on its own so one bad record does not
 * take the rest of the file with it. Returns null when `data` is not a list.
 */
export function parsePayload<K extends CacheKey>(key: K, data: unknown): ParsedPayload<LegacyItemMap[K]> | null {
  const list = z.array(z.unknown()).safeParse(data ?? []);
  if (!list.success) return null;

  const schema = ITEM_SCHEMAS[key];
  const result: ParsedPayload<LegacyItemMap[K]> = { items: [], skipped: 0, errors: [] };
  list.data.forEach((raw, index) => {
    const parsed = schema.safeParse(raw);
    if (parsed.success) {
      result.items.push(parsed.data);
    } else {
      result.skipped++;
      result.errors.push(`[${index}] ${parsed.error.issues.map((i) => `${i.path.join('.') || 'item'}: ${i.message}`).join('; ')}`);
    }
  });
  return result;
}

export function serializePayload<K extends CacheKey>(key: K, items: LegacyPayload<K>): Array<Record<string, unknown>> {
  const serialize = SERIALIZERS[key];
  return items.map((item) => serialize(item));
}

export function isCacheKey(value: string): value is CacheKey {
  return value === 'projects' || value === 'project-dirs' || value === 'dirs';
}
