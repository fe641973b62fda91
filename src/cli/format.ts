import type { CacheEntryInfo } from '../cache/FileCache.js';
import type { CacheStats } from '../cache/StoreCache.js';
import type { IntegrityReport } from '../integrity/IntegrityChecker.js';
import type { MigrationResult, MigrationStatus, MigrationValidationResult, RollbackResult } from '../migration/MigrationManager.js';
import type { Project, RankedDirUsage, StoreStats } from '../types/Records.js';

export const LIST_FORMATS = ['default', 'lines', 'json', 'table'] as const;
export type ListFormat = (typeof LIST_FORMATS)[number];

export function isListFormat(value: string): value is ListFormat {
  return LIST_FORMATS.some((f) => f === value);
}

/** Left-aligned columns separated by two spaces, trailing blanks trimmed. */
export function renderTable(header: readonly string[], rows: ReadonlyArray<readonly string[]>): string[] {
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)));
  const line = (cells: readonly string[]) =>
    cells
      .map((c, i) => c.padEnd(widths[i] ?? 0))
      .join('  ')
      .trimEnd();
  return [line(header), ...rows.map(line)];
}

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let size = bytes;
  let unitIndex = 0;
  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }
  return `${Math.round(size * 100) / 100} ${units[unitIndex]}`;
}

// ─── Projects ─────────────────────────────────────────────────────────────────

export function formatProjects(projects: readonly Project[], format: ListFormat): string[] {
  switch (format) {
    case 'lines':
      return projects.map((p) => p.path);
    case 'json':
      return [
        JSON.stringify(
          projects.map((p) => ({
            path: p.path,
            name: p.name,
            remote: p.remoteUrl,
            branch: p.branch,
            lastModified: p.lastModified,
            githubRepoId: p.githubRepoId,
          })),
          null,
          2
        ),
      ];
    case 'table':
      return renderTable(
        ['NAME', 'BRANCH', 'REMOTE', 'PATH'],
        projects.map((p) => [p.name, p.branch ?? '', p.remoteUrl ?? '', p.path])
      );
    case 'default':
      return projects.map((p) => {
        if (p.remoteUrl) return `${p.path} (${p.remoteUrl})`;
        if (p.branch) return `${p.path} [${p.branch}]`;
        return p.path;
      });
  }
}

// ─── Dirs ─────────────────────────────────────────────────────────────────────

export function formatDirs(dirs: readonly RankedDirUsage[], format: ListFormat): string[] {
  switch (format) {
    case 'lines':
      return dirs.map((d) => d.path);
    case 'json':
      return [
        JSON.stringify(
          dirs.map((d) => ({ path: d.path, frequency: d.frequency, lastSeen: d.lastSeen, score: d.score })),
          null,
          2
        ),
      ];
    case 'table':
      return renderTable(
        ['SCORE', 'VISITS', 'LAST SEEN', 'PATH'],
        dirs.map((d) => [d.score.toFixed(3), String(d.frequency), d.lastSeen, d.path])
      );
    case 'default':
      return dirs.map((d) => `${d.score.toFixed(3)}\t${d.path}`);
  }
}

// ─── Diagnostics ──────────────────────────────────────────────────────────────

export function formatCounts(counts: StoreStats): string[] {
  return Object.entries(counts).map(([table, n]) => `  ${table}: ${n}`);
}

export function formatIntegrity(report: IntegrityReport): string[] {
  const lines = [`Integrity check of ${report.dbPath}`];
  for (const check of report.checks) {
    lines.push(`  ${check.passed ? 'PASS' : 'FAIL'}  ${check.name}`);
    for (const finding of check.findings) lines.push(`        - ${finding}`);
  }
  lines.push('Rows:', ...formatCounts(report.counts));
  lines.push(report.summary);
  return lines;
}

export function formatMigrationResult(result: MigrationResult): string[] {
  const lines = [`Migration: ${result.status}`];
  for (const file of result.files) {
    const detail = file.error ? ` (${file.error})` : file.skipped ? ` (${file.skipped} invalid skipped)` : '';
    lines.push(`  ${file.file}: ${file.status}, ${file.records} record(s)${detail}`);
  }
  if (result.linkedProjects > 0) lines.push(`  linked ${result.linkedProjects} project(s) to remote repositories`);
  return lines;
}

export function formatRollback(result: RollbackResult): string[] {
  if (result.status === 'not-migrated') return ['Nothing to roll back'];
  return [
    `Rolled back ${result.restored.length} file(s)`,
    ...result.restored.map((r) => `  restored ${r.file} (${formatBytes(r.sizeBytes)})`),
    `  cleared ${result.clearedTables.join(', ')}`,
  ];
}

export function formatMigrationStatus(status: MigrationStatus): string[] {
  const lines = [`State: ${status.state}`];
  lines.push(`Legacy files: ${status.legacyFiles.length ? status.legacyFiles.map((k) => `${k}.json`).join(', ') : 'none'}`);
  if (status.manifest) {
    lines.push(`Started: ${status.manifest.startedAt}`);
    if (status.manifest.completedAt) lines.push(`Completed: ${status.manifest.completedAt}`);
    for (const f of status.manifest.files) {
      lines.push(`  ${f.file}: ${f.status}, ${f.records} record(s), ${formatBytes(f.sizeBytes)}`);
    }
  }
  lines.push('Rows:', ...formatCounts(status.counts));
  return lines;
}

export function formatValidation(result: MigrationValidationResult): string[] {
  const lines = [`Verify (${result.state}): ${result.success ? 'OK' : 'FAILED'}`];
  for (const b of result.missingBackups) lines.push(`  missing backup ${b}`);
  for (const b of result.corruptedBackups) lines.push(`  checksum mismatch ${b}`);
  for (const i of result.inconsistencies) lines.push(`  ${i.table}: expected at least ${i.expected}, found ${i.actual}`);
  return lines;
}

export function formatCacheInspect(entries: readonly CacheEntryInfo[], stats: CacheStats): string[] {
  const lines = ['Legacy cache files:'];
  if (entries.length === 0) lines.push('  none');
  for (const e of entries) {
    if (e.error) {
      lines.push(`  ${e.key}: unreadable (${e.error})`);
      continue;
    }
    const age = e.ageMs === null ? '?' : `${Math.round(e.ageMs / 1000)}s`;
    const ttl = e.ttlMs === null ? '?' : `${Math.round(e.ttlMs / 1000)}s`;
    lines.push(`  ${e.key}: ${e.items ?? 0} item(s), ${formatBytes(e.sizeBytes)}, age ${age}, ttl ${ttl}, ${e.fresh ? 'fresh' : 'stale'}`);
  }
  lines.push('Store cache:');
  for (const k of stats.keys) {
    const age = k.ageSeconds === null ? 'never' : `${k.ageSeconds}s ago`;
    lines.push(`  ${k.key}: ${k.fresh ? 'fresh' : 'stale'}, updated ${age}, ttl ${k.ttlSeconds}s`);
  }
  lines.push('Rows:', ...formatCounts(stats.counts), `  linked projects: ${stats.linkedProjects}`);
  return lines;
}
