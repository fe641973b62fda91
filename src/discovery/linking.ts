import type { RecordStore } from '../storage/StorageAdapter.js';
import { createLogger } from '../utils/log.js';

const log = createLogger('Linking');

/**
 * `owner/name` of a hosted remote, lower-cased, or null when the URL does not
 * look like one. Handles `https://host/o/n(.git)`, `ssh://git@host/o/n` and
 * scp-style `git@host:o/n.git`.
 */
export function parseRemoteSlug(remoteUrl: string): string | null {
  const url = remoteUrl.trim();
  const match =
    /^[a-z][a-z0-9+.-]*:\/\/(?:[^@/]+@)?[^/]+\/(.+)$/i.exec(url) ?? /^(?:[^@/]+@)?[^:/]+:(?!\/)(.+)$/.exec(url);
  const rest = match?.[1];
  if (!rest) return null;
  const segments = rest
    .replace(/\.git\/?$/i, '')
    .replace(/\/+$/, '')
    .split('/')
    .filter(Boolean);
  if (segments.length !== 2) return null;
  return `${segments[0]}/${segments[1]}`.toLowerCase();
}

/**
 * Point projects without a link at the remote repo their origin URL names.
 * Returns how many projects were linked.
 */
export async function linkProjectsToRepos(store: RecordStore): Promise<number> {
  const [projects, repos] = await Promise.all([store.listProjects(), store.listGitHubRepos()]);
  if (projects.length === 0 || repos.length === 0) return 0;

  const bySlug = new Map<string, number>();
  for (const repo of repos) {
    bySlug.set(repo.fullName.toLowerCase(), repo.id);
    for (const url of [repo.cloneUrl, repo.sshUrl, repo.url]) {
      const slug = url ? parseRemoteSlug(url) : null;
      if (slug && !bySlug.has(slug)) bySlug.set(slug, repo.id);
    }
  }

  const links = projects.flatMap((project) => {
    if (project.githubRepoId !== null || !project.remoteUrl) return [];
    const slug = parseRemoteSlug(project.remoteUrl);
    const repoId = slug ? bySlug.get(slug) : undefined;
    return repoId === undefined ? [] : [{ path: project.path, githubRepoId: repoId }];
  });

  const linked = await store.setProjectLinks(links);
  if (linked > 0) log.info(`Linked ${linked} project(s) to remote repositories`);
  return linked;
}
