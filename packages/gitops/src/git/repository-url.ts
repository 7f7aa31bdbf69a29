import path from 'node:path';

export interface RepositoryCoordinates {
  host: string;
  owner: string;
  repo: string;
}

/**
 * Split an `https://host/owner/repo.git` URL into its parts.
 */
export function parseRepositoryUrl(url: string): RepositoryCoordinates {
  const parsed = new URL(url);
  const segments = parsed.pathname.replace(/^\/+|\/+$/g, '').split('/');
  if (segments.length !== 2 || !segments[0] || !segments[1]) {
    throw new Error(`Expected a repository URL shaped like https://host/owner/repo.git, got ${url}`);
  }
  return {
    host: parsed.host,
    owner: segments[0],
    repo: segments[1].replace(/\.git$/, ''),
  };
}

export function repositoryUrl(host: string, owner: string, repo: string): string {
  return `https://${host}/${owner}/${repo}.git`;
}

/**
 * `<root>/<host>/<owner>/<repo>`, so working copies of different remotes never
 * share a directory.
 */
export function localRepositoryPath(root: string, url: string): string {
  const { host, owner, repo } = parseRepositoryUrl(url);
  return path.join(root, host, owner, repo);
}
