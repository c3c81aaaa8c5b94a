import type { Pipeline } from '../domain/index.js';

const GITHUB_WEB = 'https://github.com/';
const GITHUB_SSH = 'git@github.com:';

function stripGitSuffix(value: string): string {
  return value.endsWith('.git') ? value.slice(0, -'.git'.length) : value;
}

/**
 * Resolves the web URL of a pipeline's source repository.
 *
 * First match wins:
 * 1. `provider.repositoryUrl`, verbatim
 * 2. `provider.repositorySlug` (`owner/repo`), expanded to GitHub
 * 3. `repository` in `git@github.com:owner/repo.git` form, or
 *    `https://github.com/owner/repo.git` form
 *
 * Any other repository syntax resolves to `undefined`.
 */
export function resolveRepoUrl(pipeline: Pipeline | undefined): string | undefined {
  if (!pipeline) return undefined;

  const provider = pipeline.provider;
  if (provider?.repositoryUrl !== undefined) return provider.repositoryUrl;
  if (provider?.repositorySlug !== undefined) return `${GITHUB_WEB}${provider.repositorySlug}`;

  const repository = pipeline.repository;
  if (repository === undefined) return undefined;

  if (repository.startsWith(GITHUB_SSH)) {
    return `${GITHUB_WEB}${stripGitSuffix(repository.slice(GITHUB_SSH.length))}`;
  }
  if (repository.startsWith(GITHUB_WEB)) {
    return stripGitSuffix(repository);
  }

  return undefined;
}
