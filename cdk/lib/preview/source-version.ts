import { PreviewCommentError } from './errors';

export interface Repository {
  owner: string;
  repo: string;
}

/**
 * CodeBuild reports pull-request builds with the source version `pr/<number>`.
 */
export function parsePullRequestNumber(sourceVersion: string): number {
  const match = /^pr\/(\d+)$/.exec(sourceVersion.trim());
  const number = match ? Number.parseInt(match[1], 10) : Number.NaN;
  if (!Number.isSafeInteger(number) || number < 1) {
    throw new PreviewCommentError(
      `Source version "${sourceVersion}" is not a pull request (expected pr/<number>)`
    );
  }
  return number;
}

export function parseRepository(slug: string): Repository {
  const [owner, repo, ...rest] = slug.trim().split('/');
  if (!owner || !repo || rest.length > 0) {
    throw new PreviewCommentError(`Repository "${slug}" is not in owner/repo form`);
  }
  return { owner, repo };
}
