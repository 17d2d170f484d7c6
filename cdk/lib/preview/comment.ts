import type { GitHubClient } from './github-client';
import { parsePullRequestNumber, parseRepository } from './source-version';

/** Hidden first line identifying the comment this tool owns. */
export const PREVIEW_COMMENT_MARKER = '<!-- blog-preview -->';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = {
  info: message => console.log(message),
  warn: message => console.warn(message),
  error: message => console.error(message),
};

export function buildPreviewUrl(baseUrl: string, sourceVersion: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${sourceVersion.replace(/^\/+|\/+$/g, '')}/`;
}

export interface PreviewCommentContent {
  url: string;
  /** Commit the preview was rendered from */
  commit?: string;
}

export function renderPreviewComment({ url, commit }: PreviewCommentContent): string {
  const lines = [PREVIEW_COMMENT_MARKER, `Preview rendered at ${url}`];
  if (commit) {
    lines.push('', `Built from ${commit.slice(0, 7)}.`);
  }
  return lines.join('\n');
}

export type IssueCommentsApi = Pick<
  GitHubClient,
  'getAuthenticatedUser' | 'listIssueComments' | 'createIssueComment' | 'updateIssueComment'
>;

export interface PublishPreviewCommentOptions {
  client: IssueCommentsApi;
  /** `owner/repo` */
  repository: string;
  /** CodeBuild source version, `pr/<number>` */
  sourceVersion: string;
  /** Website endpoint of the preview bucket */
  baseUrl: string;
  commit?: string;
  logger?: Logger;
}

export interface PublishPreviewCommentResult {
  action: 'created' | 'updated';
  commentId: number;
  url: string;
}

/**
 * Points the pull request at its preview. A pull request carries at most one
 * preview comment: later builds rewrite it instead of adding another. Only
 * comments written by the token owner count as earlier previews.
 */
export async function publishPreviewComment(
  options: PublishPreviewCommentOptions
): Promise<PublishPreviewCommentResult> {
  const { client, sourceVersion, commit, logger = consoleLogger } = options;
  const repository = parseRepository(options.repository);
  const pullRequest = parsePullRequestNumber(sourceVersion);
  const url = buildPreviewUrl(options.baseUrl, sourceVersion);
  const body = renderPreviewComment({ url, commit });

  const { login } = await client.getAuthenticatedUser();
  const comments = await client.listIssueComments(repository, pullRequest);
  const previews = comments.filter(
    comment => comment.user?.login === login && comment.body?.startsWith(PREVIEW_COMMENT_MARKER)
  );
  const existing = previews[0];
  if (previews.length > 1) {
    logger.warn(`Found ${previews.length} preview comments on #${pullRequest}, refreshing ${existing.id}`);
  }

  if (existing) {
    if (existing.body === body) {
      logger.info(`Preview comment ${existing.id} on #${pullRequest} is up to date`);
    } else {
      await client.updateIssueComment(repository, existing.id, body);
      logger.info(`Updated preview comment ${existing.id} on #${pullRequest}: ${url}`);
    }
    return { action: 'updated', commentId: existing.id, url };
  }

  const created = await client.createIssueComment(repository, pullRequest, body);
  logger.info(`Posted preview comment ${created.id} on #${pullRequest}: ${url}`);
  return { action: 'created', commentId: created.id, url };
}
