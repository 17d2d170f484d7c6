import { z } from 'zod';
import { GitHubApiError } from './errors';
import type { Repository } from './source-version';

export const GITHUB_API_URL = 'https://api.github.com';

/** GitHub caps `per_page` at 100. */
export const COMMENTS_PAGE_SIZE = 100;

const issueCommentSchema = z.object({
  id: z.number(),
  body: z.string().nullish(),
  html_url: z.string(),
  user: z.object({ login: z.string() }).nullish(),
});

const userSchema = z.object({
  login: z.string(),
});

export type IssueComment = z.infer<typeof issueCommentSchema>;
export type GitHubUser = z.infer<typeof userSchema>;

export interface GitHubClientOptions {
  token: string;
  apiUrl?: string;
  fetch?: typeof fetch;
  userAgent?: string;
}

/**
 * The issue-comment endpoints the preview build needs, plus the token owner.
 */
export class GitHubClient {
  private readonly token: string;
  private readonly apiUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly userAgent: string;

  constructor(options: GitHubClientOptions) {
    this.token = options.token;
    this.apiUrl = (options.apiUrl ?? GITHUB_API_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.userAgent = options.userAgent ?? 'blog-preview-comment';
  }

  async getAuthenticatedUser(): Promise<GitHubUser> {
    return userSchema.parse(await this.request('GET', '/user'));
  }

  async listIssueComments({ owner, repo }: Repository, issueNumber: number): Promise<IssueComment[]> {
    const comments: IssueComment[] = [];
    for (let page = 1; ; page++) {
      const batch = z
        .array(issueCommentSchema)
        .parse(
          await this.request(
            'GET',
            `/repos/${owner}/${repo}/issues/${issueNumber}/comments?per_page=${COMMENTS_PAGE_SIZE}&page=${page}`
          )
        );
      comments.push(...batch);
      if (batch.length < COMMENTS_PAGE_SIZE) {
        return comments;
      }
    }
  }

  async createIssueComment(
    { owner, repo }: Repository,
    issueNumber: number,
    body: string
  ): Promise<IssueComment> {
    return issueCommentSchema.parse(
      await this.request('POST', `/repos/${owner}/${repo}/issues/${issueNumber}/comments`, { body })
    );
  }

  async updateIssueComment(
    { owner, repo }: Repository,
    commentId: number,
    body: string
  ): Promise<IssueComment> {
    return issueCommentSchema.parse(
      await this.request('PATCH', `/repos/${owner}/${repo}/issues/comments/${commentId}`, { body })
    );
  }

  private async request(method: string, path: string, payload?: unknown): Promise<unknown> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      Authorization: `token ${this.token}`,
      'User-Agent': this.userAgent,
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (payload !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const response = await this.fetchImpl(`${this.apiUrl}${path}`, {
      method,
      headers,
      body: payload === undefined ? undefined : JSON.stringify(payload),
    });

    if (!response.ok) {
      throw new GitHubApiError(response.status, method, path, (await response.text()).trim());
    }
    return response.json();
  }
}
