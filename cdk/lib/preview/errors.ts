export class PreviewCommentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreviewCommentError';
  }
}

/** Non-2xx answer from the GitHub REST API. */
export class GitHubApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly method: string,
    public readonly path: string,
    public readonly body: string
  ) {
    super(`GitHub API ${method} ${path} failed with ${status}${body ? `: ${body}` : ''}`);
    this.name = 'GitHubApiError';
  }
}
