import { Command } from 'commander';
import { consoleLogger, publishPreviewComment } from './comment';
import type { Logger } from './comment';
import { PreviewCommentError } from './errors';
import { GitHubClient, GITHUB_API_URL } from './github-client';

/**
 * Comments the preview link on the pull request a CodeBuild preview build ran
 * for. Every option defaults to the variable the preview project sets.
 */

interface PreviewCommentCliOptions {
  sourceVersion?: string;
  commit?: string;
  baseUrl?: string;
  repository?: string;
  apiUrl: string;
}

export function createProgram(
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = consoleLogger,
  fetchImpl?: typeof fetch
): Command {
  return new Command('preview-comment')
    .description('Post or refresh the preview link on a pull request')
    .option('--source-version <version>', 'CodeBuild source version (pr/<number>)', env.CODEBUILD_SOURCE_VERSION)
    .option('--commit <sha>', 'commit the preview was built from', env.CODEBUILD_RESOLVED_SOURCE_VERSION)
    .option('--base-url <url>', 'website endpoint of the preview bucket', env.PREVIEW_BASE_URL)
    .option('--repository <owner/repo>', 'GitHub repository', env.GITHUB_REPOSITORY)
    .option('--api-url <url>', 'GitHub API endpoint', GITHUB_API_URL)
    .action(async (opts: PreviewCommentCliOptions) => {
      const { sourceVersion, baseUrl, repository } = opts;
      const token = env.GH_TOKEN;
      if (!sourceVersion || !baseUrl || !repository || !token) {
        const missing = Object.entries({
          '--source-version': sourceVersion,
          '--base-url': baseUrl,
          '--repository': repository,
          GH_TOKEN: token,
        })
          .filter(([, value]) => !value)
          .map(([name]) => name);
        throw new PreviewCommentError(`Missing required settings: ${missing.join(', ')}`);
      }

      const client = new GitHubClient({ token, apiUrl: opts.apiUrl, fetch: fetchImpl });
      await publishPreviewComment({
        client,
        repository,
        sourceVersion,
        baseUrl,
        commit: opts.commit,
        logger,
      });
    });
}

/**
 * Runs the program and turns a failure into exit code 1 with the message on
 * stderr.
 */
export async function runPreviewComment(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = consoleLogger,
  fetchImpl?: typeof fetch
): Promise<number> {
  try {
    await createProgram(env, logger, fetchImpl).parseAsync(argv, { from: 'user' });
    return 0;
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}
