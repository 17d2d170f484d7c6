/**
 * CodeBuild buildspec documents for the blog.
 *
 * CodeBuild runs every command of a 0.2 buildspec in one shell, so a `cd`
 * would leak into later phases. Commands address the Jekyll sources through
 * BUNDLE_GEMFILE and --source/--destination instead.
 */

export interface BuildSpecPhase {
  'runtime-versions'?: Record<string, string>;
  commands: string[];
}

export type BuildSpecDocument = {
  version: '0.2';
  env?: {
    variables?: Record<string, string>;
  };
  phases: {
    install: BuildSpecPhase;
    pre_build?: BuildSpecPhase;
    build: BuildSpecPhase;
  };
  cache?: {
    paths: string[];
  };
};

export interface BuildSpecOptions {
  /** Directory of the Jekyll sources, relative to the repository root */
  jekyllDir: string;
  rubyVersion?: string;
  nodeVersion?: string;
}

/** Directory Jekyll writes to, relative to the repository root. */
export const SITE_OUTPUT_DIR = '_site';

function jekyllEnv(jekyllDir: string): Record<string, string> {
  return {
    BUNDLE_GEMFILE: `${jekyllDir}/Gemfile`,
    BUNDLE_PATH: 'vendor/bundle',
    JEKYLL_ENV: 'production',
  };
}

function jekyllBuild(jekyllDir: string, baseUrl?: string): string {
  const parts = ['bundle exec jekyll build', `--source ${jekyllDir}`, `--destination ${SITE_OUTPUT_DIR}`];
  if (baseUrl !== undefined) {
    parts.push(`--baseurl ${baseUrl}`);
  }
  return parts.join(' ');
}

/**
 * Production build: generate the site, mirror it into the site bucket and
 * invalidate the distribution. Expects SITE_BUCKET and DISTRIBUTION_ID in the
 * project environment.
 */
export function siteBuildSpec(options: BuildSpecOptions): BuildSpecDocument {
  const { jekyllDir, rubyVersion = '3.2' } = options;
  return {
    version: '0.2',
    env: { variables: jekyllEnv(jekyllDir) },
    phases: {
      install: {
        'runtime-versions': { ruby: rubyVersion },
        commands: ['bundle install'],
      },
      build: {
        commands: [
          jekyllBuild(jekyllDir),
          `aws s3 sync ${SITE_OUTPUT_DIR} s3://$SITE_BUCKET --delete`,
          'aws cloudfront create-invalidation --distribution-id $DISTRIBUTION_ID --paths "/*"',
        ],
      },
    },
    cache: { paths: ['vendor/bundle/**/*'] },
  };
}

/**
 * Pull-request build: generate the site under /<source version>, upload it
 * to the same prefix of the preview bucket and comment the link on the pull
 * request. Expects PREVIEW_BUCKET, PREVIEW_BASE_URL, GITHUB_REPOSITORY and
 * GH_TOKEN in the project environment.
 */
export function previewBuildSpec(options: BuildSpecOptions): BuildSpecDocument {
  const { jekyllDir, rubyVersion = '3.2', nodeVersion = '20' } = options;
  return {
    version: '0.2',
    env: { variables: jekyllEnv(jekyllDir) },
    phases: {
      install: {
        'runtime-versions': { ruby: rubyVersion, nodejs: nodeVersion },
        commands: ['npm install --no-audit --no-fund', 'bundle install'],
      },
      build: {
        commands: [
          jekyllBuild(jekyllDir, '/$CODEBUILD_SOURCE_VERSION'),
          `aws s3 sync ${SITE_OUTPUT_DIR} s3://$PREVIEW_BUCKET/$CODEBUILD_SOURCE_VERSION --delete`,
          'npm run --silent preview:comment',
        ],
      },
    },
    cache: { paths: ['vendor/bundle/**/*', 'node_modules/**/*'] },
  };
}
