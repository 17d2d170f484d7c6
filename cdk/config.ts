import type { BlogConfigInput } from './lib/config-schema';

/**
 * Configuration for the blog.
 *
 * Parsed by `parseBlogConfig` in app.ts, which fills the defaults documented
 * in lib/config-schema.ts. The stack deploys:
 * - Private S3 bucket behind CloudFront with an ACM certificate
 * - CodeBuild project that rebuilds and publishes the site on every push
 * - Preview bucket and CodeBuild project for pull requests
 */
export const config: BlogConfigInput = {
  // Used for resource naming (buckets, CodeBuild projects)
  siteName: 'example-blog',

  // Primary domain name (must be a Route 53 zone in the deployment account)
  domain: 'blog.example.com',

  // Subdomains to include in the certificate and distribution
  subdomains: ['www'],

  // Repository holding the Jekyll sources and this infrastructure
  github: {
    owner: 'example-owner',
    repo: 'blog',
    branch: 'main',
  },

  jekyllDir: 'jekyll',

  // Posts change rarely; pages are invalidated on every deploy anyway
  cache: {
    defaultTtlSeconds: 86400,
    minTtlSeconds: 0,
    maxTtlSeconds: 31536000,
  },

  preview: {
    enabled: true,
    githubTokenParameter: '/CodeBuild/GH_TOKEN',
    expireAfterDays: 30,
  },

  // Account comes from CDK_DEFAULT_ACCOUNT when left out
  env: {
    region: 'us-east-1',
  },

  tags: {
    Application: 'example-blog',
    Environment: 'production',
    ManagedBy: 'cdk',
  },
};
