import { z } from 'zod';

/**
 * Validation for the blog configuration in `cdk/config.ts`.
 *
 * The stack only ever sees a parsed {@link BlogConfig}, so defaults are filled
 * in here rather than scattered through the constructs.
 */

const slug = z
  .string()
  .regex(/^[a-z0-9][a-z0-9-]*[a-z0-9]$/, 'must be lowercase letters, digits and hyphens');

const hostname = z
  .string()
  .regex(/^(?!-)[a-z0-9-]+(\.[a-z0-9-]+)+$/, 'must be a lowercase domain name');

export const cacheConfigSchema = z
  .object({
    defaultTtlSeconds: z.number().int().nonnegative().default(86400),
    minTtlSeconds: z.number().int().nonnegative().default(0),
    maxTtlSeconds: z.number().int().nonnegative().default(31536000),
  })
  .superRefine((cache, ctx) => {
    if (cache.minTtlSeconds > cache.defaultTtlSeconds) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minTtlSeconds'],
        message: 'must not exceed defaultTtlSeconds',
      });
    }
    if (cache.defaultTtlSeconds > cache.maxTtlSeconds) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxTtlSeconds'],
        message: 'must not be lower than defaultTtlSeconds',
      });
    }
  });

export const previewConfigSchema = z.object({
  enabled: z.boolean().default(true),
  githubTokenParameter: z.string().startsWith('/').default('/CodeBuild/GH_TOKEN'),
  expireAfterDays: z.number().int().positive().default(30),
});

export const blogConfigSchema = z.object({
  siteName: slug,
  domain: hostname,
  subdomains: z.array(z.string().regex(/^[a-z0-9-]+$/, 'must be a single DNS label')).default(['www']),
  hostedZoneId: z.string().min(1).optional(),
  github: z.object({
    owner: z.string().min(1),
    repo: z.string().min(1),
    branch: z.string().min(1).default('main'),
  }),
  jekyllDir: z.string().min(1).default('jekyll'),
  cache: cacheConfigSchema.default({}),
  preview: previewConfigSchema.default({}),
  env: z.object({
    account: z
      .string()
      .regex(/^\d{12}$/, 'must be a 12-digit AWS account id')
      .optional(),
    // CloudFront only accepts certificates issued in us-east-1
    region: z.literal('us-east-1').default('us-east-1'),
  }),
  tags: z.record(z.string(), z.string()).default({}),
});

export type BlogConfigInput = z.input<typeof blogConfigSchema>;
export type BlogConfig = z.output<typeof blogConfigSchema>;
export type CacheConfig = z.output<typeof cacheConfigSchema>;
export type PreviewConfig = z.output<typeof previewConfigSchema>;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid blog configuration:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function parseBlogConfig(input: unknown): BlogConfig {
  const result = blogConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Fills the deployment account from the CDK CLI environment when the config
 * leaves it out. Returns a new object; the input is not modified.
 */
export function resolveEnvironment(
  config: BlogConfig,
  processEnv: NodeJS.ProcessEnv = process.env
): BlogConfig {
  if (config.env.account) {
    return config;
  }
  const account = processEnv.CDK_DEFAULT_ACCOUNT;
  return account ? { ...config, env: { ...config.env, account } } : config;
}
