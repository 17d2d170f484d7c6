#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { config } from './config';
import { parseBlogConfig, resolveEnvironment } from './lib/config-schema';
import { BlogSiteStack } from './lib/blog-site-stack';

/**
 * CDK app that deploys the blog and its pull-request previews.
 *
 * Deploy with: npm run deploy
 */
const app = new cdk.App();

const blogConfig = resolveEnvironment(parseBlogConfig(config));

const stack = new BlogSiteStack(app, `${blogConfig.siteName}-stack`, {
  config: blogConfig,
  env: {
    account: blogConfig.env.account,
    region: blogConfig.env.region,
  },
  description: `Jekyll blog hosting for ${blogConfig.domain}`,
});

// Apply tags to all resources
Object.entries(blogConfig.tags).forEach(([key, value]) => {
  cdk.Tags.of(stack).add(key, value);
});

app.synth();
