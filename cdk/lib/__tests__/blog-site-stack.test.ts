import { describe, it, expect, beforeAll } from 'vitest';
import * as cdk from 'aws-cdk-lib';
import { Match, Template } from 'aws-cdk-lib/assertions';
import { BlogSiteStack, DIRECTORY_INDEX_FUNCTION } from '../blog-site-stack';
import { siteBuildSpec, previewBuildSpec } from '../buildspec';
import { parseBlogConfig } from '../config-schema';
import type { BlogConfigInput } from '../config-schema';

const baseConfig: BlogConfigInput = {
  siteName: 'test-blog',
  domain: 'blog.test.dev',
  hostedZoneId: 'Z0TEST',
  github: { owner: 'test-owner', repo: 'test-repo' },
  env: { account: '123456789012', region: 'us-east-1' },
};

function synth(overrides: Partial<BlogConfigInput> = {}): Template {
  const app = new cdk.App();
  const config = parseBlogConfig({ ...baseConfig, ...overrides });
  const stack = new BlogSiteStack(app, 'TestBlogStack', {
    config,
    env: { account: config.env.account, region: config.env.region },
  });
  return Template.fromStack(stack);
}

function logicalIdOf(template: Template, type: string, props: Record<string, unknown> = {}): string {
  const ids = Object.keys(template.findResources(type, { Properties: props }));
  expect(ids).toHaveLength(1);
  return ids[0];
}

function environmentVariable(name: string, value: unknown) {
  return {
    Environment: Match.objectLike({
      EnvironmentVariables: Match.arrayWith([Match.objectLike({ Name: name, Value: value })]),
    }),
  };
}

/** Every IAM action granted to the service role of a CodeBuild project. */
function projectRoleActions(template: Template, projectName: string): string[] {
  const [project] = Object.values(
    template.findResources('AWS::CodeBuild::Project', { Properties: { Name: projectName } })
  );
  const roleId: string = project.Properties.ServiceRole['Fn::GetAtt'][0];
  const policies = template.findResources('AWS::IAM::Policy', {
    Properties: { Roles: [{ Ref: roleId }] },
  });
  return Object.values(policies).flatMap(policy =>
    policy.Properties.PolicyDocument.Statement.flatMap(
      (statement: { Action: string | string[] }) => [statement.Action].flat()
    )
  );
}

describe('BlogSiteStack', () => {
  let template: Template;

  beforeAll(() => {
    template = synth();
  });

  it('keeps the site bucket private and versioned', () => {
    template.hasResourceProperties('AWS::S3::Bucket', {
      BucketName: 'test-blog-123456789012',
      VersioningConfiguration: { Status: 'Enabled' },
      PublicAccessBlockConfiguration: {
        BlockPublicAcls: true,
        BlockPublicPolicy: true,
        IgnorePublicAcls: true,
        RestrictPublicBuckets: true,
      },
    });
  });

  it('requests a certificate for every domain name', () => {
    template.hasResourceProperties('AWS::CertificateManager::Certificate', {
      DomainName: 'blog.test.dev',
      SubjectAlternativeNames: Match.arrayWith(['www.blog.test.dev']),
      ValidationMethod: 'DNS',
    });
  });

  it('builds the cache policy from the configured TTLs', () => {
    template.hasResourceProperties('AWS::CloudFront::CachePolicy', {
      CachePolicyConfig: Match.objectLike({
        Name: 'test-blog-site-cache',
        DefaultTTL: 86400,
        MinTTL: 0,
        MaxTTL: 31536000,
      }),
    });
  });

  it('serves GET and HEAD over HTTPS with a 404 page', () => {
    template.hasResourceProperties('AWS::CloudFront::Distribution', {
      DistributionConfig: Match.objectLike({
        Aliases: ['blog.test.dev', 'www.blog.test.dev'],
        DefaultRootObject: 'index.html',
        DefaultCacheBehavior: Match.objectLike({
          AllowedMethods: ['GET', 'HEAD'],
          CachedMethods: ['GET', 'HEAD'],
          ViewerProtocolPolicy: 'redirect-to-https',
          Compress: true,
        }),
        CustomErrorResponses: [
          { ErrorCode: 403, ResponseCode: 404, ResponsePagePath: '/404.html', ErrorCachingMinTTL: 300 },
          { ErrorCode: 404, ResponseCode: 404, ResponsePagePath: '/404.html', ErrorCachingMinTTL: 300 },
        ],
      }),
    });
  });

  it('attaches the directory index function', () => {
    template.hasResourceProperties('AWS::CloudFront::Function', {
      Name: 'test-blog-directory-index',
      FunctionConfig: Match.objectLike({ Runtime: 'cloudfront-js-2.0' }),
    });
  });

  it('creates A and AAAA aliases for each domain name', () => {
    template.resourceCountIs('AWS::Route53::RecordSet', 4);
    template.hasResourceProperties('AWS::Route53::RecordSet', {
      Name: 'www.blog.test.dev.',
      Type: 'AAAA',
      HostedZoneId: 'Z0TEST',
    });
  });

  it('publishes pushes to the production branch', () => {
    template.hasResourceProperties('AWS::CodeBuild::Project', {
      Name: 'test-blog-deploy',
      Source: Match.objectLike({
        Type: 'GITHUB',
        Location: 'https://github.com/test-owner/test-repo.git',
        BuildSpec: Match.serializedJson(siteBuildSpec({ jekyllDir: 'jekyll' })),
      }),
      Triggers: {
        Webhook: true,
        FilterGroups: [
          Match.arrayWith([
            Match.objectLike({ Type: 'EVENT', Pattern: 'PUSH' }),
            Match.objectLike({ Type: 'HEAD_REF', Pattern: Match.stringLikeRegexp('refs/heads/main') }),
          ]),
        ],
      },
    });
  });

  it('hands the deploy build its bucket and distribution', () => {
    const bucketId = logicalIdOf(template, 'AWS::S3::Bucket', { BucketName: 'test-blog-123456789012' });
    const distributionId = logicalIdOf(template, 'AWS::CloudFront::Distribution');

    template.hasResourceProperties('AWS::CodeBuild::Project', {
      Name: 'test-blog-deploy',
      ...environmentVariable('SITE_BUCKET', { Ref: bucketId }),
    });
    template.hasResourceProperties('AWS::CodeBuild::Project', {
      Name: 'test-blog-deploy',
      ...environmentVariable('DISTRIBUTION_ID', { Ref: distributionId }),
    });
  });

  it('hands the preview build its bucket, endpoint and repository', () => {
    const bucketId = logicalIdOf(template, 'AWS::S3::Bucket', {
      BucketName: 'test-blog-preview-123456789012',
    });

    template.hasResourceProperties('AWS::CodeBuild::Project', {
      Name: 'test-blog-preview',
      ...environmentVariable('PREVIEW_BUCKET', { Ref: bucketId }),
    });
    template.hasResourceProperties('AWS::CodeBuild::Project', {
      Name: 'test-blog-preview',
      ...environmentVariable('PREVIEW_BASE_URL', { 'Fn::GetAtt': [bucketId, 'WebsiteURL'] }),
    });
    template.hasResourceProperties('AWS::CodeBuild::Project', {
      Name: 'test-blog-preview',
      ...environmentVariable('GITHUB_REPOSITORY', 'test-owner/test-repo'),
    });
  });

  it('lets both builds delete stale objects on sync', () => {
    expect(projectRoleActions(template, 'test-blog-deploy')).toContain('s3:DeleteObject*');
    expect(projectRoleActions(template, 'test-blog-preview')).toContain('s3:DeleteObject*');
  });

  it('lets only the preview build read the GitHub token parameter', () => {
    expect(projectRoleActions(template, 'test-blog-preview')).toContain('ssm:GetParameters');
    expect(projectRoleActions(template, 'test-blog-deploy')).not.toContain('ssm:GetParameters');
  });

  it('lets the deploy project invalidate the distribution', () => {
    template.hasResourceProperties('AWS::IAM::Policy', {
      PolicyDocument: {
        Statement: Match.arrayWith([
          Match.objectLike({ Action: 'cloudfront:CreateInvalidation', Effect: 'Allow' }),
        ]),
      },
    });
  });

  it('creates a public preview website that expires old previews', () => {
    template.hasResourceProperties('AWS::S3::Bucket', {
      BucketName: 'test-blog-preview-123456789012',
      WebsiteConfiguration: { IndexDocument: 'index.html', ErrorDocument: Match.absent() },
      LifecycleConfiguration: {
        Rules: [
          Match.objectLike({
            Id: 'ExpirePreviews',
            Prefix: 'pr/',
            ExpirationInDays: 30,
            Status: 'Enabled',
          }),
        ],
      },
    });
  });

  it('renders pull requests against the production branch', () => {
    template.hasResourceProperties('AWS::CodeBuild::Project', {
      Name: 'test-blog-preview',
      Source: Match.objectLike({
        BuildSpec: Match.serializedJson(previewBuildSpec({ jekyllDir: 'jekyll' })),
      }),
      Triggers: {
        Webhook: true,
        FilterGroups: [
          Match.arrayWith([
            Match.objectLike({
              Type: 'EVENT',
              Pattern: Match.stringLikeRegexp('PULL_REQUEST_CREATED'),
            }),
            Match.objectLike({ Type: 'BASE_REF', Pattern: Match.stringLikeRegexp('refs/heads/main') }),
          ]),
        ],
      },
      Environment: Match.objectLike({
        EnvironmentVariables: Match.arrayWith([
          { Name: 'GH_TOKEN', Type: 'PARAMETER_STORE', Value: '/CodeBuild/GH_TOKEN' },
        ]),
      }),
    });
  });

  it('exports the site and preview endpoints', () => {
    template.hasOutput('WebsiteUrl', { Value: 'https://blog.test.dev' });
    template.hasOutput('PreviewWebsiteUrl', {});
  });

  it('leaves previews out when disabled', () => {
    const withoutPreview = synth({ preview: { enabled: false } });
    withoutPreview.resourceCountIs('AWS::CodeBuild::Project', 1);
    withoutPreview.resourceCountIs('AWS::S3::Bucket', 1);
    expect(Object.keys(withoutPreview.findOutputs('PreviewWebsiteUrl'))).toEqual([]);
  });
});

describe('DIRECTORY_INDEX_FUNCTION', () => {
  type Handler = (event: { request: { uri: string } }) => { uri: string };
  const handler: Handler = new Function(`${DIRECTORY_INDEX_FUNCTION}\nreturn handler;`)();

  it.each([
    ['/', '/index.html'],
    ['/about/', '/about/index.html'],
    ['/about', '/about/index.html'],
    ['/2024/03/02/hello-world/', '/2024/03/02/hello-world/index.html'],
    ['/assets/main.css', '/assets/main.css'],
    ['/feed.xml', '/feed.xml'],
  ])('maps %s to %s', (uri, expected) => {
    expect(handler({ request: { uri } }).uri).toBe(expected);
  });
});
