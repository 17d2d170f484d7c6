import * as cdk from 'aws-cdk-lib';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as cloudfront from 'aws-cdk-lib/aws-cloudfront';
import * as origins from 'aws-cdk-lib/aws-cloudfront-origins';
import * as acm from 'aws-cdk-lib/aws-certificatemanager';
import * as route53 from 'aws-cdk-lib/aws-route53';
import * as route53Targets from 'aws-cdk-lib/aws-route53-targets';
import * as codebuild from 'aws-cdk-lib/aws-codebuild';
import * as iam from 'aws-cdk-lib/aws-iam';
import { Construct } from 'constructs';
import type { BlogConfig } from './config-schema';
import { siteBuildSpec } from './buildspec';
import { PullRequestPreview } from './constructs/pull-request-preview';

export interface BlogSiteStackProps extends cdk.StackProps {
  config: BlogConfig;
}

/**
 * Jekyll permalinks end in a directory ("/about/") or have no extension
 * ("/about"); S3 behind OAC only serves exact keys, so both are mapped to
 * the index.html inside that directory.
 */
export const DIRECTORY_INDEX_FUNCTION = `function handler(event) {
  var request = event.request;
  var uri = request.uri;
  if (uri.endsWith('/')) {
    request.uri = uri + 'index.html';
  } else if (!uri.split('/').pop().includes('.')) {
    request.uri = uri + '/index.html';
  }
  return request;
}`;

export class BlogSiteStack extends cdk.Stack {
  public readonly bucket: s3.Bucket;
  public readonly distribution: cloudfront.Distribution;
  public readonly deployProject: codebuild.Project;
  public readonly preview?: PullRequestPreview;

  constructor(scope: Construct, id: string, props: BlogSiteStackProps) {
    super(scope, id, props);

    const { siteName, domain, subdomains, hostedZoneId, github, jekyllDir, cache, preview } =
      props.config;

    // S3 Bucket for the generated site
    this.bucket = new s3.Bucket(this, 'SiteBucket', {
      bucketName: `${siteName}-${this.account}`,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      encryption: s3.BucketEncryption.S3_MANAGED,
      versioned: true,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
      enforceSSL: true,
    });

    const hostedZone = hostedZoneId
      ? route53.HostedZone.fromHostedZoneAttributes(this, 'HostedZone', {
          hostedZoneId,
          zoneName: domain,
        })
      : route53.HostedZone.fromLookup(this, 'HostedZone', { domainName: domain });

    // ACM Certificate
    const domainNames = [domain, ...subdomains.map(sub => `${sub}.${domain}`)];
    const certificate = new acm.Certificate(this, 'Certificate', {
      domainName: domain,
      subjectAlternativeNames: domainNames.slice(1),
      validation: acm.CertificateValidation.fromDns(hostedZone),
    });

    const oac = new cloudfront.S3OriginAccessControl(this, 'OAC', {
      signing: cloudfront.Signing.SIGV4_ALWAYS,
    });

    const cachePolicy = new cloudfront.CachePolicy(this, 'SiteCachePolicy', {
      cachePolicyName: `${siteName}-site-cache`,
      defaultTtl: cdk.Duration.seconds(cache.defaultTtlSeconds),
      minTtl: cdk.Duration.seconds(cache.minTtlSeconds),
      maxTtl: cdk.Duration.seconds(cache.maxTtlSeconds),
      enableAcceptEncodingGzip: true,
      enableAcceptEncodingBrotli: true,
    });

    const directoryIndex = new cloudfront.Function(this, 'DirectoryIndexFunction', {
      functionName: `${siteName}-directory-index`,
      code: cloudfront.FunctionCode.fromInline(DIRECTORY_INDEX_FUNCTION),
      runtime: cloudfront.FunctionRuntime.JS_2_0,
    });

    this.distribution = new cloudfront.Distribution(this, 'Distribution', {
      defaultBehavior: {
        origin: origins.S3BucketOrigin.withOriginAccessControl(this.bucket, {
          originAccessControl: oac,
        }),
        viewerProtocolPolicy: cloudfront.ViewerProtocolPolicy.REDIRECT_TO_HTTPS,
        allowedMethods: cloudfront.AllowedMethods.ALLOW_GET_HEAD,
        cachedMethods: cloudfront.CachedMethods.CACHE_GET_HEAD,
        cachePolicy,
        compress: true,
        functionAssociations: [
          {
            function: directoryIndex,
            eventType: cloudfront.FunctionEventType.VIEWER_REQUEST,
          },
        ],
      },
      domainNames: domainNames,
      certificate: certificate,
      defaultRootObject: 'index.html',
      httpVersion: cloudfront.HttpVersion.HTTP2_AND_3,
      priceClass: cloudfront.PriceClass.PRICE_CLASS_100,
      // OAC without s3:ListBucket turns missing keys into 403
      errorResponses: [403, 404].map(httpStatus => ({
        httpStatus,
        responseHttpStatus: 404,
        responsePagePath: '/404.html',
        ttl: cdk.Duration.minutes(5),
      })),
    });

    // DNS Records
    domainNames.forEach((domainName, index) => {
      const target = route53.RecordTarget.fromAlias(
        new route53Targets.CloudFrontTarget(this.distribution)
      );
      new route53.ARecord(this, `AliasRecord${index}`, {
        zone: hostedZone,
        recordName: domainName,
        target,
      });
      new route53.AaaaRecord(this, `AliasRecordIpv6${index}`, {
        zone: hostedZone,
        recordName: domainName,
        target,
      });
    });

    // Publishes the production branch on every push
    this.deployProject = new codebuild.Project(this, 'DeployProject', {
      projectName: `${siteName}-deploy`,
      description: `Builds ${github.owner}/${github.repo}@${github.branch} into the site bucket`,
      source: codebuild.Source.gitHub({
        owner: github.owner,
        repo: github.repo,
        webhook: true,
        webhookFilters: [
          codebuild.FilterGroup.inEventOf(codebuild.EventAction.PUSH).andBranchIs(github.branch),
        ],
      }),
      environment: {
        buildImage: codebuild.LinuxBuildImage.STANDARD_7_0,
        computeType: codebuild.ComputeType.SMALL,
      },
      environmentVariables: {
        SITE_BUCKET: { value: this.bucket.bucketName },
        DISTRIBUTION_ID: { value: this.distribution.distributionId },
      },
      buildSpec: codebuild.BuildSpec.fromObject(siteBuildSpec({ jekyllDir })),
      cache: codebuild.Cache.local(codebuild.LocalCacheMode.CUSTOM),
      timeout: cdk.Duration.minutes(20),
    });

    this.bucket.grantReadWrite(this.deployProject);
    this.deployProject.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ['cloudfront:CreateInvalidation'],
        resources: [
          `arn:aws:cloudfront::${this.account}:distribution/${this.distribution.distributionId}`,
        ],
      })
    );

    if (preview.enabled) {
      this.preview = new PullRequestPreview(this, 'Preview', {
        siteName,
        githubOwner: github.owner,
        githubRepo: github.repo,
        baseBranch: github.branch,
        jekyllDir,
        githubTokenParameter: preview.githubTokenParameter,
        expireAfterDays: preview.expireAfterDays,
      });
    }

    // Outputs
    new cdk.CfnOutput(this, 'S3BucketName', {
      value: this.bucket.bucketName,
      description: 'S3 bucket name for the generated site',
    });

    new cdk.CfnOutput(this, 'CloudFrontDistributionId', {
      value: this.distribution.distributionId,
      description: 'CloudFront distribution ID',
    });

    new cdk.CfnOutput(this, 'CloudFrontDomainName', {
      value: this.distribution.distributionDomainName,
      description: 'CloudFront distribution domain name',
    });

    new cdk.CfnOutput(this, 'DeployProjectName', {
      value: this.deployProject.projectName,
      description: 'CodeBuild project publishing the production branch',
    });

    new cdk.CfnOutput(this, 'WebsiteUrl', {
      value: `https://${domain}`,
      description: 'Website URL',
    });

    if (this.preview) {
      new cdk.CfnOutput(this, 'PreviewBucketName', {
        value: this.preview.bucket.bucketName,
        description: 'S3 bucket holding pull-request previews',
      });

      new cdk.CfnOutput(this, 'PreviewWebsiteUrl', {
        value: this.preview.bucket.bucketWebsiteUrl,
        description: 'Base URL of pull-request previews',
      });
    }
  }
}
