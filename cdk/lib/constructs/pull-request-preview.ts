import * as cdk from 'aws-cdk-lib';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as codebuild from 'aws-cdk-lib/aws-codebuild';
import { Construct } from 'constructs';
import { previewBuildSpec } from '../buildspec';

export interface PullRequestPreviewProps {
  siteName: string;
  githubOwner: string;
  githubRepo: string;
  /** Pull requests targeting this branch get a preview */
  baseBranch: string;
  jekyllDir: string;
  githubTokenParameter: string;
  expireAfterDays: number;
}

/** Key prefix CodeBuild uses as source version for pull-request builds. */
export const PREVIEW_PREFIX = 'pr/';

/**
 * Public S3 website holding one rendered copy of the blog per pull request,
 * and the CodeBuild project that renders it.
 */
export class PullRequestPreview extends Construct {
  public readonly bucket: s3.Bucket;
  public readonly project: codebuild.Project;

  constructor(scope: Construct, id: string, props: PullRequestPreviewProps) {
    super(scope, id);

    const {
      siteName,
      githubOwner,
      githubRepo,
      baseBranch,
      jekyllDir,
      githubTokenParameter,
      expireAfterDays,
    } = props;
    const account = cdk.Stack.of(this).account;

    // Previews are served straight from the S3 website endpoint
    this.bucket = new s3.Bucket(this, 'PreviewBucket', {
      bucketName: `${siteName}-preview-${account}`,
      websiteIndexDocument: 'index.html',
      publicReadAccess: true,
      blockPublicAccess: new s3.BlockPublicAccess({
        blockPublicAcls: true,
        ignorePublicAcls: true,
        blockPublicPolicy: false,
        restrictPublicBuckets: false,
      }),
      encryption: s3.BucketEncryption.S3_MANAGED,
      lifecycleRules: [
        {
          id: 'ExpirePreviews',
          prefix: PREVIEW_PREFIX,
          expiration: cdk.Duration.days(expireAfterDays),
        },
      ],
      removalPolicy: cdk.RemovalPolicy.DESTROY,
      autoDeleteObjects: true,
    });

    this.project = new codebuild.Project(this, 'PreviewProject', {
      projectName: `${siteName}-preview`,
      description: `Renders pull requests of ${githubOwner}/${githubRepo} into the preview bucket`,
      source: codebuild.Source.gitHub({
        owner: githubOwner,
        repo: githubRepo,
        webhook: true,
        webhookFilters: [
          codebuild.FilterGroup.inEventOf(
            codebuild.EventAction.PULL_REQUEST_CREATED,
            codebuild.EventAction.PULL_REQUEST_UPDATED,
            codebuild.EventAction.PULL_REQUEST_REOPENED
          ).andBaseBranchIs(baseBranch),
        ],
        reportBuildStatus: true,
      }),
      environment: {
        buildImage: codebuild.LinuxBuildImage.STANDARD_7_0,
        computeType: codebuild.ComputeType.SMALL,
      },
      environmentVariables: {
        PREVIEW_BUCKET: { value: this.bucket.bucketName },
        PREVIEW_BASE_URL: { value: this.bucket.bucketWebsiteUrl },
        GITHUB_REPOSITORY: { value: `${githubOwner}/${githubRepo}` },
        GH_TOKEN: {
          type: codebuild.BuildEnvironmentVariableType.PARAMETER_STORE,
          value: githubTokenParameter,
        },
      },
      buildSpec: codebuild.BuildSpec.fromObject(previewBuildSpec({ jekyllDir })),
      cache: codebuild.Cache.local(codebuild.LocalCacheMode.CUSTOM),
      timeout: cdk.Duration.minutes(20),
    });

    // s3 sync --delete needs list, put and delete on the preview prefix
    this.bucket.grantReadWrite(this.project);
  }
}
