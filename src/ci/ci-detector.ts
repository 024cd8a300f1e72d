import type { CIDetector, DetectedFields, Env } from '../types';

const DETECTED_KEYS: readonly (keyof DetectedFields)[] = [
  'serviceName',
  'serviceJobId',
  'pullRequestId',
  'slug',
  'buildId',
  'buildUrl',
  'commit',
  'branch',
  'tag',
  'remoteUrl',
];

/** Drop unset and empty values; a detector never clears an earlier field. */
function compact(fields: { [K in keyof DetectedFields]?: string | undefined }): Partial<DetectedFields> {
  const result: Partial<DetectedFields> = {};
  for (const key of DETECTED_KEYS) {
    const value = fields[key];
    if (value) result[key] = value;
  }
  return result;
}

/** Pull request flags that providers set to "false" outside of PR builds. */
function pullRequest(value: string | undefined): string | undefined {
  return value === 'false' ? undefined : value;
}

function stripRefPrefix(ref: string | undefined): string | undefined {
  return ref?.replace(/^refs\/heads\//, '');
}

/**
 * CI provider detectors in priority order.
 *
 * Several may match the same environment; the resolver applies every match
 * in this order so later entries overwrite earlier ones.
 */
export const CI_DETECTORS: readonly CIDetector[] = [
  {
    // Generic variables any CI can export to describe the build explicitly
    name: 'custom',
    matches: (env) => !!(env.VCS_COMMIT_ID || env.VCS_BRANCH_NAME || env.VCS_PULL_REQUEST
      || env.VCS_SLUG || env.VCS_TAG || env.CI_BUILD_URL || env.CI_BUILD_ID || env.CI_JOB_ID),
    detect: (env) => compact({
      commit: env.VCS_COMMIT_ID,
      branch: env.VCS_BRANCH_NAME,
      pullRequestId: pullRequest(env.VCS_PULL_REQUEST),
      slug: env.VCS_SLUG,
      tag: env.VCS_TAG,
      buildUrl: env.CI_BUILD_URL,
      buildId: env.CI_BUILD_ID,
      serviceJobId: env.CI_JOB_ID,
    }),
  },
  {
    name: 'jenkins',
    matches: (env) => !!env.JENKINS_URL,
    detect: (env) => compact({
      serviceName: 'jenkins',
      // GitHub pull request builder plugin variables take priority
      branch: env.ghprbSourceBranch || env.GIT_BRANCH || env.BRANCH_NAME,
      commit: env.ghprbActualCommit || env.GIT_COMMIT,
      pullRequestId: env.ghprbPullId || env.CHANGE_ID,
      buildId: env.BUILD_NUMBER,
      buildUrl: env.BUILD_URL,
    }),
  },
  {
    name: 'travis',
    matches: (env) => env.CI === 'true' && env.TRAVIS === 'true' && env.SHIPPABLE !== 'true',
    detect: (env) => compact({
      serviceName: 'travis',
      commit: env.TRAVIS_PULL_REQUEST_SHA || env.TRAVIS_COMMIT,
      buildId: env.TRAVIS_JOB_NUMBER,
      pullRequestId: pullRequest(env.TRAVIS_PULL_REQUEST),
      serviceJobId: env.TRAVIS_JOB_ID,
      slug: env.TRAVIS_REPO_SLUG,
      tag: env.TRAVIS_TAG,
      // Tag builds report the tag as the branch
      branch: env.TRAVIS_BRANCH !== env.TRAVIS_TAG
        ? env.TRAVIS_PULL_REQUEST_BRANCH || env.TRAVIS_BRANCH
        : undefined,
    }),
  },
  {
    name: 'docker',
    matches: (env) => !!env.DOCKER_REPO,
    detect: (env) => compact({
      branch: env.SOURCE_BRANCH,
      commit: env.SOURCE_COMMIT,
      slug: env.DOCKER_REPO,
      tag: env.CACHE_TAG,
    }),
  },
  {
    name: 'codeship',
    matches: (env) => env.CI === 'true' && env.CI_NAME === 'codeship',
    detect: (env) => compact({
      serviceName: 'codeship',
      branch: env.CI_BRANCH,
      buildId: env.CI_BUILD_NUMBER,
      buildUrl: env.CI_BUILD_URL,
      commit: env.CI_COMMIT_ID,
    }),
  },
  {
    name: 'buddybuild',
    matches: (env) => !!env.BUDDYBUILD_BRANCH,
    detect: (env) => compact({
      serviceName: 'buddybuild',
      branch: env.BUDDYBUILD_BRANCH,
      buildId: env.BUDDYBUILD_BUILD_NUMBER,
      buildUrl: `https://dashboard.buddybuild.com/public/apps/${env.BUDDYBUILD_APP_ID ?? ''}/build/${env.BUDDYBUILD_BUILD_ID ?? ''}`,
    }),
  },
  {
    name: 'teamcity',
    matches: (env) => !!env.TEAMCITY_VERSION,
    detect: (env) => compact({
      serviceName: 'teamcity',
      branch: env.TEAMCITY_BUILD_BRANCH,
      buildId: env.TEAMCITY_BUILD_ID,
      buildUrl: env.TEAMCITY_BUILD_URL,
      commit: env.TEAMCITY_BUILD_COMMIT || env.BUILD_VCS_NUMBER,
      remoteUrl: env.TEAMCITY_BUILD_REPOSITORY,
    }),
  },
  {
    name: 'circleci',
    matches: (env) => env.CI === 'true' && env.CIRCLECI === 'true',
    detect: (env) => compact({
      serviceName: 'circleci',
      branch: env.CIRCLE_BRANCH,
      buildId: env.CIRCLE_BUILD_NUM,
      serviceJobId: env.CIRCLE_NODE_INDEX,
      slug: env.CIRCLE_PROJECT_USERNAME && env.CIRCLE_PROJECT_REPONAME
        ? `${env.CIRCLE_PROJECT_USERNAME}/${env.CIRCLE_PROJECT_REPONAME}`
        : undefined,
      remoteUrl: env.CIRCLE_REPOSITORY_URL,
      // CIRCLE_PULL_REQUEST is a full URL; the id is its last segment
      pullRequestId: env.CIRCLE_PR_NUMBER || env.CIRCLE_PULL_REQUEST?.split('/').pop(),
      commit: env.CIRCLE_SHA1,
    }),
  },
  {
    name: 'bitrise',
    matches: (env) => !!env.BITRISE_IO,
    detect: (env) => compact({
      serviceName: 'bitrise',
      branch: env.BITRISE_GIT_BRANCH,
      buildId: env.BITRISE_BUILD_NUMBER,
      buildUrl: env.BITRISE_BUILD_URL,
      pullRequestId: env.BITRISE_PULL_REQUEST,
      commit: env.GIT_CLONE_COMMIT_HASH,
    }),
  },
  {
    name: 'semaphore',
    matches: (env) => env.CI === 'true' && env.SEMAPHORE === 'true',
    detect: (env) => compact({
      serviceName: 'semaphore',
      branch: env.BRANCH_NAME,
      buildId: env.SEMAPHORE_BUILD_NUMBER,
      serviceJobId: env.SEMAPHORE_CURRENT_THREAD,
      pullRequestId: env.PULL_REQUEST_NUMBER,
      slug: env.SEMAPHORE_REPO_SLUG,
      commit: env.REVISION,
    }),
  },
  {
    name: 'buildkite',
    matches: (env) => env.BUILDKITE === 'true',
    detect: (env) => compact({
      serviceName: 'buildkite',
      branch: env.BUILDKITE_BRANCH,
      buildId: env.BUILDKITE_BUILD_NUMBER,
      serviceJobId: env.BUILDKITE_JOB_ID,
      buildUrl: env.BUILDKITE_BUILD_URL,
      slug: env.BUILDKITE_PROJECT_SLUG,
      commit: env.BUILDKITE_COMMIT,
      pullRequestId: pullRequest(env.BUILDKITE_PULL_REQUEST),
      tag: env.BUILDKITE_TAG,
    }),
  },
  {
    name: 'drone',
    matches: (env) => env.CI === 'drone' || env.DRONE === 'true',
    detect: (env) => compact({
      serviceName: 'drone.io',
      branch: env.DRONE_BRANCH,
      buildId: env.DRONE_BUILD_NUMBER,
      buildUrl: env.DRONE_BUILD_LINK || env.DRONE_BUILD_URL,
      pullRequestId: env.DRONE_PULL_REQUEST,
      serviceJobId: env.DRONE_JOB_NUMBER,
      tag: env.DRONE_TAG,
      commit: env.DRONE_COMMIT_SHA,
    }),
  },
  {
    name: 'heroku',
    matches: (env) => !!env.HEROKU_TEST_RUN_BRANCH,
    detect: (env) => compact({
      serviceName: 'heroku',
      branch: env.HEROKU_TEST_RUN_BRANCH,
      buildId: env.HEROKU_TEST_RUN_ID,
      commit: env.HEROKU_TEST_RUN_COMMIT_VERSION,
    }),
  },
  {
    name: 'appveyor',
    // AppVeyor exports these as "True"
    matches: (env) => (env.CI === 'True' || env.CI === 'true')
      && (env.APPVEYOR === 'True' || env.APPVEYOR === 'true'),
    detect: (env) => compact({
      serviceName: 'appveyor',
      branch: env.APPVEYOR_REPO_BRANCH,
      buildId: env.APPVEYOR_JOB_ID,
      pullRequestId: env.APPVEYOR_PULL_REQUEST_NUMBER,
      serviceJobId: env.APPVEYOR_ACCOUNT_NAME && env.APPVEYOR_PROJECT_SLUG && env.APPVEYOR_BUILD_VERSION
        ? `${env.APPVEYOR_ACCOUNT_NAME}/${env.APPVEYOR_PROJECT_SLUG}/${env.APPVEYOR_BUILD_VERSION}`
        : undefined,
      slug: env.APPVEYOR_REPO_NAME,
      commit: env.APPVEYOR_REPO_COMMIT,
    }),
  },
  {
    name: 'wercker',
    matches: (env) => env.CI === 'true' && !!env.WERCKER_GIT_BRANCH,
    detect: (env) => compact({
      serviceName: 'wercker',
      branch: env.WERCKER_GIT_BRANCH,
      buildId: env.WERCKER_MAIN_PIPELINE_STARTED,
      slug: env.WERCKER_GIT_OWNER && env.WERCKER_GIT_REPOSITORY
        ? `${env.WERCKER_GIT_OWNER}/${env.WERCKER_GIT_REPOSITORY}`
        : undefined,
      commit: env.WERCKER_GIT_COMMIT,
    }),
  },
  {
    name: 'magnum',
    matches: (env) => env.CI === 'true' && env.MAGNUM === 'true',
    detect: (env) => compact({
      serviceName: 'magnum',
      branch: env.CI_BRANCH,
      buildId: env.CI_BUILD_NUMBER,
      commit: env.CI_COMMIT,
    }),
  },
  {
    name: 'shippable',
    matches: (env) => env.SHIPPABLE === 'true',
    detect: (env) => compact({
      serviceName: 'shippable',
      branch: env.BRANCH,
      buildId: env.BUILD_NUMBER,
      buildUrl: env.BUILD_URL,
      pullRequestId: pullRequest(env.PULL_REQUEST),
      slug: env.REPO_FULL_NAME,
      commit: env.COMMIT,
    }),
  },
  {
    name: 'snap',
    matches: (env) => env.CI === 'true' && env.SNAP_CI === 'true',
    detect: (env) => compact({
      serviceName: 'snap',
      branch: env.SNAP_BRANCH || env.SNAP_UPSTREAM_BRANCH,
      buildId: env.SNAP_PIPELINE_COUNTER,
      pullRequestId: env.SNAP_PULL_REQUEST_NUMBER,
      commit: env.SNAP_COMMIT || env.SNAP_UPSTREAM_COMMIT,
    }),
  },
  {
    name: 'gitlab',
    matches: (env) => !!env.GITLAB_CI,
    detect: (env) => compact({
      serviceName: 'gitlab',
      // Pre-9.0 runners use the CI_BUILD_* names
      branch: env.CI_BUILD_REF_NAME || env.CI_COMMIT_REF_NAME,
      buildId: env.CI_BUILD_ID || env.CI_JOB_ID,
      remoteUrl: env.CI_BUILD_REPO || env.CI_REPOSITORY_URL,
      commit: env.CI_BUILD_REF || env.CI_COMMIT_SHA,
      slug: env.CI_PROJECT_PATH,
      pullRequestId: env.CI_MERGE_REQUEST_IID,
      tag: env.CI_COMMIT_TAG,
    }),
  },
  {
    name: 'azure_pipelines',
    matches: (env) => !!env.SYSTEM_TEAMFOUNDATIONSERVERURI,
    detect: (env) => compact({
      serviceName: 'azure_pipelines',
      commit: env.BUILD_SOURCEVERSION,
      buildId: env.BUILD_BUILDNUMBER,
      pullRequestId: env.SYSTEM_PULLREQUEST_PULLREQUESTID || env.SYSTEM_PULLREQUEST_PULLREQUESTNUMBER,
      serviceJobId: env.BUILD_BUILDID,
      branch: env.BUILD_SOURCEBRANCHNAME,
      buildUrl: env.SYSTEM_TEAMPROJECT && env.BUILD_BUILDID
        ? `${env.SYSTEM_TEAMFOUNDATIONSERVERURI}${env.SYSTEM_TEAMPROJECT}/_build/results?buildId=${env.BUILD_BUILDID}`
        : undefined,
      remoteUrl: env.BUILD_REPOSITORY_URI,
    }),
  },
  {
    name: 'github-actions',
    matches: (env) => env.GITHUB_ACTIONS === 'true',
    detect: (env) => {
      const pr = env.GITHUB_REF?.match(/^refs\/pull\/(\d+)\/merge$/);
      const slug = env.GITHUB_REPOSITORY;
      return compact({
        serviceName: 'github-actions',
        branch: env.GITHUB_HEAD_REF || stripRefPrefix(env.GITHUB_REF),
        commit: env.GITHUB_SHA,
        slug,
        buildId: env.GITHUB_RUN_ID,
        buildUrl: slug && env.GITHUB_RUN_ID
          ? `${env.GITHUB_SERVER_URL || 'https://github.com'}/${slug}/actions/runs/${env.GITHUB_RUN_ID}`
          : undefined,
        pullRequestId: pr?.[1],
        tag: env.GITHUB_REF?.startsWith('refs/tags/') ? env.GITHUB_REF.slice('refs/tags/'.length) : undefined,
      });
    },
  },
  {
    name: 'bitbucket',
    matches: (env) => env.CI === 'true' && !!env.BITBUCKET_BUILD_NUMBER,
    detect: (env) => compact({
      serviceName: 'bitbucket',
      branch: env.BITBUCKET_BRANCH,
      buildId: env.BITBUCKET_BUILD_NUMBER,
      slug: env.BITBUCKET_REPO_OWNER && env.BITBUCKET_REPO_SLUG
        ? `${env.BITBUCKET_REPO_OWNER}/${env.BITBUCKET_REPO_SLUG}`
        : undefined,
      serviceJobId: env.BITBUCKET_BUILD_NUMBER,
      pullRequestId: env.BITBUCKET_PR_ID,
      commit: env.BITBUCKET_COMMIT,
      tag: env.BITBUCKET_TAG,
    }),
  },
  {
    name: 'cirrus-ci',
    matches: (env) => !!env.CIRRUS_CI,
    detect: (env) => compact({
      serviceName: 'cirrus-ci',
      branch: env.CIRRUS_BRANCH,
      buildId: env.CIRRUS_BUILD_ID,
      buildUrl: env.CIRRUS_TASK_ID ? `https://cirrus-ci.com/task/${env.CIRRUS_TASK_ID}` : undefined,
      serviceJobId: env.CIRRUS_TASK_NAME,
      slug: env.CIRRUS_REPO_FULL_NAME,
      pullRequestId: env.CIRRUS_PR,
      commit: env.CIRRUS_CHANGE_IN_REPO,
      tag: env.CIRRUS_TAG,
    }),
  },
  {
    name: 'codebuild',
    matches: (env) => env.CODEBUILD_CI === 'true',
    detect: (env) => {
      // Webhook-triggered PR builds set the source version to "pr/<id>"
      const pr = env.CODEBUILD_SOURCE_VERSION?.match(/^pr\/(\d+)$/);
      return compact({
        serviceName: 'codebuild',
        branch: stripRefPrefix(env.CODEBUILD_WEBHOOK_HEAD_REF),
        buildId: env.CODEBUILD_BUILD_ID,
        serviceJobId: env.CODEBUILD_BUILD_ID,
        commit: env.CODEBUILD_RESOLVED_SOURCE_VERSION,
        remoteUrl: env.CODEBUILD_SOURCE_REPO_URL,
        pullRequestId: pr?.[1],
      });
    },
  },
];

/**
 * Names of every detector that recognises the environment, in apply order.
 */
export function matchingDetectors(env: Env, detectors: readonly CIDetector[] = CI_DETECTORS): string[] {
  return detectors.filter(d => d.matches(env)).map(d => d.name);
}
