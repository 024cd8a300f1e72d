import { describe, it, expect } from 'vitest';
import { parseRemoteUrl, serializeRemotes, detectFields, resolve } from './environment-resolver';
import { emptyGitContext } from '../git/git-context';
import type { GitContext } from '../types';

const NOW = new Date('2024-05-01T12:00:00.000Z');

function createGit(overrides: Partial<GitContext> = {}): GitContext {
  return {
    ...emptyGitContext(),
    root: '/work/widgets',
    commit: 'git-sha',
    commitTimestamp: '2024-05-01T10:00:00+00:00',
    branch: 'git-branch',
    authorName: 'Ada',
    authorEmail: 'ada@example.com',
    committerName: 'Ada',
    committerEmail: 'ada@example.com',
    message: 'Add widgets',
    remotes: [{ name: 'origin', url: 'git@host.com:owner/repo.git' }],
    ...overrides,
  };
}

describe('parseRemoteUrl', () => {
  it('parses SSH-style remotes', () => {
    expect(parseRemoteUrl('git@host.com:owner/repo.git')).toEqual({ repoHost: 'host', slug: 'owner/repo' });
  });

  it('parses HTTPS-style remotes', () => {
    expect(parseRemoteUrl('https://host.com/owner/repo.git')).toEqual({ repoHost: 'host', slug: 'owner/repo' });
  });

  it('keeps non-.com hosts whole on HTTPS remotes', () => {
    expect(parseRemoteUrl('https://gitlab.example.org/group/project')).toEqual({
      repoHost: 'gitlab.example.org',
      slug: 'group/project',
    });
  });

  it('ignores path segments past owner/repo', () => {
    expect(parseRemoteUrl('https://host.com/owner/repo/extra').slug).toBe('owner/repo');
  });

  it('tolerates a leading slash after the colon', () => {
    expect(parseRemoteUrl('git@host.com:/owner/repo.git').slug).toBe('owner/repo');
  });

  it('normalizes a bare slash slug to empty', () => {
    expect(parseRemoteUrl('https://host.com//')).toEqual({ repoHost: 'host', slug: '' });
  });

  it('returns empty values for an empty URL', () => {
    expect(parseRemoteUrl('')).toEqual({ repoHost: '', slug: '' });
  });
});

describe('serializeRemotes', () => {
  it('joins name,url pairs with semicolons', () => {
    expect(serializeRemotes([
      { name: 'origin', url: 'git@host.com:owner/repo.git' },
      { name: 'fork', url: 'https://host.com/me/repo.git' },
    ])).toBe('origin,git@host.com:owner/repo.git;fork,https://host.com/me/repo.git');
  });

  it('is empty without remotes', () => {
    expect(serializeRemotes([])).toBe('');
  });
});

describe('detectFields', () => {
  it('lets a later matching detector overwrite an earlier one', () => {
    const fields = detectFields({
      JENKINS_URL: 'https://jenkins.example.com/',
      GIT_BRANCH: 'jenkins-branch',
      BUILD_URL: 'https://jenkins.example.com/job/1/',
      CI: 'true',
      TRAVIS: 'true',
      TRAVIS_BRANCH: 'travis-branch',
    });

    expect(fields.serviceName).toBe('travis');
    expect(fields.branch).toBe('travis-branch');
    // Travis sets no build URL, so the Jenkins value survives
    expect(fields.buildUrl).toBe('https://jenkins.example.com/job/1/');
  });
});

describe('resolve', () => {
  it('uses git defaults outside of CI', () => {
    const metadata = resolve({}, createGit(), {}, {}, NOW);

    expect(metadata).toEqual({
      serviceName: '',
      serviceJobId: '',
      pullRequestId: '',
      repoHost: 'host',
      slug: 'owner/repo',
      buildId: '',
      buildUrl: '',
      labels: [],
      gitRoot: '/work/widgets',
      gitRemotes: [{ name: 'origin', url: 'git@host.com:owner/repo.git' }],
      commit: 'git-sha',
      commitTimestamp: '2024-05-01T10:00:00+00:00',
      branch: 'git-branch',
      tag: '',
      authorName: 'Ada',
      authorEmail: 'ada@example.com',
      committerName: 'Ada',
      committerEmail: 'ada@example.com',
      message: 'Add widgets',
      runAtTimestamp: '2024-05-01T12:00:00.000Z',
    });
  });

  it('lets CI detection win over git defaults', () => {
    const metadata = resolve({
      CI: 'true',
      CIRCLECI: 'true',
      CIRCLE_BRANCH: 'circle-branch',
      CIRCLE_SHA1: 'circle-sha',
      CIRCLE_BUILD_NUM: '12',
    }, createGit(), {}, {}, NOW);

    expect(metadata.serviceName).toBe('circleci');
    expect(metadata.branch).toBe('circle-branch');
    expect(metadata.commit).toBe('circle-sha');
    expect(metadata.buildId).toBe('12');
  });

  it('keeps git values a matching detector does not supply', () => {
    const metadata = resolve({ GITLAB_CI: 'true' }, createGit(), {}, {}, NOW);

    expect(metadata.serviceName).toBe('gitlab');
    expect(metadata.branch).toBe('git-branch');
    expect(metadata.commit).toBe('git-sha');
  });

  it('lets overrides win over detection, including empty values', () => {
    const metadata = resolve(
      { GITHUB_ACTIONS: 'true', GITHUB_REF: 'refs/heads/main', GITHUB_SHA: 'gh-sha', GITHUB_REPOSITORY: 'acme/widgets' },
      createGit(),
      { branch: 'release', commit: '', labels: ['unit'] },
      {},
      NOW,
    );

    expect(metadata.branch).toBe('release');
    expect(metadata.commit).toBe('');
    expect(metadata.slug).toBe('acme/widgets');
    expect(metadata.labels).toEqual(['unit']);
  });

  it('derives host and slug from a detector-supplied remote', () => {
    const metadata = resolve(
      { TEAMCITY_VERSION: '2024.1', TEAMCITY_BUILD_REPOSITORY: 'https://bitbucket.org/team/app.git' },
      createGit(),
      {},
      {},
      NOW,
    );

    expect(metadata.repoHost).toBe('bitbucket.org');
    expect(metadata.slug).toBe('team/app');
  });

  it('prefers the origin remote over the first listed', () => {
    const metadata = resolve({}, createGit({
      remotes: [
        { name: 'fork', url: 'git@fork.com:me/repo.git' },
        { name: 'origin', url: 'git@host.com:owner/repo.git' },
      ],
    }), {}, {}, NOW);

    expect(metadata.repoHost).toBe('host');
    expect(metadata.slug).toBe('owner/repo');
  });

  describe('config fallbacks', () => {
    it('fill a slug nothing else provided', () => {
      const metadata = resolve({}, createGit({ remotes: [] }), {}, { slug: 'config/slug', labels: ['cfg'] }, NOW);

      expect(metadata.slug).toBe('config/slug');
      expect(metadata.labels).toEqual(['cfg']);
    });

    it('fill the slug ahead of the local git remote', () => {
      const metadata = resolve(
        {},
        createGit({ remotes: [{ name: 'origin', url: 'git@github.com:fork/repo.git' }] }),
        {},
        { slug: 'upstream/repo' },
        NOW,
      );

      expect(metadata.slug).toBe('upstream/repo');
      expect(metadata.repoHost).toBe('github');
    });

    it('lose to a slug derived from a detector-supplied remote', () => {
      const metadata = resolve(
        { TEAMCITY_VERSION: '2024.1', TEAMCITY_BUILD_REPOSITORY: 'https://bitbucket.org/team/app.git' },
        createGit(),
        {},
        { slug: 'config/slug' },
        NOW,
      );

      expect(metadata.slug).toBe('team/app');
    });

    it('lose to detection', () => {
      const metadata = resolve(
        { CI: 'true', TRAVIS: 'true', TRAVIS_REPO_SLUG: 'travis/slug' },
        createGit(),
        {},
        { slug: 'config/slug' },
        NOW,
      );

      expect(metadata.slug).toBe('travis/slug');
    });

    it('lose to overrides', () => {
      const metadata = resolve({}, createGit({ remotes: [] }), { slug: 'flag/slug', labels: ['flag'] }, {
        slug: 'config/slug',
        labels: ['cfg'],
      }, NOW);

      expect(metadata.slug).toBe('flag/slug');
      expect(metadata.labels).toEqual(['flag']);
    });
  });

  it('returns a frozen record', () => {
    const metadata = resolve({}, createGit(), {}, {}, NOW);

    expect(Object.isFrozen(metadata)).toBe(true);
    expect(Object.isFrozen(metadata.labels)).toBe(true);
  });

  it('never throws on a bare environment', () => {
    const metadata = resolve({}, emptyGitContext(), {}, {}, NOW);

    expect(metadata.slug).toBe('');
    expect(metadata.repoHost).toBe('');
    expect(metadata.commit).toBe('');
  });
});
