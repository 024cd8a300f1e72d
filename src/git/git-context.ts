import { execFileSync } from 'child_process';
import type { GitContext, GitRemote } from '../types';

export type GitRunner = (args: string[], cwd: string) => string;

const defaultRunner: GitRunner = (args, cwd) =>
  execFileSync('git', args, {
    cwd,
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'ignore'],
  });

/**
 * Parse `git remote -v` output into unique (name, url) pairs, keeping the
 * fetch URL when fetch and push differ.
 */
export function parseRemotes(output: string): GitRemote[] {
  const remotes: GitRemote[] = [];
  const seen = new Set<string>();

  for (const line of output.split('\n')) {
    const match = line.trim().match(/^(\S+)\s+(\S+)(?:\s+\((fetch|push)\))?$/);
    if (!match) continue;
    const [, name, url] = match;
    if (seen.has(name)) continue;
    seen.add(name);
    remotes.push({ name, url });
  }

  return remotes;
}

/**
 * Read repository metadata by shelling out to git.
 * A failing command yields an empty value for that field only.
 */
export function readGitContext(cwd: string, runGit: GitRunner = defaultRunner): GitContext {
  const git = (...args: string[]): string => {
    try {
      return runGit(args, cwd).trim();
    } catch {
      return '';
    }
  };

  // One log call for all commit fields; \x1f never appears in names or hashes
  const [
    commit = '',
    commitTimestamp = '',
    authorName = '',
    authorEmail = '',
    committerName = '',
    committerEmail = '',
    message = '',
  ] = git('log', '-1', '--format=%H%x1f%cI%x1f%an%x1f%ae%x1f%cn%x1f%ce%x1f%s').split('\x1f');

  const branch = git('rev-parse', '--abbrev-ref', 'HEAD');

  return {
    root: git('rev-parse', '--show-toplevel'),
    commit,
    commitTimestamp,
    branch: branch === 'HEAD' ? '' : branch,
    tag: git('describe', '--tags', '--exact-match'),
    authorName,
    authorEmail,
    committerName,
    committerEmail,
    message,
    remotes: parseRemotes(git('remote', '-v')),
    trackedFiles: () => git('ls-files').split('\n').filter(Boolean),
  };
}

/** Context used when the build directory is not a repository at all. */
export function emptyGitContext(): GitContext {
  return {
    root: '',
    commit: '',
    commitTimestamp: '',
    branch: '',
    tag: '',
    authorName: '',
    authorEmail: '',
    committerName: '',
    committerEmail: '',
    message: '',
    remotes: [],
    trackedFiles: () => [],
  };
}
