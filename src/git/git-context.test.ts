import { describe, it, expect, vi } from 'vitest';
import { parseRemotes, readGitContext, emptyGitContext } from './git-context';
import type { GitRunner } from './git-context';

function createRunner(outputs: Record<string, string>): GitRunner {
  return vi.fn((args: string[]) => {
    const key = args.join(' ');
    if (key in outputs) return outputs[key];
    throw new Error(`fatal: unexpected git ${key}`);
  });
}

describe('parseRemotes', () => {
  it('collapses fetch and push lines into one remote', () => {
    const output = [
      'origin\tgit@example.com:acme/widgets.git (fetch)',
      'origin\tgit@example.com:acme/widgets.git (push)',
      'upstream\thttps://example.com/upstream/widgets.git (fetch)',
      'upstream\thttps://example.com/upstream/widgets.git (push)',
    ].join('\n');

    expect(parseRemotes(output)).toEqual([
      { name: 'origin', url: 'git@example.com:acme/widgets.git' },
      { name: 'upstream', url: 'https://example.com/upstream/widgets.git' },
    ]);
  });

  it('returns an empty list for empty output', () => {
    expect(parseRemotes('')).toEqual([]);
  });

  it('ignores lines that are not remotes', () => {
    expect(parseRemotes('   \n')).toEqual([]);
  });
});

describe('readGitContext', () => {
  it('reads commit fields from a single log call', () => {
    const runGit = createRunner({
      'log -1 --format=%H%x1f%cI%x1f%an%x1f%ae%x1f%cn%x1f%ce%x1f%s':
        'abc123\x1f2024-05-01T10:00:00+00:00\x1fAda\x1fada@example.com\x1fBob\x1fbob@example.com\x1fFix parser\n',
      'rev-parse --abbrev-ref HEAD': 'main\n',
      'rev-parse --show-toplevel': '/work/widgets\n',
      'describe --tags --exact-match': 'v1.2.0\n',
      'remote -v': 'origin\tgit@example.com:acme/widgets.git (fetch)\n',
      'ls-files': 'src/a.c\nsrc/b.c\n',
    });

    const git = readGitContext('/work/widgets', runGit);

    expect(git.commit).toBe('abc123');
    expect(git.commitTimestamp).toBe('2024-05-01T10:00:00+00:00');
    expect(git.authorName).toBe('Ada');
    expect(git.authorEmail).toBe('ada@example.com');
    expect(git.committerName).toBe('Bob');
    expect(git.committerEmail).toBe('bob@example.com');
    expect(git.message).toBe('Fix parser');
    expect(git.branch).toBe('main');
    expect(git.root).toBe('/work/widgets');
    expect(git.tag).toBe('v1.2.0');
    expect(git.remotes).toEqual([{ name: 'origin', url: 'git@example.com:acme/widgets.git' }]);
    expect(git.trackedFiles()).toEqual(['src/a.c', 'src/b.c']);
  });

  it('maps a detached HEAD to an empty branch', () => {
    const git = readGitContext('/work', createRunner({ 'rev-parse --abbrev-ref HEAD': 'HEAD\n' }));

    expect(git.branch).toBe('');
  });

  it('degrades to empty values when git fails', () => {
    const git = readGitContext('/not-a-repo', createRunner({}));

    expect(git).toMatchObject({
      root: '',
      commit: '',
      commitTimestamp: '',
      branch: '',
      tag: '',
      message: '',
      remotes: [],
    });
    expect(git.trackedFiles()).toEqual([]);
  });
});

describe('emptyGitContext', () => {
  it('has no values', () => {
    const git = emptyGitContext();

    expect(git.commit).toBe('');
    expect(git.remotes).toEqual([]);
    expect(git.trackedFiles()).toEqual([]);
  });
});
