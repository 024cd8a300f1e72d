import type {
  BuildMetadata,
  BuildMetadataFields,
  CIDetector,
  ConfigValues,
  DetectedFields,
  Env,
  GitContext,
  GitRemote,
  MetadataOverrides,
} from '../types';
import { CI_DETECTORS } from './ci-detector';

export interface RemoteLocation {
  repoHost: string;
  slug: string;
}

/**
 * Derive host and owner/repo slug from a git remote URL.
 *
 * `https://host.com/owner/repo.git` and `git@host.com:owner/repo.git` both
 * give `{ repoHost: 'host', slug: 'owner/repo' }`.
 */
export function parseRemoteUrl(remoteUrl: string): RemoteLocation {
  if (!remoteUrl) return { repoHost: '', slug: '' };

  let repoHost: string;
  let slug: string;

  if (remoteUrl.includes('//')) {
    const fields = remoteUrl.split('/');
    repoHost = (fields[2] ?? '').replace(/\.com$/, '');
    slug = fields.slice(3, 5).join('/');
  } else {
    const at = remoteUrl.indexOf('@');
    const afterAt = remoteUrl.slice(at + 1);
    repoHost = afterAt.split(/[.:]/)[0];
    const colon = remoteUrl.indexOf(':');
    slug = colon === -1 ? '' : remoteUrl.slice(colon + 1).replace(/^\//, '');
  }

  slug = slug.replace(/\.git$/, '');
  if (slug === '/') slug = '';

  return { repoHost, slug };
}

/** Server-side format for remotes: `name,url` pairs separated by `;`. */
export function serializeRemotes(remotes: readonly GitRemote[]): string {
  return remotes.map(r => `${r.name},${r.url}`).join(';');
}

function defaultRemoteUrl(remotes: readonly GitRemote[]): string {
  return (remotes.find(r => r.name === 'origin') ?? remotes[0])?.url ?? '';
}

/**
 * Apply every matching detector in order; later matches overwrite earlier ones.
 */
export function detectFields(env: Env, detectors: readonly CIDetector[] = CI_DETECTORS): Partial<DetectedFields> {
  return detectors
    .filter(d => d.matches(env))
    .reduce<Partial<DetectedFields>>((acc, d) => ({ ...acc, ...d.detect(env) }), {});
}

/**
 * Fold git defaults, CI detection, config fallbacks and explicit overrides
 * into one canonical record. Never throws; unknown values stay empty.
 */
export function resolve(
  env: Env,
  git: GitContext,
  overrides: MetadataOverrides = {},
  fallbacks: ConfigValues = {},
  now: Date = new Date(),
  detectors: readonly CIDetector[] = CI_DETECTORS,
): BuildMetadata {
  const { remoteUrl: detectedRemote, ...detected } = detectFields(env, detectors);
  const remote = parseRemoteUrl(detectedRemote || defaultRemoteUrl(git.remotes));

  const metadata: BuildMetadataFields = {
    serviceName: '',
    serviceJobId: '',
    pullRequestId: '',
    repoHost: remote.repoHost,
    buildId: '',
    buildUrl: '',
    labels: [],
    gitRoot: git.root,
    gitRemotes: git.remotes,
    commit: git.commit,
    commitTimestamp: git.commitTimestamp,
    branch: git.branch,
    tag: git.tag,
    authorName: git.authorName,
    authorEmail: git.authorEmail,
    committerName: git.committerName,
    committerEmail: git.committerEmail,
    message: git.message,
    runAtTimestamp: now.toISOString(),
    ...detected,
    // Config fills the slug only when detection left it empty; the local git remote comes last
    slug: detected.slug || (detectedRemote ? remote.slug : '') || fallbacks.slug || remote.slug,
  };

  if (metadata.labels.length === 0 && fallbacks.labels) metadata.labels = fallbacks.labels;

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(metadata, { [key]: value });
  }

  return Object.freeze({
    ...metadata,
    labels: Object.freeze([...metadata.labels]),
    gitRemotes: Object.freeze([...metadata.gitRemotes]),
  });
}
