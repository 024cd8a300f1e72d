import type { BuildMetadata, BuildMetadataFields } from '../types';
import { serializeRemotes } from '../ci/environment-resolver';

export const PACKAGE_ID = 'covpush-1.0.0';

/**
 * Query keys in wire order. The order follows the metadata record so the
 * query string is stable across runs.
 */
export const QUERY_KEYS: ReadonlyArray<[keyof BuildMetadataFields, string]> = [
  ['serviceName', 'service'],
  ['serviceJobId', 'job'],
  ['pullRequestId', 'pr'],
  ['repoHost', 'host'],
  ['slug', 'slug'],
  ['buildId', 'build'],
  ['buildUrl', 'build_url'],
  ['labels', 'flags'],
  ['gitRoot', 'root'],
  ['gitRemotes', 'remotes'],
  ['commit', 'commit'],
  ['commitTimestamp', 'commit_timestamp'],
  ['branch', 'branch'],
  ['tag', 'tag'],
  ['authorName', 'author_name'],
  ['authorEmail', 'author_email'],
  ['committerName', 'committer_name'],
  ['committerEmail', 'committer_email'],
  ['message', 'message'],
  ['runAtTimestamp', 'run_at'],
];

function isUnreserved(byte: number): boolean {
  return (byte >= 0x30 && byte <= 0x39)    // 0-9
    || (byte >= 0x41 && byte <= 0x5a)      // A-Z
    || (byte >= 0x61 && byte <= 0x7a)      // a-z
    || byte === 0x2d || byte === 0x5f || byte === 0x2e || byte === 0x7e; // - _ . ~
}

/**
 * Percent-encode every UTF-8 byte outside `[A-Za-z0-9-_.~]`.
 * Unlike encodeURIComponent this also escapes `!'()*`.
 */
export function percentEncode(value: string): string {
  let out = '';
  for (const byte of Buffer.from(value, 'utf-8')) {
    out += isUnreserved(byte)
      ? String.fromCharCode(byte)
      : `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
  }
  return out;
}

export function serializeField(metadata: BuildMetadata, field: keyof BuildMetadataFields): string {
  const value = metadata[field];
  if (field === 'gitRemotes') return serializeRemotes(metadata.gitRemotes);
  if (field === 'labels') return metadata.labels.join(',');
  return typeof value === 'string' ? value : '';
}

/**
 * Build the upload query string: token and package first, then every
 * metadata field as an encoded `key=value` pair.
 */
export function buildQuery(metadata: BuildMetadata, token: string, packageId: string = PACKAGE_ID): string {
  const pairs = [
    `token=${percentEncode(token.trim())}`,
    `package=${percentEncode(packageId)}`,
    ...QUERY_KEYS.map(([field, key]) => `${key}=${percentEncode(serializeField(metadata, field))}`),
  ];

  return pairs.join('&').replace(/\s+/g, '');
}
