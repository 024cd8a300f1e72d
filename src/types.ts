// ============================================================================
// Git
// ============================================================================

export interface GitRemote {
  name: string;
  url: string;
}

/**
 * Read-only view of the repository the build ran in.
 * Every value is an empty string (or empty list) when git cannot supply it.
 */
export interface GitContext {
  root: string;
  commit: string;
  commitTimestamp: string;
  branch: string;
  tag: string;
  authorName: string;
  authorEmail: string;
  committerName: string;
  committerEmail: string;
  message: string;
  remotes: GitRemote[];
  trackedFiles(): string[];
}

// ============================================================================
// Build metadata
// ============================================================================

export interface BuildMetadataFields {
  serviceName: string;
  serviceJobId: string;
  pullRequestId: string;
  repoHost: string;
  slug: string;
  buildId: string;
  buildUrl: string;
  labels: readonly string[];
  gitRoot: string;
  gitRemotes: readonly GitRemote[];
  commit: string;
  commitTimestamp: string;
  branch: string;
  tag: string;
  authorName: string;
  authorEmail: string;
  committerName: string;
  committerEmail: string;
  message: string;
  runAtTimestamp: string;
}

/** Canonical description of one build, independent of the CI provider. */
export type BuildMetadata = Readonly<BuildMetadataFields>;

/** Explicit values from flags; a present key always wins, even when empty. */
export type MetadataOverrides = Partial<BuildMetadataFields>;

/** Values a CI provider detector may contribute. */
export interface DetectedFields {
  serviceName: string;
  serviceJobId: string;
  pullRequestId: string;
  slug: string;
  buildId: string;
  buildUrl: string;
  commit: string;
  branch: string;
  tag: string;
  // Remote the provider cloned from; feeds host/slug derivation only
  remoteUrl: string;
}

export interface CIDetector {
  name: string;
  matches(env: Env): boolean;
  detect(env: Env): Partial<DetectedFields>;
}

export type Env = Readonly<Record<string, string | undefined>>;

// ============================================================================
// Discovery
// ============================================================================

export type ReportFormatKind = 'plain' | 'gcov';

export interface ReportCandidate {
  path: string;
  byteLength: number;
  formatKind: ReportFormatKind;
}

export interface NormalizedBlock {
  /** Path relative to the discovery root; empty for piped input */
  path: string;
  /** Report bytes, terminated by the sentinel line */
  content: Buffer;
}

export interface DiscoveryOptions {
  root: string;
  includeGlobs?: string[];
  excludeGlobs?: string[];
  stdin?: Buffer;
}

export interface DiscoveryResult {
  blocks: NormalizedBlock[];
  filesFound: number;
  warnings: string[];
}

export type GcovLine =
  | { kind: 'header'; text: string }
  | { kind: 'count'; count: string; line: string }
  | { kind: 'function' }
  | { kind: 'skip'; reason: 'blank' | 'non-executable' | 'block-close' | 'malformed' };

// ============================================================================
// Upload
// ============================================================================

export interface TransportResponse {
  reportUrl: string;
  status: number;
  elapsedSeconds: number;
  body: string;
}

export interface TransportRequest {
  url: string;
  body: Buffer;
  headers: Record<string, string>;
}

export type Transport = (request: TransportRequest) => Promise<TransportResponse>;

export type UploadOutcome =
  | { kind: 'success'; reportUrl: string; elapsedSeconds: number; attempts: number }
  | { kind: 'retryable-failure'; httpStatus: number; attempts: number }
  | {
      kind: 'terminal-failure';
      httpStatus: number;
      body: string;
      attempts: number;
      reason: 'rejected' | 'exhausted' | 'malformed';
    };

// ============================================================================
// Configuration
// ============================================================================

export interface ConfigValues {
  token?: string;
  slug?: string;
  labels?: string[];
}

export interface UploaderOptions {
  // Core options
  root?: string;                   // Default: process.cwd()
  token?: string;                  // Default: COVPUSH_TOKEN, then config file
  endpoint?: string;               // Default: COVPUSH_URL, then the hosted endpoint
  configFile?: string;             // Default: first of covpush.yml, .covpush.yml, .github/covpush.yml

  // Discovery
  includeGlobs?: string[];         // Replaces the built-in report name patterns
  excludeGlobs?: string[];
  stdin?: Buffer;                  // Piped report; bypasses discovery

  // Payload
  includeNetwork?: boolean;        // Default: true (prefix tracked file list)
  envVars?: string[];              // Environment variables to embed

  // Metadata
  overrides?: MetadataOverrides;

  // Upload
  maxAttempts?: number;            // Default: 4
  dryRun?: boolean;                // Default: false
}

export type RunResult =
  | { kind: 'uploaded'; reportUrl: string }
  | { kind: 'dry-run'; payload: Buffer }
  | { kind: 'no-data' }
  | { kind: 'upload-failed'; outcome: UploadOutcome };
