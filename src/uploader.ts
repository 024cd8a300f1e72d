import * as path from 'path';
import type { Env, GitContext, RunResult, Transport, UploaderOptions, UploadOutcome } from './types';
import { readGitContext } from './git/git-context';
import { loadConfig } from './config/config-loader';
import { resolve } from './ci/environment-resolver';
import { matchingDetectors } from './ci/ci-detector';
import { discover } from './discovery/report-discovery';
import { assemblePayload, withPayloadFile } from './payload/payload-assembler';
import { upload, DEFAULT_ENDPOINT, DEFAULT_MAX_ATTEMPTS } from './upload/upload-client';

export interface UploaderDeps {
  env?: Env;
  git?: GitContext;
  transport?: Transport;
  sleep?: (seconds: number) => Promise<void>;
  now?: Date;
}

export function describeOutcome(outcome: UploadOutcome): string {
  switch (outcome.kind) {
    case 'success':
      return `Uploaded in ${outcome.elapsedSeconds.toFixed(1)}s: ${outcome.reportUrl}`;
    case 'retryable-failure':
      return `Upload failed with HTTP ${outcome.httpStatus}`;
    case 'terminal-failure':
      if (outcome.reason === 'exhausted') return outcome.body;
      if (outcome.reason === 'malformed') return `Unexpected response from server: ${outcome.body || '(empty)'}`;
      if (outcome.httpStatus === 0) return `Could not reach server: ${outcome.body}`;
      return `Upload rejected with HTTP ${outcome.httpStatus}: ${outcome.body}`;
  }
}

/**
 * Run one upload: resolve build metadata, discover reports, assemble and
 * compress the payload, then upload it. Expected failures come back as a
 * `RunResult`; nothing here decides the process exit code.
 */
export async function runUpload(options: UploaderOptions = {}, deps: UploaderDeps = {}): Promise<RunResult> {
  const env = deps.env ?? process.env;
  const root = path.resolve(options.root ?? process.cwd());
  const git = deps.git ?? readGitContext(root);

  const config = loadConfig(root, options.configFile);
  for (const warning of config.warnings) console.warn(`[covpush] ${warning}`);

  const providers = matchingDetectors(env);
  console.log(providers.length > 0 ? `CI detected: ${providers.join(', ')}` : 'No CI provider detected');

  const metadata = resolve(env, git, options.overrides, config.values, deps.now);
  console.log(`Commit ${metadata.commit || '(unknown)'} on ${metadata.branch || '(unknown branch)'}${metadata.slug ? ` for ${metadata.slug}` : ''}`);

  const discovery = discover({
    root,
    includeGlobs: options.includeGlobs,
    excludeGlobs: options.excludeGlobs,
    stdin: options.stdin,
  });
  for (const warning of discovery.warnings) console.warn(`[covpush] ${warning}`);

  if (discovery.filesFound === 0) {
    console.error('[covpush] No coverage reports found. Nothing to upload.');
    return { kind: 'no-data' };
  }
  for (const block of discovery.blocks) {
    console.log(`  + ${block.path || '(stdin)'}`);
  }
  console.log(`Found ${discovery.filesFound} report${discovery.filesFound === 1 ? '' : 's'}`);

  const includeNetwork = options.includeNetwork ?? true;
  const payload = assemblePayload(discovery.blocks, {
    network: includeNetwork ? git.trackedFiles() : undefined,
    envVars: options.envVars,
    env,
  });

  if (options.dryRun) {
    console.log('Dry run: skipping upload');
    return { kind: 'dry-run', payload };
  }

  const token = options.token || env.COVPUSH_TOKEN || config.values.token || '';
  const endpoint = options.endpoint || env.COVPUSH_URL || DEFAULT_ENDPOINT;

  const outcome = await withPayloadFile(payload, (file) => {
    console.log(`Uploading ${file.compressed.length} bytes to ${endpoint}`);
    return upload({
      metadata,
      payload: file.compressed,
      endpoint,
      token,
      maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
      transport: deps.transport,
      sleep: deps.sleep,
    });
  });

  if (outcome.kind === 'success') {
    console.log(describeOutcome(outcome));
    return { kind: 'uploaded', reportUrl: outcome.reportUrl };
  }

  console.error(`[covpush] ${describeOutcome(outcome)}`);
  return { kind: 'upload-failed', outcome };
}
