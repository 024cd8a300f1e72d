#!/usr/bin/env node

import type { MetadataOverrides, RunResult, UploaderOptions } from '../types';
import { runUpload } from '../uploader';

export interface CliOptions {
  help: boolean;
  strict: boolean;
  pipe: boolean;
  upload: UploaderOptions;
}

export function printUsage(): void {
  console.log(`
Usage: covpush [options]

Find coverage reports in the current build and upload them.

Options:
  --token <token>      Upload token (default: $COVPUSH_TOKEN, then config file)
  --url <endpoint>     Ingestion endpoint (default: $COVPUSH_URL or https://ingest.covpush.dev)
  --dir <path>         Directory to search for reports (default: current directory)
  --file <glob>        Report glob to upload instead of the built-in patterns (repeatable)
  --exclude <glob>     Glob to leave out of the search; a bare name matches at any depth (repeatable)
  --label <label>      Label for this upload (repeatable)
  --config <path>      Config file (default: covpush.yml, .covpush.yml or .github/covpush.yml)
  --env <VAR>          Environment variable to embed in the payload (repeatable)
  --slug <owner/repo>  Override the repository slug
  --branch <name>      Override the branch
  --commit <sha>       Override the commit
  --pr <number>        Override the pull request number
  --build <id>         Override the build id
  --tag <tag>          Override the tag
  --pipe               Read a single report from stdin instead of searching
  --no-network         Do not include the repository file list
  --dry-run            Assemble the payload and print it without uploading
  --strict             Exit with status 1 when the upload fails
  -h, --help           Show this help

Examples:
  covpush --token $TOKEN
  covpush --file 'build/**/*.gcov' --label unit --strict
  cat coverage.xml | covpush --pipe
`);
}

/**
 * Turn argv into options. Unknown flags are rejected so typos do not
 * silently upload with the wrong settings.
 */
export function parseArgs(argv: string[]): CliOptions {
  const args = argv.slice(2);
  const upload: UploaderOptions = {};
  const overrides: MetadataOverrides = {};
  const options: CliOptions = { help: false, strict: false, pipe: false, upload };

  const includeGlobs: string[] = [];
  const excludeGlobs: string[] = [];
  const labels: string[] = [];
  const envVars: string[] = [];

  const value = (flag: string, i: number): string => {
    const next = args[i];
    if (next === undefined || next.startsWith('--')) {
      throw new Error(`${flag} requires a value`);
    }
    return next;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '--token':
        upload.token = value(arg, ++i);
        break;
      case '--url':
        upload.endpoint = value(arg, ++i);
        break;
      case '--dir':
        upload.root = value(arg, ++i);
        break;
      case '--file':
        includeGlobs.push(value(arg, ++i));
        break;
      case '--exclude':
        excludeGlobs.push(value(arg, ++i));
        break;
      case '--label':
        labels.push(...value(arg, ++i).split(',').map(l => l.trim()).filter(Boolean));
        break;
      case '--config':
        upload.configFile = value(arg, ++i);
        break;
      case '--env':
        envVars.push(value(arg, ++i));
        break;
      case '--slug':
        overrides.slug = value(arg, ++i);
        break;
      case '--branch':
        overrides.branch = value(arg, ++i);
        break;
      case '--commit':
        overrides.commit = value(arg, ++i);
        break;
      case '--pr':
        overrides.pullRequestId = value(arg, ++i);
        break;
      case '--build':
        overrides.buildId = value(arg, ++i);
        break;
      case '--tag':
        overrides.tag = value(arg, ++i);
        break;
      case '--pipe':
        options.pipe = true;
        break;
      case '--no-network':
        upload.includeNetwork = false;
        break;
      case '--dry-run':
        upload.dryRun = true;
        break;
      case '--strict':
        options.strict = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  if (includeGlobs.length > 0) upload.includeGlobs = includeGlobs;
  if (excludeGlobs.length > 0) upload.excludeGlobs = excludeGlobs;
  if (envVars.length > 0) upload.envVars = envVars;
  if (labels.length > 0) overrides.labels = labels;
  if (Object.keys(overrides).length > 0) upload.overrides = overrides;

  return options;
}

/** Exit status for a finished run: failures only fail the build in strict mode. */
export function exitCodeFor(result: RunResult, strict: boolean): number {
  if (result.kind === 'uploaded' || result.kind === 'dry-run') return 0;
  return strict ? 1 : 0;
}

async function readStdin(): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks);
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const options = parseArgs(argv);

  if (options.help) {
    printUsage();
    return 0;
  }

  if (options.pipe) {
    options.upload.stdin = await readStdin();
  }

  const result = await runUpload(options.upload);

  if (result.kind === 'dry-run') {
    process.stdout.write(result.payload);
  }

  return exitCodeFor(result, options.strict);
}

if (require.main === module) {
  const strict = process.argv.includes('--strict');
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(err => {
      console.error('Error:', err instanceof Error ? err.message : err);
      process.exitCode = strict ? 1 : 0;
    });
}
