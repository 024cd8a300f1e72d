import * as fs from 'fs';
import * as path from 'path';
import fg from 'fast-glob';
import patterns from './patterns.json';
import { normalizeGcov } from './gcov-parser';
import type {
  DiscoveryOptions,
  DiscoveryResult,
  NormalizedBlock,
  ReportCandidate,
  ReportFormatKind,
} from '../types';

export const END_OF_FILE = '# end_of_file #';

export const REPORT_NAME_PATTERNS: readonly string[] = patterns.include;
export const EXCLUDED_NAME_PATTERNS: readonly string[] = patterns.excludeNames;
export const PRUNED_DIRECTORIES: readonly string[] = patterns.pruneDirectories;

/**
 * Ignore patterns for a directory name. The trailing `/**` form is what lets
 * fast-glob skip reading the directory instead of filtering its entries.
 */
function pruneGlobs(dir: string): string[] {
  return [`**/${dir}`, `**/${dir}/**`];
}

export function classifyReport(filePath: string): ReportFormatKind {
  return filePath.endsWith('.gcov') ? 'gcov' : 'plain';
}

const NEWLINE = 0x0a;

export function terminateBlock(content: Buffer): Buffer {
  const needsNewline = content.length > 0 && content[content.length - 1] !== NEWLINE;
  return Buffer.concat([
    content,
    Buffer.from(`${needsNewline ? '\n' : ''}${END_OF_FILE}\n`),
  ]);
}

/**
 * Condense gcov output. Decoding as latin1 maps every byte to one code unit,
 * so source text in any encoding comes back unchanged.
 */
function normalizeReport(content: Buffer, formatKind: ReportFormatKind): Buffer {
  if (formatKind === 'plain') return content;
  return Buffer.from(normalizeGcov(content.toString('latin1')), 'latin1');
}

/** Caller excludes without a slash match a file or directory name at any depth. */
function excludeGlobsFor(globs: string[]): string[] {
  return globs.flatMap(glob => (glob.includes('/') ? [glob] : pruneGlobs(glob)));
}

/**
 * Walk `root` and list report candidates in a stable order.
 */
export function findReportCandidates(
  root: string,
  includeGlobs: string[] = [],
  excludeGlobs: string[] = [],
): ReportCandidate[] {
  const useDefaults = includeGlobs.length === 0;
  const source = useDefaults ? REPORT_NAME_PATTERNS.map(p => `**/${p}`) : includeGlobs;
  const ignore = [
    ...PRUNED_DIRECTORIES.flatMap(pruneGlobs),
    ...excludeGlobsFor(excludeGlobs),
    ...(useDefaults ? EXCLUDED_NAME_PATTERNS.map(p => `**/${p}`) : []),
  ];

  const entries = fg.sync(source, {
    cwd: root,
    ignore,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    suppressErrors: true,
    unique: true,
    stats: true,
  });

  return entries
    .map(entry => ({
      path: entry.path,
      byteLength: entry.stats?.size ?? 0,
      formatKind: classifyReport(entry.path),
    }))
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

/**
 * Find coverage reports under `root` and normalize each into a block ready
 * for the upload payload. Piped input, when present, replaces discovery.
 */
export function discover(options: DiscoveryOptions): DiscoveryResult {
  const warnings: string[] = [];

  if (options.stdin && options.stdin.length > 0) {
    return {
      blocks: [{ path: '', content: terminateBlock(options.stdin) }],
      filesFound: 1,
      warnings,
    };
  }

  const candidates = findReportCandidates(options.root, options.includeGlobs, options.excludeGlobs);
  const blocks: NormalizedBlock[] = [];

  for (const candidate of candidates) {
    if (candidate.byteLength === 0) {
      warnings.push(`Skipping empty report: ${candidate.path}`);
      continue;
    }

    let content: Buffer;
    try {
      // Absolute include globs come back as absolute paths
      content = fs.readFileSync(path.resolve(options.root, candidate.path));
    } catch (err) {
      warnings.push(`Could not read ${candidate.path}: ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }

    blocks.push({
      path: candidate.path,
      content: Buffer.concat([
        Buffer.from(`# path=${candidate.path}\n`),
        terminateBlock(normalizeReport(content, candidate.formatKind)),
      ]),
    });
  }

  return { blocks, filesFound: blocks.length, warnings };
}
