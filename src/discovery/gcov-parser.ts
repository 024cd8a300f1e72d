import type { GcovLine } from '../types';

/**
 * Classify one body line of gcov output.
 *
 * Body lines look like `    count:  line:source`. Only the first two
 * colon fields matter; the source text may itself contain colons.
 */
export function classifyGcovLine(raw: string): GcovLine {
  const text = raw.trim();

  if (!text) return { kind: 'skip', reason: 'blank' };
  if (text.startsWith('function')) return { kind: 'function' };
  if (text.startsWith('-')) return { kind: 'skip', reason: 'non-executable' };
  if (text.endsWith('}')) return { kind: 'skip', reason: 'block-close' };

  const fields = text.split(':');
  if (fields.length < 2) return { kind: 'skip', reason: 'malformed' };

  const count = fields[0].trim();
  const line = fields[1].trim();
  if (!count || !line) return { kind: 'skip', reason: 'malformed' };

  return { kind: 'count', count, line };
}

/**
 * Parse a whole .gcov file. The first line is the source path header and is
 * kept verbatim.
 */
export function parseGcov(content: string): GcovLine[] {
  const lines = content.split(/\r?\n/);
  const [header, ...body] = lines;

  return [
    { kind: 'header', text: header },
    ...body.map(classifyGcovLine),
  ];
}

/**
 * Render parsed lines in the condensed form: header, `count:line:` per
 * executable line, and `func` for function summaries.
 */
export function renderGcov(lines: GcovLine[]): string {
  const out: string[] = [];

  for (const line of lines) {
    switch (line.kind) {
      case 'header':
        out.push(line.text);
        break;
      case 'count':
        out.push(`${line.count}:${line.line}:`);
        break;
      case 'function':
        out.push('func');
        break;
      case 'skip':
        break;
    }
  }

  return out.join('\n') + '\n';
}

export function normalizeGcov(content: string): string {
  return renderGcov(parseGcov(content));
}
