import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { z } from 'zod';
import type { ConfigValues } from '../types';

export const CONFIG_FILE_NAMES = ['covpush.yml', '.covpush.yml', path.join('.github', 'covpush.yml')];

const configSchema = z.object({
  covpush: z.object({
    token: z.string().optional(),
    slug: z.string().optional(),
    labels: z.union([z.string(), z.array(z.string())]).optional(),
  }).passthrough().optional(),
}).passthrough();

export interface LoadedConfig {
  values: ConfigValues;
  path?: string;
  warnings: string[];
}

export function findConfigFile(root: string): string | undefined {
  return CONFIG_FILE_NAMES
    .map(name => path.join(root, name))
    .find(candidate => fs.existsSync(candidate));
}

function splitLabels(labels: string | string[]): string[] {
  const list = Array.isArray(labels) ? labels : labels.split(',');
  return list.map(l => l.trim()).filter(Boolean);
}

/**
 * Read `covpush.token`, `covpush.slug` and `covpush.labels` from a YAML file.
 * A missing file is not an error; a malformed one is reported and ignored.
 */
export function loadConfig(root: string, explicitPath?: string): LoadedConfig {
  const configPath = explicitPath ? path.resolve(root, explicitPath) : findConfigFile(root);
  if (!configPath) return { values: {}, warnings: [] };

  if (!fs.existsSync(configPath)) {
    return { values: {}, path: configPath, warnings: [`Config file not found: ${configPath}`] };
  }

  let raw: unknown;
  try {
    raw = parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { values: {}, path: configPath, warnings: [`Could not parse ${configPath}: ${message}`] };
  }

  // An empty document parses to null
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    return {
      values: {},
      path: configPath,
      warnings: [`Invalid config in ${configPath}: ${issue.path.join('.')} ${issue.message}`],
    };
  }

  const section = result.data.covpush ?? {};
  const values: ConfigValues = {};
  if (section.token?.trim()) values.token = section.token.trim();
  if (section.slug?.trim()) values.slug = section.slug.trim();
  if (section.labels !== undefined) {
    const labels = splitLabels(section.labels);
    if (labels.length > 0) values.labels = labels;
  }

  return { values, path: configPath, warnings: [] };
}
