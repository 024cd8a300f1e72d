import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { gzipSync } from 'zlib';
import type { Env, NormalizedBlock } from '../types';

export const NETWORK_SEPARATOR = '<<<<<< network';
export const ENV_SEPARATOR = '<<<<<< ENV';

export interface AssembleOptions {
  /** Tracked repository files, listed so the server can map report paths */
  network?: string[];
  /** Names of environment variables to embed */
  envVars?: string[];
  env?: Env;
}

/**
 * Concatenate normalized blocks, in order, into the upload body.
 */
export function assemblePayload(blocks: NormalizedBlock[], options: AssembleOptions = {}): Buffer {
  const sections: Buffer[] = [];

  if (options.envVars && options.envVars.length > 0) {
    const env = options.env ?? {};
    const lines = options.envVars.map(name => `${name}=${env[name] ?? ''}`);
    sections.push(Buffer.from(`${lines.join('\n')}\n${ENV_SEPARATOR}\n`));
  }

  if (options.network && options.network.length > 0) {
    sections.push(Buffer.from(`${options.network.join('\n')}\n${NETWORK_SEPARATOR}\n`));
  }

  for (const block of blocks) {
    sections.push(block.content);
  }

  return Buffer.concat(sections);
}

export interface PayloadFile {
  /** Uncompressed payload on disk */
  path: string;
  /** Gzip-compressed payload on disk */
  compressedPath: string;
  compressed: Buffer;
}

/**
 * Write the payload and its gzip form to a private temp directory, hand them
 * to `fn`, and delete both whether `fn` resolves or throws.
 */
export async function withPayloadFile<T>(payload: Buffer, fn: (file: PayloadFile) => Promise<T>): Promise<T> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'covpush-'));
  try {
    const payloadPath = path.join(dir, 'payload.txt');
    const compressedPath = `${payloadPath}.gz`;

    fs.writeFileSync(payloadPath, payload, { flag: 'wx' });
    const compressed = gzipSync(fs.readFileSync(payloadPath));
    fs.writeFileSync(compressedPath, compressed, { flag: 'wx' });

    return await fn({ path: payloadPath, compressedPath, compressed });
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}
