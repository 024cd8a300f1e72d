import type { BuildMetadata, Transport, TransportResponse, UploadOutcome } from '../types';
import { buildQuery } from './query-builder';

export const DEFAULT_ENDPOINT = 'https://ingest.covpush.dev';
export const DEFAULT_MAX_ATTEMPTS = 4;
export const BACKOFF_STEP_SECONDS = 10;

export const UPLOAD_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'text/plain',
  'Content-Encoding': 'gzip',
  'X-Content-Encoding': 'gzip',
  Accept: 'text/plain',
};

export interface UploadRequest {
  metadata: BuildMetadata;
  payload: Buffer;
  endpoint: string;
  token: string;
  maxAttempts?: number;
  transport?: Transport;
  sleep?: (seconds: number) => Promise<void>;
}

const defaultSleep = (seconds: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, seconds * 1000));

/**
 * POST once and report url, status and timing. A connection failure is
 * reported as status 0 rather than thrown; a body that fails mid-read keeps
 * the status the server sent.
 */
export const fetchTransport: Transport = async ({ url, body, headers }) => {
  const started = performance.now();
  const elapsed = () => (performance.now() - started) / 1000;
  const failure = (status: number, err: unknown): TransportResponse => ({
    reportUrl: '',
    status,
    elapsedSeconds: elapsed(),
    body: err instanceof Error ? err.message : String(err),
  });

  let response: Response;
  try {
    response = await fetch(url, { method: 'POST', headers, body });
  } catch (err) {
    return failure(0, err);
  }

  let text: string;
  try {
    text = await response.text();
  } catch (err) {
    return failure(response.status, err);
  }

  return {
    reportUrl: text.split('\n').map(l => l.trim()).find(Boolean) ?? '',
    status: response.status,
    elapsedSeconds: elapsed(),
    body: text,
  };
};

/**
 * Map one response onto the outcome it implies for the retry loop.
 */
export function classifyResponse(response: TransportResponse, attempts: number): UploadOutcome {
  if (response.status === 201) {
    if (!response.reportUrl) {
      return { kind: 'terminal-failure', httpStatus: 201, body: response.body, attempts, reason: 'malformed' };
    }
    return { kind: 'success', reportUrl: response.reportUrl, elapsedSeconds: response.elapsedSeconds, attempts };
  }
  if (response.status >= 500 && response.status <= 599) {
    return { kind: 'retryable-failure', httpStatus: response.status, attempts };
  }
  return { kind: 'terminal-failure', httpStatus: response.status, body: response.body, attempts, reason: 'rejected' };
}

export function uploadUrl(endpoint: string, query: string): string {
  return `${endpoint.trim().replace(/\/+$/, '')}/coverage?${query}`;
}

/**
 * Upload the compressed payload, retrying 5xx responses with a linear
 * backoff of 10, 20, 30… seconds. Every other failure is final.
 */
export async function upload(request: UploadRequest): Promise<UploadOutcome> {
  const {
    metadata,
    payload,
    endpoint,
    token,
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    transport = fetchTransport,
    sleep = defaultSleep,
  } = request;

  const url = uploadUrl(endpoint, buildQuery(metadata, token));
  let lastStatus = 0;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const response = await transport({ url, body: payload, headers: { ...UPLOAD_HEADERS } });
    const outcome = classifyResponse(response, attempt);

    if (outcome.kind !== 'retryable-failure') return outcome;

    lastStatus = outcome.httpStatus;
    if (attempt < maxAttempts) {
      const delay = BACKOFF_STEP_SECONDS * attempt;
      console.warn(`[covpush] Upload failed with HTTP ${outcome.httpStatus}, retrying in ${delay}s`);
      await sleep(delay);
    }
  }

  return {
    kind: 'terminal-failure',
    httpStatus: lastStatus,
    body: `could not upload after ${maxAttempts} tries`,
    attempts: maxAttempts,
    reason: 'exhausted',
  };
}
