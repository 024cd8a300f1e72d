/**
 * Public API for embedding the uploader in other tooling.
 */

export * from './types';
export { runUpload, describeOutcome } from './uploader';
export type { UploaderDeps } from './uploader';
export { readGitContext, emptyGitContext, parseRemotes } from './git/git-context';
export type { GitRunner } from './git/git-context';
export { CI_DETECTORS, matchingDetectors } from './ci/ci-detector';
export { resolve, detectFields, parseRemoteUrl, serializeRemotes } from './ci/environment-resolver';
export { discover, findReportCandidates, classifyReport, END_OF_FILE } from './discovery/report-discovery';
export { normalizeGcov, parseGcov, renderGcov, classifyGcovLine } from './discovery/gcov-parser';
export { assemblePayload, withPayloadFile, NETWORK_SEPARATOR, ENV_SEPARATOR } from './payload/payload-assembler';
export { buildQuery, percentEncode, PACKAGE_ID } from './upload/query-builder';
export { upload, fetchTransport, classifyResponse, DEFAULT_ENDPOINT, DEFAULT_MAX_ATTEMPTS } from './upload/upload-client';
export type { UploadRequest } from './upload/upload-client';
export { loadConfig, findConfigFile } from './config/config-loader';
