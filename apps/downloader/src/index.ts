/**
 * @tsgrab/downloader
 *
 * Concurrent fetch, decrypt and store pipeline for AES-128 HLS segments.
 */

export * from "./download";
export {
  FetchHttpClient,
  type FetchHttpClientConfig,
  type HttpClient,
  type HttpGetOptions,
} from "./io/http";
export {
  LocalSegmentStorage,
  createTempOutputDir,
  listSegmentFiles,
  prepareOutputDir,
  removeOutputDir,
  segmentFilePath,
  type SegmentStorage,
} from "./io/storage";
export { loadEnv, type Env } from "./utils/env";
export { logger, type Logger } from "./utils/logger";
