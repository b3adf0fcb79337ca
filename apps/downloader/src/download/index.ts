/**
 * Segment download pipeline
 */

export { download, parseDownloadConfig, type DownloadOptions, type DownloadConfig } from "./orchestrator";
export { runWorker, type SegmentCallback, type WorkerContext, type WorkerOutcome } from "./worker";
export { fetchSegment, type FetchSegmentDeps } from "./fetcher";
export { assertSingleKey, resolveCryptoContext, type CryptoContext } from "./key-resolver";
export { assertSequentialIndices, partitionSegments } from "./partition";
export { CancellationSignal, delay, linkSignals } from "./cancellation";
export { ProgressCounter } from "./progress";
export { Mutex } from "./lock";
