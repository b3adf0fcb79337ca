/**
 * Download orchestrator
 *
 * Resolves the stream key once, splits the sequence into one contiguous
 * range per worker, runs the workers concurrently and reports a single
 * outcome once all of them have returned.
 */

import { z } from "zod";
import {
  CancellationError,
  ConfigurationError,
  StreamingError,
  type RetryPolicy,
  type SegmentSequence,
} from "@tsgrab/streaming";
import { FetchHttpClient, type HttpClient } from "../io/http";
import { LocalSegmentStorage, prepareOutputDir, type SegmentStorage } from "../io/storage";
import { env } from "../utils/env";
import { logger as defaultLogger, type Logger } from "../utils/logger";
import { CancellationSignal, linkSignals } from "./cancellation";
import { assertSingleKey, resolveCryptoContext, type CryptoContext } from "./key-resolver";
import { Mutex } from "./lock";
import { assertSequentialIndices, partitionSegments } from "./partition";
import { ProgressCounter } from "./progress";
import { runWorker, type SegmentCallback, type WorkerContext } from "./worker";

export interface DownloadOptions {
  /** Directory receiving `<index>.ts` files; created when missing */
  outputDir: string;
  workerCount?: number;
  /** Run `onSegmentDownload` under a lock shared by all workers */
  serializeCallbacks?: boolean;
  onSegmentDownload?: SegmentCallback;
  /** Caller's cancellation token */
  signal?: AbortSignal;
  retry?: Partial<RetryPolicy>;
  http?: HttpClient;
  storage?: SegmentStorage;
  logger?: Logger;
}

const downloadConfigSchema = z.object({
  outputDir: z.string().min(1),
  workerCount: z.number().int().min(1).default(env.TSGRAB_WORKERS),
  serializeCallbacks: z.boolean().default(false),
  retry: z
    .object({
      attempts: z.number().int().min(1).default(env.TSGRAB_RETRY_ATTEMPTS),
      backoffMs: z.number().int().min(0).default(env.TSGRAB_RETRY_BACKOFF_MS),
    })
    .default({}),
});

export type DownloadConfig = z.infer<typeof downloadConfigSchema>;

export function parseDownloadConfig(options: DownloadOptions): DownloadConfig {
  const result = downloadConfigSchema.safeParse({
    outputDir: options.outputDir,
    workerCount: options.workerCount,
    serializeCallbacks: options.serializeCallbacks,
    retry: options.retry,
  });

  if (!result.success) {
    throw new ConfigurationError("Invalid download options", {
      issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }

  return result.data;
}

function toError(reason: unknown): Error {
  if (reason instanceof Error) {
    return reason;
  }
  return new StreamingError(`Download failed: ${String(reason)}`, "DOWNLOAD_FAILED");
}

/**
 * Download, decrypt and store every segment of `sequence`.
 *
 * Resolves once all segments are on disk. Rejects with the external
 * cancellation (as `CancellationError`) when the caller's signal fired,
 * otherwise with the first worker failure; later failures are dropped.
 */
export async function download(
  sequence: SegmentSequence,
  options: DownloadOptions
): Promise<void> {
  const config = parseDownloadConfig(options);
  const { signal } = options;
  const log = (options.logger ?? defaultLogger).child({ component: "downloader" });

  if (signal?.aborted) {
    throw new CancellationError(signal.reason);
  }
  if (sequence.length === 0) {
    log.info("Empty segment sequence, nothing to download");
    return;
  }

  assertSequentialIndices(sequence);
  assertSingleKey(sequence);
  const http = options.http ?? new FetchHttpClient();
  const storage = options.storage ?? new LocalSegmentStorage();
  await prepareOutputDir(config.outputDir);

  let cryptoContext: CryptoContext;
  try {
    cryptoContext = await resolveCryptoContext(sequence[0], http, { signal, logger: log });
  } catch (error) {
    if (signal?.aborted) {
      throw new CancellationError(signal.reason);
    }
    throw error;
  }

  const cancellation = new CancellationSignal();
  const linked = linkSignals([signal, cancellation.signal]);
  const progress = new ProgressCounter(sequence.length);
  const ranges = partitionSegments(sequence.length, config.workerCount);

  const ctx: WorkerContext = {
    sequence,
    crypto: cryptoContext,
    outputDir: config.outputDir,
    http,
    storage,
    retry: config.retry,
    progress,
    cancellation,
    externalSignal: signal,
    requestSignal: linked.signal,
    onSegmentDownload: options.onSegmentDownload,
    callbackLock: config.serializeCallbacks ? new Mutex() : undefined,
    logger: log,
  };

  log.info(
    {
      segments: sequence.length,
      workers: ranges.length,
      chunkSize: ranges[0].end - ranges[0].start,
      outputDir: config.outputDir,
    },
    "Starting segment download"
  );

  try {
    await Promise.all(ranges.map((range, id) => runWorker(id, range, ctx)));
  } finally {
    linked.dispose();
  }

  if (signal?.aborted) {
    log.warn({ completed: progress.value, total: progress.total }, "Download cancelled");
    throw new CancellationError(signal.reason);
  }
  if (cancellation.isSet) {
    log.error(
      { completed: progress.value, total: progress.total, err: cancellation.reason },
      "Download failed"
    );
    throw toError(cancellation.reason);
  }

  log.info({ segments: progress.value }, "Segment download complete");
}
