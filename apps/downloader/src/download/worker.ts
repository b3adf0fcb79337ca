/**
 * Worker loop
 *
 * Walks one contiguous range of the sequence, one segment at a time, in
 * ascending order. Any failure it cannot retry away trips the shared
 * cancellation signal, which every other worker checks before its next
 * segment.
 */

import type { FileHandle } from "fs/promises";
import {
  CallbackError,
  isRetryable,
  type RetryPolicy,
  type Segment,
  type SegmentSequence,
  type WorkerRange,
} from "@tsgrab/streaming";
import type { HttpClient } from "../io/http";
import { segmentFilePath, type SegmentStorage } from "../io/storage";
import type { Logger } from "../utils/logger";
import { delay, type CancellationSignal } from "./cancellation";
import { fetchSegment } from "./fetcher";
import type { CryptoContext } from "./key-resolver";
import type { Mutex } from "./lock";
import type { ProgressCounter } from "./progress";

/**
 * Called after each segment is written. `current` is the completed count
 * including this segment. Throwing aborts the whole download.
 */
export type SegmentCallback = (
  segment: Segment,
  current: number,
  total: number,
  file: FileHandle
) => void | Promise<void>;

/** State shared by every worker of one download */
export interface WorkerContext {
  sequence: SegmentSequence;
  crypto: CryptoContext;
  outputDir: string;
  http: HttpClient;
  storage: SegmentStorage;
  retry: RetryPolicy;
  progress: ProgressCounter;
  cancellation: CancellationSignal;
  /** Caller's token; stops workers like the internal signal but is reported separately */
  externalSignal?: AbortSignal;
  /** Aborts on either signal; threaded into requests and backoff sleeps */
  requestSignal: AbortSignal;
  onSegmentDownload?: SegmentCallback;
  /** Present when callbacks must not interleave */
  callbackLock?: Mutex;
  logger: Logger;
}

export type WorkerOutcome = "completed" | "cancelled" | "failed";

function isStopped(ctx: WorkerContext): boolean {
  return ctx.cancellation.isSet || ctx.externalSignal?.aborted === true;
}

async function fetchWithRetry(
  segment: Segment,
  ctx: WorkerContext,
  log: Logger
): Promise<FileHandle> {
  const destination = segmentFilePath(ctx.outputDir, segment.index);
  const { attempts, backoffMs } = ctx.retry;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (attempt > 1) {
      await delay(backoffMs * (attempt - 1), ctx.requestSignal);
      if (isStopped(ctx)) {
        throw lastError;
      }
    }

    try {
      return await fetchSegment(segment, ctx.crypto, destination, {
        http: ctx.http,
        storage: ctx.storage,
        signal: ctx.requestSignal,
      });
    } catch (error) {
      lastError = error;
      if (!isRetryable(error) || isStopped(ctx)) {
        throw error;
      }
      log.warn(
        {
          segmentIndex: segment.index,
          attempt,
          retriesLeft: attempts - attempt,
          err: error,
        },
        "Segment attempt failed"
      );
    }
  }

  throw lastError;
}

async function closeFile(file: FileHandle, segment: Segment, log: Logger): Promise<void> {
  try {
    await file.close();
  } catch (error) {
    log.warn({ segmentIndex: segment.index, err: error }, "Failed to close segment file");
  }
}

async function processSegment(
  segment: Segment,
  ctx: WorkerContext,
  log: Logger
): Promise<WorkerOutcome | undefined> {
  let file: FileHandle;
  try {
    file = await fetchWithRetry(segment, ctx, log);
  } catch (error) {
    if (isStopped(ctx)) {
      return "cancelled";
    }
    if (ctx.cancellation.trip(error)) {
      log.error({ segmentIndex: segment.index, err: error }, "Segment failed, stopping download");
    }
    return "failed";
  }

  const total = ctx.sequence.length;
  const callback = ctx.onSegmentDownload;
  const report = async () => {
    const current = ctx.progress.increment();
    log.debug(
      {
        segmentIndex: segment.index,
        current,
        total,
        percent: Number(((current / total) * 100).toFixed(2)),
        uri: segment.uri,
      },
      "Downloaded and decrypted segment"
    );
    if (callback) {
      await callback(segment, current, total, file);
    }
  };

  try {
    await (ctx.callbackLock ? ctx.callbackLock.runExclusive(report) : report());
  } catch (error) {
    const failure = new CallbackError(segment.index, error);
    if (ctx.cancellation.trip(failure)) {
      log.error({ segmentIndex: segment.index, err: error }, "Segment callback failed, stopping download");
    }
    return "failed";
  } finally {
    await closeFile(file, segment, log);
  }

  return undefined;
}

/**
 * Process `range` of `ctx.sequence`. Never rejects: failures trip the
 * shared signal and come back as `"failed"`.
 */
export async function runWorker(
  id: number,
  range: WorkerRange,
  ctx: WorkerContext
): Promise<WorkerOutcome> {
  const log = ctx.logger.child({ worker: id });

  try {
    for (let position = range.start; position < range.end; position++) {
      if (isStopped(ctx)) {
        log.debug({ position }, "Worker stopped by cancellation");
        return "cancelled";
      }

      const outcome = await processSegment(ctx.sequence[position], ctx, log);
      if (outcome) {
        return outcome;
      }
    }
  } catch (error) {
    ctx.cancellation.trip(error);
    log.error({ err: error }, "Worker crashed");
    return "failed";
  }

  return "completed";
}
