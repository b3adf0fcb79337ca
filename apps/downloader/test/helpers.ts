/**
 * Test Helpers
 *
 * In-process stand-ins for the key server, the segment CDN and storage.
 */

import type { FileHandle } from "fs/promises";
import pino from "pino";
import {
  IOError,
  NetworkError,
  encryptSegment,
  type Segment,
} from "@tsgrab/streaming";
import type { HttpClient, HttpGetOptions } from "../src/io/http";
import type { SegmentStorage } from "../src/io/storage";
import { delay } from "../src/download/cancellation";

// ============================================
// Constants
// ============================================

export const KEY_URI = "https://keys.test/stream.key";
export const TEST_KEY = Buffer.from("0123456789abcdef");
export const TEST_IV = Buffer.from("fedcba9876543210");

export const silentLogger = pino({ level: "silent" });

export const segmentUri = (index: number): string =>
  `https://cdn.test/seg-${index}.ts`;

export const plaintextFor = (index: number): Buffer =>
  Buffer.from(`segment ${index} payload`);

// ============================================
// Fixtures
// ============================================

/**
 * Build `count` segments; only the first carries the key reference
 */
export function createSequence(
  count: number,
  options: { iv?: Uint8Array } = {}
): Segment[] {
  return Array.from({ length: count }, (_, index) => ({
    index,
    uri: segmentUri(index),
    key: index === 0 ? { uri: KEY_URI, iv: options.iv } : undefined,
  }));
}

/**
 * Fake CDN serving the key and every segment of `createSequence(count)`
 */
export function createStreamServer(
  count: number,
  options: { iv?: Uint8Array; latencyMs?: number } = {}
): FakeHttpClient {
  const iv = options.iv && options.iv.length > 0 ? options.iv : TEST_KEY;
  const responses = new Map<string, Buffer>([[KEY_URI, TEST_KEY]]);
  for (let index = 0; index < count; index++) {
    responses.set(segmentUri(index), encryptSegment(plaintextFor(index), TEST_KEY, iv));
  }
  return new FakeHttpClient(responses, options.latencyMs ?? 0);
}

// ============================================
// Fakes
// ============================================

export class FakeHttpClient implements HttpClient {
  readonly requests: string[] = [];
  /** `Date.now()` of each request, in request order */
  readonly requestTimes: number[] = [];
  private attempts = new Map<string, number>();
  private failures = new Map<string, number>();
  private corruptions = new Map<string, number>();
  private latencies = new Map<string, number>();

  constructor(
    private responses: Map<string, Buffer>,
    private latencyMs = 0
  ) {}

  /** Answer 503 to the first `times` requests for `url` */
  failTimes(url: string, times: number): this {
    this.failures.set(url, times);
    return this;
  }

  /** Serve a body that is not block aligned for the first `times` requests */
  corruptTimes(url: string, times: number): this {
    this.corruptions.set(url, times);
    return this;
  }

  withLatency(url: string, ms: number): this {
    this.latencies.set(url, ms);
    return this;
  }

  attemptsFor(url: string): number {
    return this.attempts.get(url) ?? 0;
  }

  async get(url: string, options: HttpGetOptions = {}): Promise<Buffer> {
    this.requests.push(url);
    this.requestTimes.push(Date.now());
    const attempt = this.attemptsFor(url) + 1;
    this.attempts.set(url, attempt);

    if (attempt <= (this.failures.get(url) ?? 0)) {
      throw new NetworkError(url, "HTTP 503 Service Unavailable", { status: 503 });
    }

    const latency = this.latencies.get(url) ?? this.latencyMs;
    if (latency > 0) {
      await delay(latency, options.signal);
    }
    if (options.signal?.aborted) {
      throw new NetworkError(url, "aborted");
    }

    if (attempt <= (this.corruptions.get(url) ?? 0)) {
      return Buffer.alloc(20);
    }

    const body = this.responses.get(url);
    if (!body) {
      throw new NetworkError(url, "HTTP 404 Not Found", { status: 404 });
    }
    return body;
  }
}

/** Storage whose every write fails */
export class FailingStorage implements SegmentStorage {
  writes = 0;

  async write(path: string): Promise<FileHandle> {
    this.writes += 1;
    throw new IOError(path, new Error("disk full"));
  }
}
