/**
 * Core types for encrypted segment streams
 */

/** Where the stream key lives, plus the IV when the manifest gives one */
export interface KeyReference {
  uri: string;
  iv?: Uint8Array;
}

/** One addressable, individually encrypted piece of the stream */
export interface Segment {
  readonly index: number;
  readonly uri: string;
  /** Usually only the first segment carries it; the rest inherit */
  readonly key?: KeyReference;
}

/** Ordered segments of one stream, as read from the manifest */
export type SegmentSequence = readonly Segment[];

/** Half-open range `[start, end)` of segment positions handled by one worker */
export interface WorkerRange {
  readonly start: number;
  readonly end: number;
}

/** Retry budget for a single segment */
export interface RetryPolicy {
  /** Total attempts, first try included */
  attempts: number;
  /** Retry k sleeps `backoffMs * k` */
  backoffMs: number;
}
