import {
  UnsupportedFormatError,
  type SegmentSequence,
  type WorkerRange,
} from "@tsgrab/streaming";

/**
 * Output files are named after `index`, so each segment's index must equal
 * its position or two workers end up writing the same file.
 */
export function assertSequentialIndices(sequence: SegmentSequence): void {
  sequence.forEach((segment, position) => {
    if (segment.index !== position) {
      throw new UnsupportedFormatError(
        `Segment at position ${position} has index ${segment.index}`,
        { position, segmentIndex: segment.index }
      );
    }
  });
}

/**
 * Split `total` segments into contiguous ranges of `ceil(total / workers)`.
 * The last range may be shorter; fewer ranges than workers come back when
 * there are not enough segments to go around.
 */
export function partitionSegments(total: number, workers: number): WorkerRange[] {
  if (total <= 0) {
    return [];
  }

  const chunkSize = Math.ceil(total / workers);
  const ranges: WorkerRange[] = [];

  for (let start = 0; start < total; start += chunkSize) {
    ranges.push({ start, end: Math.min(start + chunkSize, total) });
  }

  return ranges;
}
