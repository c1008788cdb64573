import type { Batch, TrackPoint } from "@/snap/types";

function assertBatchSize(maxBatchSize: number): void {
  if (!Number.isInteger(maxBatchSize) || maxBatchSize < 2) {
    throw new RangeError(`maxBatchSize must be an integer >= 2 (got ${maxBatchSize})`);
  }
}

/**
 * Splits a track into consecutive batches of at most `maxBatchSize` points.
 * Each batch starts on the last point of the previous one, so the stitched
 * result can drop that shared point and stay continuous.
 */
export function* batchTrack(points: readonly TrackPoint[], maxBatchSize: number): Generator<Batch> {
  assertBatchSize(maxBatchSize);
  if (points.length === 0) return;

  let start = 0;
  let index = 0;
  while (true) {
    const end = Math.min(start + maxBatchSize, points.length);
    yield { index, start, points: points.slice(start, end) };
    if (end >= points.length) return;
    start = end - 1;
    index += 1;
  }
}

export function countBatches(pointCount: number, maxBatchSize: number): number {
  assertBatchSize(maxBatchSize);
  if (pointCount === 0) return 0;
  if (pointCount <= maxBatchSize) return 1;
  return Math.ceil((pointCount - 1) / (maxBatchSize - 1));
}
