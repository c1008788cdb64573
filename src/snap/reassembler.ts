import type { Batch, CorrectedTrack, SegmentReport, SnapResult, TrackPoint } from "@/snap/types";

/**
 * Stitches per-batch results back into one track. The first point of every
 * batch after the first is the previous batch's last point and is dropped.
 * Failed batches fall back to their recorded points and count as degraded.
 */
export function reassemble(batches: readonly Batch[], results: readonly SnapResult[], name?: string): CorrectedTrack {
  if (batches.length !== results.length) {
    throw new Error(`RESULT_ORDER_MISMATCH: ${batches.length} batches, ${results.length} results`);
  }

  const points: TrackPoint[] = [];
  const segments: SegmentReport[] = [];
  let degradedCount = 0;
  let partialCount = 0;

  batches.forEach((batch, position) => {
    const result = results[position];
    if (result.batchIndex !== batch.index) {
      throw new Error(`RESULT_ORDER_MISMATCH: batch ${batch.index} paired with result ${result.batchIndex}`);
    }

    const segmentPoints = result.status === "failure" ? batch.points : result.points;
    points.push(...(position === 0 ? segmentPoints : segmentPoints.slice(1)));

    const report: SegmentReport = {
      batchIndex: batch.index,
      start: batch.start,
      end: batch.start + batch.points.length - 1,
      status: result.status,
      attempts: result.attempts
    };
    if (result.status === "failure") {
      report.error = result.error;
      degradedCount += 1;
    } else if (result.status === "partial") {
      partialCount += 1;
    }
    segments.push(report);
  });

  const corrected: CorrectedTrack = { points, segments, degradedCount, partialCount };
  if (name) corrected.name = name;
  return corrected;
}
