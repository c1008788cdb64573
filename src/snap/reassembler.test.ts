import { describe, expect, it } from "vitest";

import { batchTrack } from "@/snap/batcher";
import { reassemble } from "@/snap/reassembler";
import { linePoints } from "@/snap/testing/fakeMapMatchApi";
import type { Batch, SnapResult } from "@/snap/types";

type MatchedResult = Extract<SnapResult, { status: "success" | "partial" }>;

function echo(batch: Batch): MatchedResult {
  return {
    batchIndex: batch.index,
    status: "success",
    points: batch.points.map((point) => ({ ...point })),
    matchedCount: batch.points.length,
    attempts: 1
  };
}

function failed(batch: Batch, error = "MAPMATCH_HTTP_503 (after 3 attempts)"): SnapResult {
  return { batchIndex: batch.index, status: "failure", error, attempts: 3 };
}

describe("reassemble", () => {
  const points = linePoints(5);
  const batches = [...batchTrack(points, 3)];

  it("rebuilds the track when every batch echoes its input", () => {
    const corrected = reassemble(batches, batches.map(echo));

    expect(corrected.points).toEqual(points);
    expect(corrected.degradedCount).toBe(0);
    expect(corrected.partialCount).toBe(0);
    expect(corrected.segments).toEqual([
      { batchIndex: 0, start: 0, end: 2, status: "success", attempts: 1 },
      { batchIndex: 1, start: 2, end: 4, status: "success", attempts: 1 }
    ]);
  });

  it("keeps the recorded points of a failed batch and reports it as degraded", () => {
    const snappedFirst: SnapResult = {
      batchIndex: 0,
      status: "success",
      points: [
        { lat: 0.5, lng: 0 },
        { lat: 0.5, lng: 1 },
        { lat: 0.5, lng: 2 }
      ],
      matchedCount: 3,
      attempts: 1
    };
    const corrected = reassemble(batches, [snappedFirst, failed(batches[1])]);

    expect(corrected.points).toEqual([
      { lat: 0.5, lng: 0 },
      { lat: 0.5, lng: 1 },
      { lat: 0.5, lng: 2 },
      { lat: 0, lng: 3 },
      { lat: 0, lng: 4 }
    ]);
    expect(corrected.degradedCount).toBe(1);
    expect(corrected.segments[1]).toEqual({
      batchIndex: 1,
      start: 2,
      end: 4,
      status: "failure",
      attempts: 3,
      error: "MAPMATCH_HTTP_503 (after 3 attempts)"
    });
  });

  it("keeps the original length when every batch fails", () => {
    const corrected = reassemble(batches, batches.map((batch) => failed(batch)));
    expect(corrected.points).toEqual(points);
    expect(corrected.degradedCount).toBe(2);
  });

  it("drops one boundary point per extra batch", () => {
    const long = linePoints(11);
    const parts = [...batchTrack(long, 4)];
    const total = parts.reduce((sum, batch) => sum + batch.points.length, 0);
    const corrected = reassemble(parts, parts.map(echo));

    expect(parts).toHaveLength(4);
    expect(corrected.points).toHaveLength(total - (parts.length - 1));
    expect(corrected.points).toHaveLength(long.length);
  });

  it("counts partially matched batches separately", () => {
    const partial: SnapResult = { ...echo(batches[0]), status: "partial", matchedCount: 2 };
    const corrected = reassemble(batches, [partial, echo(batches[1])]);

    expect(corrected.partialCount).toBe(1);
    expect(corrected.degradedCount).toBe(0);
  });

  it("carries the track name", () => {
    expect(reassemble(batches, batches.map(echo), "Morning ride").name).toBe("Morning ride");
  });

  it("refuses results that do not pair with the batches", () => {
    expect(() => reassemble(batches, [echo(batches[0])])).toThrow("RESULT_ORDER_MISMATCH");
    expect(() => reassemble(batches, [echo(batches[1]), echo(batches[0])])).toThrow("RESULT_ORDER_MISMATCH");
  });
});
