import { describe, expect, it } from "vitest";

import { batchTrack, countBatches } from "@/snap/batcher";
import { linePoints } from "@/snap/testing/fakeMapMatchApi";
import type { TrackPoint } from "@/snap/types";

function stitch(batches: { points: TrackPoint[] }[]): TrackPoint[] {
  return batches.flatMap((batch, index) => (index === 0 ? batch.points : batch.points.slice(1)));
}

describe("batchTrack", () => {
  it("splits five points with M=3 into two batches sharing the middle point", () => {
    const batches = [...batchTrack(linePoints(5), 3)];

    expect(batches).toEqual([
      { index: 0, start: 0, points: [{ lat: 0, lng: 0 }, { lat: 0, lng: 1 }, { lat: 0, lng: 2 }] },
      { index: 1, start: 2, points: [{ lat: 0, lng: 2 }, { lat: 0, lng: 3 }, { lat: 0, lng: 4 }] }
    ]);
  });

  it("yields exactly one batch when the track fits", () => {
    const points = linePoints(4);
    expect([...batchTrack(points, 4)]).toEqual([{ index: 0, start: 0, points }]);
    expect([...batchTrack(points, 1000)]).toHaveLength(1);
  });

  it("reconstructs the original sequence once boundary duplicates are dropped", () => {
    for (let size = 2; size <= 12; size += 1) {
      for (let max = 2; max <= 5; max += 1) {
        const points = linePoints(size);
        const batches = [...batchTrack(points, max)];

        expect(stitch(batches)).toEqual(points);
        expect(batches.every((batch) => batch.points.length <= max)).toBe(true);
        expect(batches).toHaveLength(countBatches(size, max));
      }
    }
  });

  it("keeps the last batch at two points or more", () => {
    const batches = [...batchTrack(linePoints(6), 3)];
    expect(batches.map((batch) => batch.points.length)).toEqual([3, 3, 2]);
    expect(batches.map((batch) => batch.start)).toEqual([0, 2, 4]);
  });

  it("is deterministic", () => {
    const points = linePoints(9);
    expect([...batchTrack(points, 4)]).toEqual([...batchTrack(points, 4)]);
  });

  it("produces batches lazily", () => {
    const iterator = batchTrack(linePoints(7), 3);
    expect(iterator.next().value).toEqual({ index: 0, start: 0, points: linePoints(3) });
  });

  it("rejects batch sizes that cannot overlap", () => {
    expect(() => [...batchTrack(linePoints(3), 1)]).toThrow(RangeError);
    expect(() => countBatches(3, 1.5)).toThrow(RangeError);
  });
});

describe("countBatches", () => {
  it("matches the one-point-overlap partition", () => {
    expect(countBatches(0, 3)).toBe(0);
    expect(countBatches(3, 3)).toBe(1);
    expect(countBatches(5, 3)).toBe(2);
    expect(countBatches(6, 3)).toBe(3);
    expect(countBatches(2001, 1000)).toBe(3);
  });
});
