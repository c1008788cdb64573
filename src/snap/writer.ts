import { mkdir, rename, unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import type { Feature, FeatureCollection, LineString, Position } from "geojson";

import { WriteError } from "@/snap/errors";
import type { CorrectedTrack } from "@/snap/types";

export const OUTPUT_SUFFIX = "_snapped";
export const OUTPUT_EXTENSION = ".geojson";

export type SnappedTrackProperties = {
  name?: string;
  coordTimes?: string[];
  coordinateProperties?: { accuracy: number[] };
  snap: {
    batches: number;
    degradedSegments: number[];
    partialSegments: number[];
  };
};

export function outputPathFor(inputPath: string, outputDir?: string): string {
  const parsed = path.parse(inputPath);
  return path.join(outputDir ?? parsed.dir, `${parsed.name}${OUTPUT_SUFFIX}${OUTPUT_EXTENSION}`);
}

export function toFeatureCollection(track: CorrectedTrack): FeatureCollection<LineString, SnappedTrackProperties> {
  const coordinates: Position[] = track.points.map((point) =>
    point.elevation !== undefined ? [point.lng, point.lat, point.elevation] : [point.lng, point.lat]
  );

  const properties: SnappedTrackProperties = {
    snap: {
      batches: track.segments.length,
      degradedSegments: track.segments.filter((segment) => segment.status === "failure").map((segment) => segment.batchIndex),
      partialSegments: track.segments.filter((segment) => segment.status === "partial").map((segment) => segment.batchIndex)
    }
  };
  if (track.name) properties.name = track.name;

  const times = track.points.map((point) => point.time);
  if (times.every((time): time is string => time !== undefined)) properties.coordTimes = times;

  const accuracies = track.points.map((point) => point.accuracy);
  if (accuracies.every((accuracy): accuracy is number => accuracy !== undefined)) {
    properties.coordinateProperties = { accuracy: accuracies };
  }

  const feature: Feature<LineString, SnappedTrackProperties> = {
    type: "Feature",
    properties,
    geometry: { type: "LineString", coordinates }
  };

  return { type: "FeatureCollection", features: [feature] };
}

export function serializeTrack(track: CorrectedTrack): string {
  return `${JSON.stringify(toFeatureCollection(track), null, 2)}\n`;
}

/**
 * Writes through a temporary sibling file and renames it into place, so the
 * target either keeps its previous content or holds the complete new track.
 */
export async function writeTrack(track: CorrectedTrack, targetPath: string): Promise<string> {
  const tempPath = `${targetPath}.${process.pid}.tmp`;
  try {
    await mkdir(path.dirname(targetPath), { recursive: true });
    await writeFile(tempPath, serializeTrack(track), "utf-8");
    await rename(tempPath, targetPath);
  } catch (error) {
    await unlink(tempPath).catch(() => undefined);
    throw new WriteError(targetPath, track, error);
  }
  return targetPath;
}
