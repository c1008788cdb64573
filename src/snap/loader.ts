import { readFile } from "node:fs/promises";
import { z } from "zod";

import { EmptyTrackError, FormatError, InvalidCoordinateError } from "@/snap/errors";
import type { Track, TrackPoint } from "@/snap/types";

const positionSchema = z.array(z.number()).min(2);

const lineStringSchema = z.object({
  type: z.literal("LineString"),
  coordinates: z.array(positionSchema)
});

const pointSchema = z.object({
  type: z.literal("Point"),
  coordinates: positionSchema
});

const emptyPointSchema = z.object({
  type: z.literal("Point"),
  coordinates: z.array(z.unknown()).max(1)
});

const propertiesSchema = z.record(z.unknown()).nullish();

const featureSchema = z.object({
  type: z.literal("Feature"),
  geometry: z.unknown(),
  properties: propertiesSchema
});

const featureCollectionSchema = z.object({
  type: z.literal("FeatureCollection"),
  features: z.array(featureSchema)
});

const coordinatePropertiesSchema = z
  .object({
    times: z.array(z.unknown()).optional(),
    accuracy: z.array(z.unknown()).optional()
  })
  .passthrough();

type Properties = z.infer<typeof propertiesSchema>;
type Position = z.infer<typeof positionSchema>;

function toIsoTime(value: unknown): string | undefined {
  if (typeof value === "string") return value.trim() || undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) return undefined;
  // Numeric timestamps are Unix seconds.
  const date = new Date(value * 1000);
  return Number.isFinite(date.getTime()) ? date.toISOString() : undefined;
}

function toOptionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function readType(value: unknown): unknown {
  return value && typeof value === "object" && "type" in value ? value.type : undefined;
}

function hasNoCoordinates(geometry: unknown): boolean {
  return geometry === null || geometry === undefined || emptyPointSchema.safeParse(geometry).success;
}

function readName(properties: Properties): string | undefined {
  const name = properties?.name;
  return typeof name === "string" && name.trim() ? name.trim() : undefined;
}

function readArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function toTrackPoint(position: Position, time?: string, accuracy?: number): TrackPoint {
  const point: TrackPoint = { lng: position[0], lat: position[1] };
  if (time !== undefined) point.time = time;
  if (accuracy !== undefined) point.accuracy = accuracy;
  if (position.length > 2 && Number.isFinite(position[2])) point.elevation = position[2];
  return point;
}

function lineToPoints(coordinates: Position[], properties: Properties): TrackPoint[] {
  const perCoordinate = coordinatePropertiesSchema.safeParse(properties?.coordinateProperties);
  const coordinateProps = perCoordinate.success ? perCoordinate.data : undefined;
  const times = properties?.coordTimes !== undefined ? readArray(properties.coordTimes) : readArray(coordinateProps?.times);
  const accuracies = readArray(coordinateProps?.accuracy);

  return coordinates.map((position, index) =>
    toTrackPoint(position, toIsoTime(times[index]), toOptionalNumber(accuracies[index]))
  );
}

function parseLineGeometry(geometry: unknown, where: string): Position[] {
  const parsed = lineStringSchema.safeParse(geometry);
  if (!parsed.success) {
    const type = readType(geometry);
    throw new FormatError(`${where} must be a LineString with numeric positions (got ${String(type ?? "nothing")}).`);
  }
  return parsed.data.coordinates;
}

function pointsFromCollection(collection: z.infer<typeof featureCollectionSchema>): { name?: string; points: TrackPoint[] } {
  const { features } = collection;
  if (features.length === 0) return { points: [] };

  const points: TrackPoint[] = [];
  let onlyPoints = true;
  for (const feature of features) {
    // Features without usable coordinates are skipped.
    if (hasNoCoordinates(feature.geometry)) continue;
    const parsed = pointSchema.safeParse(feature.geometry);
    if (!parsed.success) {
      onlyPoints = false;
      break;
    }
    const props = feature.properties;
    const time = toIsoTime(props?.time ?? props?.timestamp ?? props?.t);
    points.push(toTrackPoint(parsed.data.coordinates, time, toOptionalNumber(props?.accuracy)));
  }

  if (onlyPoints) return { points };

  if (features.length !== 1) {
    throw new FormatError(
      `FeatureCollection must hold exactly one LineString feature or only Point features (got ${features.length} features).`
    );
  }

  const [feature] = features;
  const coordinates = parseLineGeometry(feature.geometry, "The collection's feature geometry");
  return { name: readName(feature.properties), points: lineToPoints(coordinates, feature.properties) };
}

function extractPoints(root: unknown): { name?: string; points: TrackPoint[] } {
  const type = readType(root);

  if (type === "LineString") {
    return { points: lineToPoints(parseLineGeometry(root, "Root geometry"), undefined) };
  }

  if (type === "Feature") {
    const feature = featureSchema.safeParse(root);
    if (!feature.success) throw new FormatError("Root Feature is malformed.");
    const coordinates = parseLineGeometry(feature.data.geometry, "Feature geometry");
    return { name: readName(feature.data.properties), points: lineToPoints(coordinates, feature.data.properties) };
  }

  if (type === "FeatureCollection") {
    const collection = featureCollectionSchema.safeParse(root);
    if (!collection.success) throw new FormatError("Root FeatureCollection is malformed.");
    return pointsFromCollection(collection.data);
  }

  throw new FormatError(`Unsupported GeoJSON root type: ${String(type ?? "none")}. Expected a single line track.`);
}

export function validateCoordinates(points: TrackPoint[]): void {
  points.forEach((point, index) => {
    if (point.lat < -90 || point.lat > 90) {
      throw new InvalidCoordinateError(index, `latitude ${point.lat} is outside [-90, 90]`);
    }
    if (point.lng < -180 || point.lng > 180) {
      throw new InvalidCoordinateError(index, `longitude ${point.lng} is outside [-180, 180]`);
    }
  });
}

export function parseTrack(text: string): Track {
  let root: unknown;
  try {
    root = JSON.parse(text);
  } catch (error) {
    throw new FormatError("Input is not valid JSON.", { cause: error });
  }

  const { name, points } = extractPoints(root);
  if (points.length < 2) throw new EmptyTrackError(points.length);
  validateCoordinates(points);

  return name ? { name, points } : { points };
}

export async function loadTrack(filePath: string): Promise<Track> {
  const text = await readFile(filePath, "utf-8");
  return parseTrack(text.replace(/^\uFEFF/, ""));
}
