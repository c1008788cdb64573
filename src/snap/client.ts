import { z } from "zod";

import { type Logger, silentLogger, toLogUrl } from "@/lib/log";
import { AuthError } from "@/snap/errors";
import { defaultSleep, type RateLimiter, type Sleep } from "@/snap/rateLimiter";
import type { Batch, SnapResult, TrackPoint } from "@/snap/types";

export type SnapClientOptions = {
  apiUrl: string;
  apiKey: string;
  mode: string;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  requestTimeoutMs: number;
  rateLimiter: RateLimiter;
  fetch?: typeof fetch;
  sleep?: Sleep;
  logger?: Logger;
};

export type SnapClient = {
  snapBatch: (batch: Batch) => Promise<SnapResult>;
};

type MapMatchWaypoint = {
  timestamp: string;
  location: [number, number];
};

export type MapMatchRequestBody = {
  mode: string;
  waypoints: MapMatchWaypoint[];
};

type AttemptOutcome =
  | { kind: "success"; body: unknown }
  | { kind: "transient"; error: string; retryAfterMs?: number }
  | { kind: "fatal"; error: string }
  | { kind: "auth"; status: number; body: string };

const SYNTHETIC_TIME_STEP_MS = 10_000;
const ERROR_BODY_LIMIT = 500;

const waypointSchema = z
  .object({
    location: z.array(z.number()).min(2),
    original_index: z.number().int(),
    match_type: z.string().optional()
  })
  .passthrough();

const featureSchema = z
  .object({
    properties: z.object({ waypoints: z.array(waypointSchema) }).passthrough()
  })
  .passthrough();

const responseSchema = z.union([
  z.object({ type: z.literal("FeatureCollection"), features: z.array(featureSchema).min(1) }).passthrough(),
  featureSchema.extend({ type: z.literal("Feature") })
]);

export function buildRequestUrl(apiUrl: string, apiKey: string): string {
  const separator = apiUrl.includes("?") ? "&" : "?";
  return `${apiUrl}${separator}apiKey=${encodeURIComponent(apiKey)}`;
}

export function toRequestBody(batch: Batch, mode: string): MapMatchRequestBody {
  return {
    mode,
    waypoints: batch.points.map((point, offset) => ({
      // Points without a capture time are spaced 10 s apart by track position.
      timestamp: point.time ?? new Date((batch.start + offset) * SYNTHETIC_TIME_STEP_MS).toISOString(),
      location: [point.lng, point.lat]
    }))
  };
}

export function backoffDelay(retry: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (retry - 1), maxDelayMs);
}

// Retry-After is either delay-seconds or an HTTP-date.
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  const value = header?.trim();
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return seconds >= 0 ? seconds * 1000 : undefined;
  const date = Date.parse(value);
  return Number.isFinite(date) ? Math.max(0, date - now) : undefined;
}

function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function describeFetchError(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return `MAPMATCH_TIMEOUT_${timeoutMs}MS`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `MAPMATCH_NETWORK_ERROR: ${message}`;
}

type Decoded =
  | { ok: true; points: TrackPoint[]; matchedCount: number }
  | { ok: false; error: "MAPMATCH_INVALID_RESPONSE" | "MAPMATCH_NO_MATCH" };

export function decodeMapMatchResponse(body: unknown, batch: Batch): Decoded {
  const parsed = responseSchema.safeParse(body);
  if (!parsed.success) return { ok: false, error: "MAPMATCH_INVALID_RESPONSE" };

  const features = parsed.data.type === "FeatureCollection" ? parsed.data.features : [parsed.data];
  const snapped = new Map<number, { lng: number; lat: number }>();

  for (const feature of features) {
    for (const waypoint of feature.properties.waypoints) {
      if (waypoint.match_type === "unmatched") continue;
      const index = waypoint.original_index;
      if (index < 0 || index >= batch.points.length) continue;
      const [lng, lat] = waypoint.location;
      if (lat < -90 || lat > 90 || lng < -180 || lng > 180) continue;
      snapped.set(index, { lng, lat });
    }
  }

  if (snapped.size === 0) return { ok: false, error: "MAPMATCH_NO_MATCH" };

  const points = batch.points.map((point, index) => {
    const location = snapped.get(index);
    return location ? { ...point, lng: location.lng, lat: location.lat } : { ...point };
  });

  return { ok: true, points, matchedCount: snapped.size };
}

export function createSnapClient(options: SnapClientOptions): SnapClient {
  const fetchImpl = options.fetch ?? fetch;
  const sleep = options.sleep ?? defaultSleep;
  const logger = options.logger ?? silentLogger;
  const url = buildRequestUrl(options.apiUrl, options.apiKey);
  const maxAttempts = options.maxRetries + 1;

  async function attemptRequest(body: MapMatchRequestBody): Promise<AttemptOutcome> {
    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(options.requestTimeoutMs)
      });
    } catch (error) {
      return { kind: "transient", error: describeFetchError(error, options.requestTimeoutMs) };
    }

    if (response.status === 401 || response.status === 403) {
      const errText = await response.text().catch(() => "");
      return { kind: "auth", status: response.status, body: errText.slice(0, ERROR_BODY_LIMIT) };
    }

    if (!response.ok) {
      const errText = (await response.text().catch(() => "")).slice(0, ERROR_BODY_LIMIT);
      const error = `MAPMATCH_HTTP_${response.status}${errText ? `: ${errText}` : ""}`;
      if (isTransientStatus(response.status)) {
        return { kind: "transient", error, retryAfterMs: parseRetryAfter(response.headers.get("retry-after")) };
      }
      return { kind: "fatal", error };
    }

    const json: unknown = await response.json().catch(() => undefined);
    if (json === undefined) return { kind: "fatal", error: "MAPMATCH_INVALID_JSON" };
    return { kind: "success", body: json };
  }

  async function snapBatch(batch: Batch): Promise<SnapResult> {
    const body = toRequestBody(batch, options.mode);
    const label = `Batch ${batch.index + 1} (${batch.points.length} waypoints)`;

    for (let attempt = 1; ; attempt += 1) {
      await options.rateLimiter.acquire();
      logger.info(`${label}: POST ${toLogUrl(url)} (attempt ${attempt}/${maxAttempts})`);

      const outcome = await attemptRequest(body);

      if (outcome.kind === "auth") {
        throw new AuthError(outcome.status, outcome.body);
      }

      if (outcome.kind === "fatal") {
        logger.error(`${label}: ${outcome.error}`);
        return { batchIndex: batch.index, status: "failure", error: outcome.error, attempts: attempt };
      }

      if (outcome.kind === "success") {
        const decoded = decodeMapMatchResponse(outcome.body, batch);
        if (!decoded.ok) {
          logger.error(`${label}: ${decoded.error}`);
          return { batchIndex: batch.index, status: "failure", error: decoded.error, attempts: attempt };
        }
        const status = decoded.matchedCount === batch.points.length ? "success" : "partial";
        if (status === "partial") {
          logger.warn(`${label}: ${batch.points.length - decoded.matchedCount} waypoint(s) unmatched, kept as recorded`);
        }
        return {
          batchIndex: batch.index,
          status,
          points: decoded.points,
          matchedCount: decoded.matchedCount,
          attempts: attempt
        };
      }

      if (attempt >= maxAttempts) {
        logger.error(`${label}: ${outcome.error} (giving up after ${attempt} attempts)`);
        return {
          batchIndex: batch.index,
          status: "failure",
          error: `${outcome.error} (after ${attempt} attempts)`,
          attempts: attempt
        };
      }

      const waitMs = Math.max(
        backoffDelay(attempt, options.retryBaseDelayMs, options.retryMaxDelayMs),
        outcome.retryAfterMs ?? 0
      );
      logger.warn(`${label}: ${outcome.error}; retrying in ${waitMs} ms`);
      await sleep(waitMs);
    }
  }

  return { snapBatch };
}
