import { vi } from "vitest";
import { z } from "zod";

import type { SnapConfig } from "@/snap/config";
import type { Sleep } from "@/snap/rateLimiter";
import type { TrackPoint } from "@/snap/types";

const requestSchema = z.object({
  mode: z.string(),
  waypoints: z.array(z.object({ timestamp: z.string(), location: z.array(z.number()) }))
});

export type MapMatchRequest = z.infer<typeof requestSchema>;

export const testConfig: SnapConfig = {
  apiKey: "test-key",
  apiUrl: "https://maps.test/v1/mapmatching",
  mode: "drive",
  maxBatchSize: 3,
  requestsPerMinute: 300,
  maxRetries: 2,
  retryBaseDelayMs: 100,
  retryMaxDelayMs: 1000,
  requestTimeoutMs: 5000
};

export function linePoints(count: number): TrackPoint[] {
  return Array.from({ length: count }, (_, index) => ({ lat: 0, lng: index }));
}

export function readRequest(init: RequestInit | undefined): MapMatchRequest {
  return requestSchema.parse(JSON.parse(typeof init?.body === "string" ? init.body : "null"));
}

/** A matched response that moves every waypoint `latShift` degrees north. */
export function matchedResponseBody(request: MapMatchRequest, latShift = 0.5) {
  return {
    type: "FeatureCollection",
    features: [
      {
        type: "Feature",
        properties: {
          mode: request.mode,
          waypoints: request.waypoints.map((waypoint, index) => ({
            timestamp: waypoint.timestamp,
            location: [waypoint.location[0], waypoint.location[1] + latShift],
            original_index: index,
            match_type: "matched"
          }))
        },
        geometry: { type: "MultiLineString", coordinates: [] }
      }
    ]
  };
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers }
  });
}

export type FakeMapMatchApiOptions = {
  latShift?: number;
  /** Zero-based request numbers answered with HTTP 503. */
  failRequests?: number[];
  status?: number;
};

export function createFakeMapMatchApi(options: FakeMapMatchApiOptions = {}) {
  const requests: MapMatchRequest[] = [];
  const fetchMock = vi.fn<typeof fetch>(async (_input, init) => {
    const request = readRequest(init);
    const requestNumber = requests.length;
    requests.push(request);

    if (options.status !== undefined) {
      return new Response("rejected", { status: options.status });
    }
    if (options.failRequests?.includes(requestNumber)) {
      return new Response("service unavailable", { status: 503 });
    }
    return jsonResponse(matchedResponseBody(request, options.latShift));
  });

  return { fetch: fetchMock, requests };
}

export function createSleep() {
  return vi.fn<Sleep>(async () => undefined);
}
