import { type Logger, silentLogger } from "@/lib/log";
import { countBatches, batchTrack } from "@/snap/batcher";
import { createSnapClient } from "@/snap/client";
import type { SnapConfig } from "@/snap/config";
import { CancelledError } from "@/snap/errors";
import { loadTrack } from "@/snap/loader";
import { RateLimiter, type Clock, type Sleep } from "@/snap/rateLimiter";
import { reassemble } from "@/snap/reassembler";
import type { Batch, CorrectedTrack, SnapResult, Track } from "@/snap/types";
import { outputPathFor, writeTrack } from "@/snap/writer";

export type BatchProgress = {
  done: number;
  total: number;
};

export type PipelineOptions = {
  config: SnapConfig;
  signal?: AbortSignal;
  logger?: Logger;
  fetch?: typeof fetch;
  sleep?: Sleep;
  now?: Clock;
  onBatch?: (result: SnapResult, progress: BatchProgress) => void;
};

export type PipelineResult = {
  inputPath: string;
  outputPath: string;
  track: CorrectedTrack;
};

export async function snapTrack(track: Track, options: PipelineOptions): Promise<CorrectedTrack> {
  const { config, signal } = options;
  const logger = options.logger ?? silentLogger;

  const rateLimiter = new RateLimiter({
    requestsPerMinute: config.requestsPerMinute,
    now: options.now,
    sleep: options.sleep
  });
  const client = createSnapClient({
    apiUrl: config.apiUrl,
    apiKey: config.apiKey,
    mode: config.mode,
    maxRetries: config.maxRetries,
    retryBaseDelayMs: config.retryBaseDelayMs,
    retryMaxDelayMs: config.retryMaxDelayMs,
    requestTimeoutMs: config.requestTimeoutMs,
    rateLimiter,
    fetch: options.fetch,
    sleep: options.sleep,
    logger
  });

  const total = countBatches(track.points.length, config.maxBatchSize);
  logger.info(`Map matching ${track.points.length} points in ${total} batch(es) (mode=${config.mode})`);

  const batches: Batch[] = [];
  const results: SnapResult[] = [];
  for (const batch of batchTrack(track.points, config.maxBatchSize)) {
    if (signal?.aborted) {
      throw new CancelledError(results.length);
    }
    const result = await client.snapBatch(batch);
    batches.push(batch);
    results.push(result);
    options.onBatch?.(result, { done: results.length, total });
  }

  const corrected = reassemble(batches, results, track.name);
  logger.info(`${rateLimiter.requestCount} API request(s) sent; ${describeDegradation(corrected)}`);
  return corrected;
}

export function describeDegradation(track: CorrectedTrack): string {
  const parts = [`${track.degradedCount} of ${track.segments.length} segment(s) degraded`];
  if (track.partialCount > 0) {
    parts.push(`${track.partialCount} partially matched`);
  }
  return parts.join(", ");
}

export async function runPipeline(inputPath: string, options: PipelineOptions): Promise<PipelineResult> {
  const logger = options.logger ?? silentLogger;

  logger.info(`Input: ${inputPath}`);
  const track = await loadTrack(inputPath);
  logger.info(`Track read: ${track.points.length} points${track.name ? ` (${track.name})` : ""}`);

  const corrected = await snapTrack(track, options);
  const outputPath = await writeTrack(corrected, outputPathFor(inputPath, options.config.outputDir));
  logger.info(`Saved: ${outputPath}`);

  return { inputPath, outputPath, track: corrected };
}
