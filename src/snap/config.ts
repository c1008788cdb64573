import { readFile } from "node:fs/promises";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

import { ConfigError } from "@/snap/errors";

export const DEFAULT_CONFIG_FILE = "track-snap.env";
export const DEFAULT_API_URL = "https://api.geoapify.com/v1/mapmatching";

const SETTING_KEYS = [
  "apiKey",
  "apiUrl",
  "mode",
  "maxBatchSize",
  "requestsPerMinute",
  "maxRetries",
  "retryBaseDelayMs",
  "retryMaxDelayMs",
  "requestTimeoutMs",
  "outputDir"
] as const;

type SettingKey = (typeof SETTING_KEYS)[number];

const SETTING_NAMES: Record<SettingKey, string[]> = {
  apiKey: ["GEOAPIFY_API_KEY", "API_KEY", "api_key"],
  apiUrl: ["GEOAPIFY_API_URL", "API_URL", "api_url"],
  mode: ["SNAP_MODE", "mode"],
  maxBatchSize: ["SNAP_MAX_BATCH_SIZE", "max_batch_size"],
  requestsPerMinute: ["SNAP_REQUESTS_PER_MINUTE", "requests_per_minute"],
  maxRetries: ["SNAP_MAX_RETRIES", "max_retries"],
  retryBaseDelayMs: ["SNAP_RETRY_BASE_DELAY_MS"],
  retryMaxDelayMs: ["SNAP_RETRY_MAX_DELAY_MS"],
  requestTimeoutMs: ["SNAP_REQUEST_TIMEOUT_MS"],
  outputDir: ["SNAP_OUTPUT_DIR", "output_dir"]
};

const configSchema = z.object({
  apiKey: z.string({ required_error: `missing; set one of ${SETTING_NAMES.apiKey.join(" | ")}` }).min(1),
  apiUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, ""))
    .default(DEFAULT_API_URL),
  mode: z.string().min(1).default("drive"),
  // Geoapify accepts at most 1000 waypoints per request.
  maxBatchSize: z.coerce.number().int().min(2).max(1000).default(1000),
  // Free plan: 5 requests per second.
  requestsPerMinute: z.coerce.number().positive().finite().default(300),
  maxRetries: z.coerce.number().int().min(0).default(3),
  retryBaseDelayMs: z.coerce.number().int().min(0).default(3000),
  retryMaxDelayMs: z.coerce.number().int().min(0).default(30_000),
  requestTimeoutMs: z.coerce.number().int().positive().default(180_000),
  outputDir: z.string().min(1).optional()
});

export type SnapConfig = z.infer<typeof configSchema>;

export type LoadConfigOptions = {
  /** Explicit settings file; when given it must exist. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

type SettingsSource = Record<string, string | undefined>;

function firstValue(source: SettingsSource, names: string[]): string | undefined {
  for (const name of names) {
    const value = source[name];
    if (value && value.trim()) {
      return value.trim();
    }
  }
  return undefined;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readSettingsFile(filePath: string, required: boolean): Promise<Record<string, string>> {
  try {
    return dotenv.parse(await readFile(filePath, "utf-8"));
  } catch (error) {
    if (!required && isMissingFile(error)) return {};
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read config file ${filePath}: ${reason}`, { cause: error });
  }
}

/** Sources are tried in order per setting; a later source only fills settings the earlier ones lack. */
export function parseConfig(...sources: SettingsSource[]): SnapConfig {
  const raw: Partial<Record<SettingKey, string>> = {};
  for (const key of SETTING_KEYS) {
    let value: string | undefined;
    for (const source of sources) {
      value = firstValue(source, SETTING_NAMES[key]);
      if (value !== undefined) break;
    }
    if (value !== undefined) raw[key] = value;
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<SnapConfig> {
  const cwd = options.cwd ?? process.cwd();
  const filePath = path.resolve(cwd, options.configPath ?? DEFAULT_CONFIG_FILE);
  const fileValues = await readSettingsFile(filePath, options.configPath !== undefined);
  return parseConfig(fileValues, options.env ?? process.env);
}
