/**
 * track-snap CLI
 *
 * Snaps a GeoJSON GPS track to the road network through the Geoapify Map
 * Matching API and writes `<name>_snapped.geojson` next to the input.
 *
 * Run with: npm run snap -- <track.geojson> [--config track-snap.env]
 */

import path from "node:path";
import { Command } from "commander";
import ora, { type Ora } from "ora";

import { createLogger, type Logger, silentLogger } from "@/lib/log";
import { loadConfig } from "@/snap/config";
import { SnapError, WriteError } from "@/snap/errors";
import { describeDegradation, runPipeline } from "@/snap/pipeline";
import { outputPathFor, writeTrack } from "@/snap/writer";

const VERSION = "0.1.0";

type CliOptions = {
  config?: string;
  outDir?: string;
  fallbackDir?: string;
  quiet?: boolean;
};

// Prints log lines above the spinner instead of through it.
function spinnerLogger(spinner: Ora): Logger {
  const base = createLogger();
  const around =
    (write: (...args: unknown[]) => void) =>
    (...args: unknown[]) => {
      spinner.clear();
      write(...args);
      spinner.render();
    };
  return { info: around(base.info), warn: around(base.warn), error: around(base.error) };
}

async function retryWrite(error: WriteError, inputPath: string, fallbackDir: string): Promise<string> {
  const target = outputPathFor(inputPath, path.resolve(fallbackDir));
  // eslint-disable-next-line no-console
  console.error(`[SNAP_ERROR] ${error.message}`);
  // eslint-disable-next-line no-console
  console.error(`[SNAP] Retrying write to ${target}`);
  return writeTrack(error.track, target);
}

function reportFailure(spinner: Ora, error: unknown): void {
  spinner.fail(error instanceof SnapError ? error.code : "Snapping failed");
  // eslint-disable-next-line no-console
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
}

async function run(input: string, options: CliOptions): Promise<void> {
  const inputPath = path.resolve(input);
  const spinner = ora({ text: "Loading configuration...", isSilent: Boolean(options.quiet) }).start();
  const logger = options.quiet ? silentLogger : spinnerLogger(spinner);

  const controller = new AbortController();
  const onInterrupt = () => {
    controller.abort();
    spinner.text = "Cancelling after the current batch...";
  };
  process.once("SIGINT", onInterrupt);

  try {
    const config = await loadConfig({ configPath: options.config });
    const outputDir = options.outDir ? path.resolve(options.outDir) : config.outputDir;

    spinner.text = `Snapping ${path.basename(inputPath)}...`;
    const result = await runPipeline(inputPath, {
      config: { ...config, outputDir },
      signal: controller.signal,
      logger,
      onBatch: (snap, progress) => {
        spinner.text = `Batch ${progress.done}/${progress.total}: ${snap.status}`;
      }
    });

    spinner.succeed(`Saved ${result.outputPath}`);
    // eslint-disable-next-line no-console
    console.log(`${result.track.points.length} points; ${describeDegradation(result.track)}.`);
  } catch (error) {
    if (error instanceof WriteError && options.fallbackDir) {
      try {
        const outputPath = await retryWrite(error, inputPath, options.fallbackDir);
        spinner.succeed(`Saved ${outputPath}`);
        // eslint-disable-next-line no-console
        console.log(`${error.track.points.length} points; ${describeDegradation(error.track)}.`);
        return;
      } catch (retryError) {
        reportFailure(spinner, retryError);
        return;
      }
    }
    reportFailure(spinner, error);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

const program = new Command()
  .name("track-snap")
  .description("Snap a GeoJSON GPS track to roads with the Geoapify Map Matching API")
  .version(VERSION)
  .argument("<input>", "GeoJSON track file (LineString feature or Point collection)")
  .option("-c, --config <file>", "Settings file (KEY=value lines); defaults to ./track-snap.env when present")
  .option("-o, --out-dir <dir>", "Write the output here instead of next to the input")
  .option("--fallback-dir <dir>", "Directory to retry the write in when the output directory is not writable")
  .option("-q, --quiet", "Suppress progress output")
  .action(run);

program.parseAsync(process.argv).catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exitCode = 1;
});
