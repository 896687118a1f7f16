#!/usr/bin/env node
import path from "node:path";
import { Command } from "commander";
import pc from "picocolors";
import {
  loadConfig,
  resolveDetectorPaths,
  type ConfigOverrides,
  type ReviewConfig
} from "./config/loadConfig.js";
import { loadCorpus } from "./corpus/loadCorpus.js";
import { createAppLogger, createUiLogger, noopLogger, type AppLogger, type Logger } from "./logging/logger.js";
import { reconcileReviews, type ReconcileResult } from "./review/reconcile.js";
import {
  createAllFindingsPassthrough,
  createKnownMisuseMatching,
  type ReviewStrategy
} from "./review/strategies.js";

type PrepareOptions = {
  config?: string;
  data?: string;
  findings?: string;
  reviews?: string;
  compiles?: string;
  forcePrepare?: boolean;
  only?: string[];
  skip?: string[];
  verbose?: boolean;
};

const program = new Command();

function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) return "0s";
  const totalSeconds = durationMs / 1000;
  if (totalSeconds < 60) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.round(totalSeconds - minutes * 60);
  return `${minutes}m ${seconds}s`;
}

function toOverrides(options: PrepareOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.data) overrides.dataDir = options.data;
  if (options.findings) overrides.findingsDir = options.findings;
  if (options.reviews) overrides.reviewsDir = options.reviews;
  if (options.compiles) overrides.compilesDir = options.compiles;
  if (options.forcePrepare) overrides.forcePrepare = true;
  return overrides;
}

function formatSummary(result: ReconcileResult, durationMs: number): string {
  const { counts } = result;
  const parts = [
    `${pc.green(String(counts.review))} review`,
    `${counts["no-hits"]} no hits`,
    `${pc.yellow(String(counts["run-failure"]))} no result`
  ];
  if (counts.download > 0) {
    parts.push(`${counts.download} download`);
  }
  return `${parts.join(", ")} (${formatDuration(durationMs)})`;
}

async function runPrepare(
  detector: string,
  options: PrepareOptions,
  buildStrategy: (config: ReviewConfig) => ReviewStrategy
): Promise<void> {
  const start = Date.now();
  const projectRoot = process.cwd();
  let appLogger: AppLogger | null = null;
  let uiLogger: Logger = createUiLogger({ appLogger: noopLogger, verbose: options.verbose });

  try {
    const config = await loadConfig({
      projectRoot,
      configPath: options.config ?? null,
      overrides: toOverrides(options)
    });
    try {
      appLogger = await createAppLogger({ stateDir: config.stateDir, label: `prepare-${detector}` });
    } catch {
      appLogger = null;
    }
    uiLogger = createUiLogger({ appLogger: appLogger ?? noopLogger, verbose: options.verbose });

    const projects = await loadCorpus(config.dataDir, {
      only: options.only ?? [],
      skip: options.skip ?? []
    });
    const paths = resolveDetectorPaths(config, detector);
    const result = await reconcileReviews({
      detector,
      ...paths,
      forcePrepare: config.forcePrepare,
      projects,
      strategy: buildStrategy(config),
      logger: uiLogger
    });

    console.log(`\nReview index: ${path.relative(projectRoot, result.indexPath) || result.indexPath}`);
    console.log(formatSummary(result, Date.now() - start));
    process.exitCode = 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    uiLogger.error(`Error: ${message}`);
    process.exitCode = 2;
  } finally {
    await appLogger?.close();
  }
}

const collect = (value: string, previous: string[] = []): string[] => [...previous, value];

function withPrepareOptions(command: Command): Command {
  return command
    .option("-c, --config <path>", "Path to misuse-review.config.json")
    .option("--data <dir>", "Benchmark corpus directory")
    .option("--findings <dir>", "Detector findings root (one directory per detector)")
    .option("--reviews <dir>", "Review output root (one directory per detector)")
    .option("--compiles <dir>", "Compiled project versions, used to show source on review pages")
    .option("--force-prepare", "Regenerate review directories even if they already exist")
    .option("--only <id>", "Limit to a project or project.version (repeatable)", collect)
    .option("--skip <id>", "Skip a project or project.version (repeatable)", collect)
    .option("-v, --verbose", "Print debug messages");
}

program
  .name("misuse-review")
  .description("Match detector findings against known API misuses and prepare review pages")
  .version("0.1.0");

withPrepareOptions(
  program.command("prepare <detector>").description("Prepare reviews of potential hits for every known misuse")
).action(async (detector: string, options: PrepareOptions) => {
  await runPrepare(detector, options, () => createKnownMisuseMatching());
});

withPrepareOptions(
  program
    .command("prepare-all <detector>")
    .description("Prepare review pages for every finding, regardless of known misuses")
).action(async (detector: string, options: PrepareOptions) => {
  await runPrepare(detector, options, (config) =>
    createAllFindingsPassthrough({ xmlArtifactDetectors: config.xmlArtifactDetectors })
  );
});

await program.parseAsync(process.argv);
