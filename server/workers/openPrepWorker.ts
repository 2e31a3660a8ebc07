/**
 * Open-Prep Worker
 *
 * Runs the candidate pipeline over the latest enrichment snapshot and
 * publishes the artifact (latest.json + runs/).
 *
 * Features:
 * - Run once (OPEN_PREP_INTERVAL_MS=0) or on a fixed interval
 * - Regime hysteresis state persisted between runs of the same session
 * - Diff against the previous latest.json
 * - Dirty-flag score cache kept for the lifetime of the process
 * - Configuration errors are fatal at startup (exit 1); no artifact is written
 */

import { config } from "dotenv";
config({ path: ".env.local", override: true });
config();

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { getEnvInt, getEnvVar } from "../../src/lib/env.js";
import { writeFileAtomic } from "../../src/lib/utils/atomicWrite.js";
import { createLogger } from "../../src/lib/utils/logger.js";
import { writeArtifactAtomic, type OpenPrepArtifact, type WrittenArtifact } from "../../src/lib/openPrep/artifact.js";
import { DirtyFlagManager } from "../../src/lib/openPrep/DirtyFlagManager.js";
import { ConfigurationError, InputError, errorMessage } from "../../src/lib/openPrep/errors.js";
import { runOpenPrep } from "../../src/lib/openPrep/pipeline.js";
import { loadPipelineConfig, type PipelineConfig } from "../../src/lib/openPrep/pipelineConfig.js";
import { ArtifactSummarySchema, formatDiffSummary, type ArtifactSummary } from "../../src/lib/openPrep/runDiff.js";
import { REGIME_LABELS, type RegimeHistory, type WeightSet } from "../../src/lib/openPrep/types.js";
import { loadWeightSet } from "../../src/lib/openPrep/weightSets.js";

const log = createLogger("OpenPrepWorker");

export const REGIME_STATE_FILE = "regime_state.json";

const RegimeHistorySchema = z.object({
  previous: z.enum(REGIME_LABELS),
  sessionDate: z.string().nullable(),
  transitions: z.number().int().min(0),
});

// ============================================================================
// Settings
// ============================================================================

export interface OpenPrepWorkerSettings {
  inputPath: string;
  outputDir: string;
  /** Explicitly configured config path; a missing file is then an error */
  configPath: string | undefined;
  weightsDir: string;
  weightSetName: string;
  /** 0 = run once */
  intervalMs: number;
}

export function readWorkerSettings(): OpenPrepWorkerSettings {
  return {
    inputPath: getEnvVar("OPEN_PREP_INPUT_PATH") ?? "./data/open-prep-input.json",
    outputDir: getEnvVar("OPEN_PREP_OUTPUT_DIR") ?? "./artifacts/open_prep",
    configPath: getEnvVar("OPEN_PREP_CONFIG_PATH"),
    weightsDir: getEnvVar("OPEN_PREP_WEIGHTS_DIR") ?? join(process.cwd(), "config", "weights"),
    weightSetName: getEnvVar("OPEN_PREP_WEIGHT_SET") ?? "default",
    intervalMs: getEnvInt("OPEN_PREP_INTERVAL_MS", 0),
  };
}

// ============================================================================
// File I/O
// ============================================================================

/**
 * @throws InputError when the snapshot is missing or not JSON
 */
export function readRunInput(path: string): unknown {
  if (!existsSync(path)) {
    throw new InputError(`Run input not found: ${path}`);
  }
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new InputError(`Cannot parse run input ${path}: ${errorMessage(error)}`);
  }
}

/**
 * Previous run's summary, or null when there is none.
 * An unreadable latest.json is logged and treated as a first run.
 */
export function readPreviousSummary(outputDir: string): ArtifactSummary | null {
  const path = join(outputDir, "latest.json");
  if (!existsSync(path)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    log.warn("Previous artifact unreadable, diffing as first run", { path, error: errorMessage(error) });
    return null;
  }

  const parsed = ArtifactSummarySchema.safeParse(raw);
  if (!parsed.success) {
    log.warn("Previous artifact has an unexpected shape, diffing as first run", { path });
    return null;
  }
  return parsed.data;
}

export function readRegimeState(outputDir: string): RegimeHistory | null {
  const path = join(outputDir, REGIME_STATE_FILE);
  if (!existsSync(path)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    log.warn("Regime state unreadable, starting fresh", { path, error: errorMessage(error) });
    return null;
  }

  const parsed = RegimeHistorySchema.safeParse(raw);
  if (!parsed.success) {
    log.warn("Regime state has an unexpected shape, starting fresh", { path });
    return null;
  }
  return parsed.data;
}

export function writeRegimeState(outputDir: string, history: RegimeHistory): void {
  writeFileAtomic(join(outputDir, REGIME_STATE_FILE), `${JSON.stringify(history, null, 2)}\n`);
}

// ============================================================================
// Worker Class
// ============================================================================

export interface WorkerRunResult {
  artifact: OpenPrepArtifact;
  written: WrittenArtifact;
}

export class OpenPrepWorker {
  private timer?: NodeJS.Timeout;
  private isRunning = false;
  private readonly pipelineConfig: PipelineConfig;
  private readonly weightSet: WeightSet;
  private readonly dirtyManager: DirtyFlagManager;

  /**
   * @throws ConfigurationError on invalid config or weight set
   */
  constructor(private readonly settings: OpenPrepWorkerSettings = readWorkerSettings()) {
    this.pipelineConfig = loadPipelineConfig(
      settings.configPath ?? join(process.cwd(), "config", "open-prep.json"),
      settings.configPath !== undefined
    );
    this.weightSet = loadWeightSet(settings.weightSetName, settings.weightsDir);
    this.dirtyManager = new DirtyFlagManager(this.pipelineConfig.cache);
  }

  /**
   * One full pipeline run: read snapshot, run, publish artifact and regime state
   */
  runOnce(now: Date = new Date()): WorkerRunResult {
    const { outputDir } = this.settings;
    const input = readRunInput(this.settings.inputPath);

    const { artifact, regimeHistory } = runOpenPrep(input, {
      config: this.pipelineConfig,
      weightSet: this.weightSet,
      regimeHistory: readRegimeState(outputDir),
      dirtyManager: this.dirtyManager,
      previous: readPreviousSummary(outputDir),
      now,
    });

    const written = writeArtifactAtomic(artifact, outputDir);
    writeRegimeState(outputDir, regimeHistory);

    if (artifact.diff) log.info(formatDiffSummary(artifact.diff));
    if (artifact.runStatus.degradedMode) {
      log.warn("Run degraded", { degraded: artifact.runStatus.degraded.length });
    }
    return { artifact, written };
  }

  start(): void {
    if (this.isRunning) {
      log.warn("Worker already running");
      return;
    }
    this.isRunning = true;

    log.info("Starting Open-Prep Worker", {
      weightSet: `${this.weightSet.name}@${this.weightSet.version}`,
      intervalMs: this.settings.intervalMs,
      outputDir: this.settings.outputDir,
    });

    this.tick();
    if (this.settings.intervalMs > 0) {
      this.timer = setInterval(() => this.tick(), this.settings.intervalMs);
    }
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.isRunning = false;
    log.info("Worker stopped", this.dirtyManager.stats());
  }

  private tick(): void {
    try {
      this.runOnce();
    } catch (error) {
      log.error("Run failed", { error: errorMessage(error) });
      if (this.settings.intervalMs === 0) throw error;
    }
  }
}

// ============================================================================
// Standalone Execution
// ============================================================================

const isMainModule =
  process.argv[1]?.endsWith("openPrepWorker.ts") || process.argv[1]?.endsWith("openPrepWorker.js");

if (isMainModule) {
  let worker: OpenPrepWorker;
  try {
    worker = new OpenPrepWorker();
  } catch (error) {
    log.error(error instanceof ConfigurationError ? "Invalid configuration" : "Failed to start worker", {
      error: errorMessage(error),
      details: error instanceof ConfigurationError ? error.details : undefined,
    });
    process.exit(1);
  }

  try {
    worker.start();
  } catch (error) {
    log.error("Run failed", { error: errorMessage(error) });
    process.exit(1);
  }

  // Graceful shutdown
  process.on("SIGINT", () => {
    log.info("Shutting down...");
    worker.stop();
    process.exit(0);
  });

  process.on("SIGTERM", () => {
    log.info("Shutting down...");
    worker.stop();
    process.exit(0);
  });
}
