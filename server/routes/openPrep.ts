/**
 * openPrep.ts - Open-Prep artifact API Routes
 *
 * Read-only access to the artifacts the worker publishes.
 */

import { existsSync, readdirSync, readFileSync } from "fs";
import { join } from "path";
import { Router } from "express";
import type { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../src/lib/utils/logger.js";
import { errorMessage } from "../../src/lib/openPrep/errors.js";
import { ArtifactSummarySchema } from "../../src/lib/openPrep/runDiff.js";

const log = createLogger("OpenPrepRoutes");

// ============= Types =============

const StoredArtifactSchema = ArtifactSummarySchema.extend({
  sessionDate: z.string().nullable(),
  runStatus: z.object({
    degradedMode: z.boolean(),
    counts: z.object({
      input: z.number(),
      eligible: z.number(),
      filteredOut: z.number(),
      ranked: z.number(),
    }),
  }),
});

const RankedSymbolsSchema = z.object({
  ranked: z.array(z.object({ symbol: z.string() }).passthrough()),
});

export type StoredArtifact = z.infer<typeof StoredArtifactSchema>;

export type LatestArtifactResult =
  | { ok: true; raw: unknown; artifact: StoredArtifact }
  | { ok: false; status: 404 | 500; error: string };

export interface OpenPrepStatus {
  generatedAt: string;
  sessionDate: string | null;
  ageSeconds: number;
  stale: boolean;
  regime: StoredArtifact["regime"]["label"];
  degradedMode: boolean;
  counts: StoredArtifact["runStatus"]["counts"];
  topSymbols: string[];
}

// ============= Helpers =============

/**
 * Read and shape-check `latest.json`
 */
export function readLatestArtifact(outputDir: string): LatestArtifactResult {
  const path = join(outputDir, "latest.json");
  if (!existsSync(path)) {
    return { ok: false, status: 404, error: "No open-prep artifact published yet" };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    log.error("latest.json unreadable", { path, error: errorMessage(error) });
    return { ok: false, status: 500, error: "Artifact unreadable" };
  }

  const parsed = StoredArtifactSchema.safeParse(raw);
  if (!parsed.success) {
    log.error("latest.json has an unexpected shape", { path });
    return { ok: false, status: 500, error: "Artifact has an unexpected shape" };
  }
  return { ok: true, raw, artifact: parsed.data };
}

/**
 * Ranked record for one symbol from the raw artifact, or null
 */
export function findRankedRecord(raw: unknown, symbol: string): Record<string, unknown> | null {
  const parsed = RankedSymbolsSchema.safeParse(raw);
  if (!parsed.success) return null;
  const wanted = symbol.trim().toUpperCase();
  return parsed.data.ranked.find((record) => record.symbol === wanted) ?? null;
}

export function buildStatus(artifact: StoredArtifact, now: Date, staleAfterSec: number): OpenPrepStatus {
  const generated = Date.parse(artifact.generatedAt);
  const ageSeconds = Number.isFinite(generated) ? Math.max(0, Math.round((now.getTime() - generated) / 1000)) : -1;

  return {
    generatedAt: artifact.generatedAt,
    sessionDate: artifact.sessionDate,
    ageSeconds,
    stale: ageSeconds < 0 || ageSeconds > staleAfterSec,
    regime: artifact.regime.label,
    degradedMode: artifact.runStatus.degradedMode,
    counts: artifact.runStatus.counts,
    topSymbols: artifact.ranked.slice(0, 5).map((entry) => entry.symbol),
  };
}

/**
 * Per-run artifact file names, newest first
 */
export function listRuns(outputDir: string, limit: number): string[] {
  const dir = join(outputDir, "runs");
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .filter((name) => name.startsWith("open_prep_") && name.endsWith(".json"))
    .sort()
    .reverse()
    .slice(0, limit);
}

// ============= Router =============

export interface OpenPrepRouterOptions {
  outputDir: string;
  /** Artifacts older than this are reported as stale */
  staleAfterSec?: number;
}

export function createOpenPrepRouter({ outputDir, staleAfterSec = 15 * 60 }: OpenPrepRouterOptions): Router {
  const router = Router();

  router.get("/latest", (_req: Request, res: Response) => {
    const result = readLatestArtifact(outputDir);
    if (!result.ok) {
      return res.status(result.status).json({ success: false, error: result.error });
    }
    return res.json(result.raw);
  });

  router.get("/latest/:symbol", (req: Request, res: Response) => {
    const result = readLatestArtifact(outputDir);
    if (!result.ok) {
      return res.status(result.status).json({ success: false, error: result.error });
    }
    const record = findRankedRecord(result.raw, req.params.symbol);
    if (!record) {
      return res.status(404).json({ success: false, error: `${req.params.symbol} is not ranked` });
    }
    return res.json({ success: true, generatedAt: result.artifact.generatedAt, candidate: record });
  });

  router.get("/status", (_req: Request, res: Response) => {
    const result = readLatestArtifact(outputDir);
    if (!result.ok) {
      return res.status(result.status).json({ success: false, error: result.error });
    }
    return res.json({ success: true, status: buildStatus(result.artifact, new Date(), staleAfterSec) });
  });

  router.get("/runs", (req: Request, res: Response) => {
    const requested = Number(req.query.limit);
    const limit = Number.isInteger(requested) && requested > 0 ? Math.min(requested, 200) : 20;
    try {
      return res.json({ success: true, runs: listRuns(outputDir, limit) });
    } catch (error) {
      log.error("Cannot list runs", { error: errorMessage(error) });
      return res.status(500).json({ success: false, error: "Cannot list runs" });
    }
  });

  return router;
}
