/**
 * Weight Sets
 *
 * Named, versioned scoring weights persisted as config/weights/<name>.json.
 * Weights are in score points: a fully saturated component contributes about
 * weight * ln(2) before the concentration cap.
 *
 * A requested set that is missing or malformed is a ConfigurationError; the
 * only implicit fallback is the built-in "default" set when no file exists.
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { writeFileAtomic } from "../utils/atomicWrite.js";
import { createLogger } from "../utils/logger.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { formatZodIssues } from "./pipelineConfig.js";
import {
  SIGNAL_COMPONENT_KEYS,
  type ComponentKey,
  type WeightMap,
  type WeightSet,
} from "./types.js";

const log = createLogger("WeightSets");

export const DEFAULT_WEIGHTS: WeightMap = Object.freeze({
  gap: 30,
  gapSectorRelative: 10,
  relativeVolume: 25,
  momentum: 10,
  macro: 15,
  news: 20,
  extHours: 10,
  earningsBmo: 10,
  freshness: 8,
  atrRank: 8,
  riskPenalty: 40,
  counterTrendPenalty: 15,
});

export const DEFAULT_WEIGHT_SET: WeightSet = Object.freeze({
  name: "default",
  version: 1,
  weights: DEFAULT_WEIGHTS,
});

/** Inclusive bounds per weight */
export const WEIGHT_BOUNDS: Readonly<Record<ComponentKey, readonly [number, number]>> = {
  gap: [0, 80],
  gapSectorRelative: [0, 40],
  relativeVolume: [0, 80],
  momentum: [0, 40],
  macro: [0, 50],
  news: [0, 60],
  extHours: [0, 40],
  earningsBmo: [0, 40],
  freshness: [0, 30],
  atrRank: [0, 30],
  riskPenalty: [0, 150],
  counterTrendPenalty: [0, 60],
};

/** Sum of signal (non-penalty) weights must land in this range */
export const SIGNAL_WEIGHT_SUM_RANGE: readonly [number, number] = [20, 400];

const WEIGHT_SET_NAME = /^[a-z0-9][a-z0-9_-]{0,63}$/i;

function bounded(key: ComponentKey) {
  const [lo, hi] = WEIGHT_BOUNDS[key];
  return z.number().finite().min(lo).max(hi);
}

const WeightMapSchema = z
  .object({
    gap: bounded("gap"),
    gapSectorRelative: bounded("gapSectorRelative"),
    relativeVolume: bounded("relativeVolume"),
    momentum: bounded("momentum"),
    macro: bounded("macro"),
    news: bounded("news"),
    extHours: bounded("extHours"),
    earningsBmo: bounded("earningsBmo"),
    freshness: bounded("freshness"),
    atrRank: bounded("atrRank"),
    riskPenalty: bounded("riskPenalty"),
    counterTrendPenalty: bounded("counterTrendPenalty"),
  })
  .strict()
  .superRefine((weights, ctx) => {
    const signalSum = SIGNAL_COMPONENT_KEYS.reduce((sum, key) => sum + weights[key], 0);
    const [lo, hi] = SIGNAL_WEIGHT_SUM_RANGE;
    if (signalSum < lo || signalSum > hi) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `signal weight sum ${signalSum} outside [${lo}, ${hi}]`,
      });
    }
  });

export const WeightSetSchema = z.object({
  name: z.string().regex(WEIGHT_SET_NAME, "weight set names are alphanumeric with - or _"),
  version: z.number().int().min(1),
  weights: WeightMapSchema,
});

/**
 * Issues with a weight map, empty when valid
 */
export function validateWeights(weights: unknown): string[] {
  const result = WeightMapSchema.safeParse(weights);
  return result.success ? [] : formatZodIssues(result.error);
}

/**
 * @throws ConfigurationError when the raw value is not a valid weight set
 */
export function parseWeightSet(raw: unknown, source = "weight set"): WeightSet {
  const result = WeightSetSchema.safeParse(raw);
  if (!result.success) {
    const details = formatZodIssues(result.error);
    throw new ConfigurationError(`Invalid ${source}: ${details.join("; ")}`, details);
  }
  return Object.freeze({
    name: result.data.name,
    version: result.data.version,
    weights: Object.freeze(result.data.weights),
  });
}

function weightSetPath(name: string, dir: string): string {
  if (!WEIGHT_SET_NAME.test(name)) {
    throw new ConfigurationError(`Invalid weight set name "${name}"`);
  }
  return join(dir, `${name}.json`);
}

/**
 * Load a named weight set from `dir`.
 *
 * @throws ConfigurationError when the set is missing (other than "default") or malformed
 */
export function loadWeightSet(name: string, dir: string): WeightSet {
  const path = weightSetPath(name, dir);

  if (!existsSync(path)) {
    if (name === DEFAULT_WEIGHT_SET.name) {
      log.info("No default weight file, using built-in weights", { dir });
      return DEFAULT_WEIGHT_SET;
    }
    throw new ConfigurationError(`Weight set "${name}" not found at ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Cannot read weight set ${path}: ${errorMessage(error)}`);
  }

  const weightSet = parseWeightSet(raw, `weight set ${path}`);
  if (weightSet.name !== name) {
    throw new ConfigurationError(
      `Weight set file ${path} declares name "${weightSet.name}", expected "${name}"`
    );
  }
  return weightSet;
}

/**
 * Validate and persist a weight set (atomic write)
 */
export function saveWeightSet(weightSet: WeightSet, dir: string): string {
  const validated = parseWeightSet(weightSet);
  const path = weightSetPath(validated.name, dir);
  writeFileAtomic(path, `${JSON.stringify(validated, null, 2)}\n`);
  log.info("Saved weight set", { name: validated.name, version: validated.version, path });
  return path;
}
