// Environment helpers for the worker and API server (process.env only)

export function getEnvVar(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

export function getNodeEnv(): string | undefined {
  return getEnvVar("NODE_ENV");
}

export function isTestEnv(): boolean {
  return (getNodeEnv() || "").toLowerCase() === "test" || getEnvVar("VITEST") !== undefined;
}

export function isProductionEnv(): boolean {
  return (getNodeEnv() || "").toLowerCase() === "production";
}

/**
 * Parse an integer env var. Returns the fallback when unset; throws when set but malformed,
 * so a typo in deployment config fails at startup instead of silently using a default.
 */
export function getEnvInt(key: string, fallback: number): number {
  const raw = getEnvVar(key);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${key} must be an integer, got "${raw}"`);
  }
  return parsed;
}
