import type { GitRunner } from "./runner.ts";

export interface ChurnConfig {
  /** Remote that commits and tags are pushed to */
  remote: string;
  /** Directory filler files are written to */
  assetsDir: string;
  /** Milliseconds to wait between iterations */
  delayMs: number;
  /** Stop after this many iterations; 0 runs forever */
  maxIterations: number;
}

export interface ConfigOptions {
  cwd?: string;
}

export const DEFAULT_CONFIG: ChurnConfig = {
  remote: "origin",
  assetsDir: "./assets",
  delayMs: 0,
  maxIterations: 0,
};

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

let cachedConfig: ChurnConfig | null = null;

async function readKey(
  git: GitRunner,
  key: string,
  options: ConfigOptions,
): Promise<string | null> {
  const result = await git.run(["config", "--get", key], { cwd: options.cwd });
  if (result.exitCode !== 0) {
    return null;
  }
  const value = result.stdout.trim();
  return value.length > 0 ? value : null;
}

/** Largest delay a Node timer accepts without clamping it to 1ms */
export const MAX_DELAY_MS = 2_147_483_647;

function parseCount(key: string, raw: string | null, fallback: number, max: number): number {
  if (raw === null) {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(
      `Invalid value for ${key}: '${raw}'. Expected a non-negative integer, e.g.: git config ${key} ${fallback}`,
    );
  }
  const value = Number(raw);
  if (value > max) {
    throw new ConfigurationError(`Invalid value for ${key}: '${raw}'. Must be at most ${max}.`);
  }
  return value;
}

/**
 * Read churn configuration from git config.
 * Result is memoized for the lifetime of the process.
 *
 * Configuration options:
 * - churn.remote: Remote to push to (default: "origin")
 * - churn.assetsDir: Where filler files are written (default: "./assets")
 * - churn.delay: Milliseconds between iterations (default: 0)
 * - churn.maxIterations: Iterations before stopping, 0 for no limit (default: 0)
 */
export async function readConfig(
  git: GitRunner,
  options: ConfigOptions = {},
): Promise<ChurnConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  // One git call at a time
  const remote = await readKey(git, "churn.remote", options);
  const assetsDir = await readKey(git, "churn.assetsDir", options);
  const delay = await readKey(git, "churn.delay", options);
  const maxIterations = await readKey(git, "churn.maxIterations", options);

  cachedConfig = {
    remote: remote ?? DEFAULT_CONFIG.remote,
    assetsDir: assetsDir ?? DEFAULT_CONFIG.assetsDir,
    delayMs: parseCount("churn.delay", delay, DEFAULT_CONFIG.delayMs, MAX_DELAY_MS),
    maxIterations: parseCount(
      "churn.maxIterations",
      maxIterations,
      DEFAULT_CONFIG.maxIterations,
      Number.MAX_SAFE_INTEGER,
    ),
  };
  return cachedConfig;
}

/**
 * Clear the cached config. Useful for testing.
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
