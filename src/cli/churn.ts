import type { Clock } from "../core/clock.ts";
import type { Logger } from "../core/logger.ts";
import { runLoop } from "../core/loop.ts";
import type { RandomSource } from "../core/random.ts";
import {
  ConfigurationError,
  MissingRemoteError,
  NotAWorkTreeError,
  ensureRepository,
  readConfig,
  type GitRunner,
} from "../git/index.ts";

export interface ChurnDeps {
  git: GitRunner;
  random: RandomSource;
  clock: Clock;
  log: Logger;
  /** Receives startup failures; defaults to console.error */
  reportError?: (message: string) => void;
  cwd?: string;
}

/**
 * Check the repository, then generate activity until the loop stops.
 * Resolves with the process exit code: 1 when startup fails, 0 otherwise.
 */
export async function runChurn(deps: ChurnDeps): Promise<number> {
  const { git, cwd } = deps;
  const reportError = deps.reportError ?? ((message: string) => console.error(message));

  try {
    const config = await readConfig(git, { cwd });
    await ensureRepository(git, config.remote, { cwd });

    const result = await runLoop(
      {
        git,
        random: deps.random,
        clock: deps.clock,
        log: deps.log,
        remote: config.remote,
        assetsDir: config.assetsDir,
        cwd,
      },
      { maxIterations: config.maxIterations, delayMs: config.delayMs },
    );

    if (result.stoppedBy === "limit") {
      deps.log.success(`Stopped after ${result.iterations} iteration(s)`);
    }
    return 0;
  } catch (error) {
    if (error instanceof NotAWorkTreeError || error instanceof MissingRemoteError) {
      reportError(`✗ Error: ${error.message}`);
      return 1;
    }

    if (error instanceof ConfigurationError) {
      reportError(`✗ Configuration error:\n${error.message}`);
      return 1;
    }

    throw error;
  }
}
