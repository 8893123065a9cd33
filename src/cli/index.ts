#!/usr/bin/env tsx
import { systemClock } from "../core/clock.ts";
import { cryptoRandom } from "../core/random.ts";
import { createRealGitRunner } from "../git/index.ts";
import { runChurn } from "./churn.ts";
import { consoleLogger } from "./output.ts";

try {
  const code = await runChurn({
    git: createRealGitRunner(),
    random: cryptoRandom,
    clock: systemClock,
    log: consoleLogger,
  });
  process.exit(code);
} catch (error) {
  if (error instanceof Error) {
    console.error(`✗ Error: ${error.message}`);
  } else {
    console.error("✗ An unexpected error occurred");
  }
  process.exit(1);
}
