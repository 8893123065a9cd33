import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Clock } from "./clock.ts";
import type { Logger } from "./logger.ts";
import { assetFileName, FILE_TOKEN_MAX } from "./naming.ts";
import type { RandomSource } from "./random.ts";

export const FILE_COUNT_RANGE = { min: 1, max: 11 } as const;
export const FILE_SIZE_KIB_RANGE = { min: 24, max: 48 } as const;

export interface GeneratedFile {
  path: string;
  sizeKiB: number;
}

export type PrepareResult = { ok: true } | { ok: false; reason: string };

export interface AssetDeps {
  random: RandomSource;
  clock: Clock;
  log: Logger;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Make sure the asset directory exists. Existing contents are left alone.
 */
export async function prepareAssetDir(dir: string): Promise<PrepareResult> {
  try {
    await mkdir(dir, { recursive: true });
    return { ok: true };
  } catch (err) {
    return { ok: false, reason: errorMessage(err) };
  }
}

/**
 * Write a random number of random-sized files of random bytes into `dir`.
 * Files that fail to write are logged and left out of the result.
 */
export async function generateAssets(dir: string, deps: AssetDeps): Promise<GeneratedFile[]> {
  const { random, clock, log } = deps;
  const count = random.int(FILE_COUNT_RANGE.min, FILE_COUNT_RANGE.max);
  log.info(`Creating ${count} random files...`);

  const created: GeneratedFile[] = [];
  for (let i = 0; i < count; i++) {
    const sizeKiB = random.int(FILE_SIZE_KIB_RANGE.min, FILE_SIZE_KIB_RANGE.max);
    const path = join(dir, assetFileName(clock.epochNanos(), random.int(0, FILE_TOKEN_MAX)));

    try {
      await writeFile(path, random.bytes(sizeKiB * 1024));
      log.info(`  Created ${path} (${sizeKiB} KB)`);
      created.push({ path, sizeKiB });
    } catch (err) {
      log.warn(`  Could not create file ${path}: ${errorMessage(err)}. Skipping it.`);
    }
  }

  return created;
}
