import { resolve } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import {
  commit,
  createTag,
  describeFailure,
  pushBranch,
  pushTags,
  stagePath,
  succeeded,
} from "../git/commands.ts";
import { getCurrentBranch, getPorcelainStatus, getShortSha } from "../git/queries.ts";
import type { GitRunner } from "../git/runner.ts";
import { generateAssets, prepareAssetDir } from "./assets.ts";
import { commitTimestamp, type Clock } from "./clock.ts";
import type { Logger } from "./logger.ts";
import { commitMessage, tagName } from "./naming.ts";
import type { RandomSource } from "./random.ts";

export const TAG_COUNT_RANGE = { min: 1, max: 7 } as const;
export const TAG_DIGITS = 24;

export interface LoopContext {
  git: GitRunner;
  random: RandomSource;
  clock: Clock;
  log: Logger;
  remote: string;
  assetsDir: string;
  /** Repository directory; defaults to the process working directory */
  cwd?: string;
}

export type IterationOutcome = "continue" | "fatal";

/** Where an iteration stopped. */
export type IterationStage =
  | "prepare-failed"
  | "no-files"
  | "stage-failed"
  | "commit-failed"
  | "detached-head"
  | "push-failed"
  | "completed";

export interface IterationReport {
  outcome: IterationOutcome;
  stage: IterationStage;
  filesCreated: number;
  commitMessage?: string;
  branch?: string;
  tagsCreated: string[];
  /** Whether a tag push was attempted and succeeded */
  tagsPushed: boolean;
}

export interface LoopOptions {
  /** Stop after this many iterations; 0 runs forever */
  maxIterations?: number;
  /** Pause between iterations */
  delayMs?: number;
}

export interface LoopResult {
  iterations: number;
  stoppedBy: "fatal" | "limit";
}

function report(
  stage: IterationStage,
  fields: Partial<Omit<IterationReport, "stage" | "outcome">> = {},
): IterationReport {
  return {
    outcome: stage === "detached-head" ? "fatal" : "continue",
    stage,
    filesCreated: fields.filesCreated ?? 0,
    commitMessage: fields.commitMessage,
    branch: fields.branch,
    tagsCreated: fields.tagsCreated ?? [],
    tagsPushed: fields.tagsPushed ?? false,
  };
}

/**
 * Create this round's tags locally. Tags that cannot be named or created are
 * logged and skipped without stopping the batch.
 */
async function createTags(ctx: LoopContext): Promise<string[]> {
  const { git, random, log, cwd } = ctx;
  const count = random.int(TAG_COUNT_RANGE.min, TAG_COUNT_RANGE.max);
  log.info(`Creating ${count} random tags...`);

  const created: string[] = [];
  for (let i = 0; i < count; i++) {
    const digits = random.digits(TAG_DIGITS);
    if (!digits) {
      log.warn("Could not generate random digits for tag name. Skipping tag creation.");
      continue;
    }

    const name = tagName(digits);
    log.info(`  Creating tag: ${name}`);
    const result = await createTag(git, name, { cwd });
    if (succeeded(result)) {
      created.push(name);
    } else {
      log.warn(
        `  Could not create local tag ${name} (${describeFailure(result)}). Skipping.`,
      );
    }
  }
  return created;
}

/**
 * Run one pass: generate files, commit, push, then tag and push tags.
 * Every failure ends the pass early with outcome "continue", except a
 * missing current branch, which is "fatal".
 */
export async function runIteration(ctx: LoopContext): Promise<IterationReport> {
  const { git, log, cwd, remote, assetsDir } = ctx;
  const dir = cwd ? resolve(cwd, assetsDir) : assetsDir;

  const prepared = await prepareAssetDir(dir);
  if (!prepared.ok) {
    log.error(`Could not create directory ${assetsDir}: ${prepared.reason}. Skipping iteration.`);
    return report("prepare-failed");
  }

  const files = await generateAssets(dir, ctx);
  const filesCreated = files.length;
  if (filesCreated === 0) {
    log.info("No files were successfully created. Skipping commit and push.");
    return report("no-files");
  }

  log.info("Adding files to git...");
  const staged = await stagePath(git, assetsDir, { cwd });
  if (!succeeded(staged)) {
    log.error(`git add failed (${describeFailure(staged)}). Skipping commit and push.`);
    return report("stage-failed", { filesCreated });
  }

  const timestamp = commitTimestamp(ctx.clock);
  if (timestamp.resolution === "s") {
    log.warn("Could not get millisecond timestamp. Using second timestamp.");
  }
  const message = commitMessage(timestamp.value);
  log.info(`Committing with message: ${message}`);

  const committed = await commit(git, message, { cwd });
  if (!succeeded(committed)) {
    log.warn(
      `git commit failed (${describeFailure(committed)}). Skipping push.`,
    );
    const status = await getPorcelainStatus(git, { cwd });
    if (status.length > 0) {
      log.warn("  ... git status indicates changes, but commit failed. Investigate manually.");
    } else {
      log.warn("  ... git status indicates nothing to commit.");
    }
    return report("commit-failed", { filesCreated, commitMessage: message });
  }

  const branch = await getCurrentBranch(git, { cwd });
  if (!branch) {
    log.error("Not on a branch. Cannot push commits or tags. Breaking loop.");
    return report("detached-head", { filesCreated, commitMessage: message });
  }

  log.info(`Pushing commit to ${remote}/${branch}...`);
  const pushed = await pushBranch(git, remote, branch, { cwd });
  if (!succeeded(pushed)) {
    log.error(
      `git push failed (${describeFailure(pushed)}). Check network, permissions, conflicts, etc. Continuing loop.`,
    );
    return report("push-failed", { filesCreated, commitMessage: message, branch });
  }
  const sha = await getShortSha(git, "HEAD", { cwd });
  log.success(
    sha ? `Pushed commit ${sha} to ${remote}/${branch}` : `Pushed commit to ${remote}/${branch}`,
  );

  const tagsCreated = await createTags(ctx);
  let tagsPushed = false;
  if (tagsCreated.length > 0) {
    log.info("Pushing tags...");
    const tagPush = await pushTags(git, remote, { cwd });
    tagsPushed = succeeded(tagPush);
    if (tagsPushed) {
      log.success("Tags pushed successfully.");
    } else {
      log.error(
        `git push --tags failed (${describeFailure(tagPush)}). Check network, permissions, conflicts, etc. Continuing loop.`,
      );
    }
  } else {
    log.info("No new tags were successfully created locally this iteration to push.");
  }

  return report("completed", {
    filesCreated,
    commitMessage: message,
    branch,
    tagsCreated,
    tagsPushed,
  });
}

/**
 * Run iterations back to back until one is fatal or the iteration limit is
 * reached.
 */
export async function runLoop(ctx: LoopContext, options: LoopOptions = {}): Promise<LoopResult> {
  const maxIterations = options.maxIterations ?? 0;
  const delayMs = options.delayMs ?? 0;
  let iterations = 0;

  for (;;) {
    ctx.log.info(`--- ${new Date().toString()} - Starting new iteration ---`);
    const result = await runIteration(ctx);
    iterations++;

    if (result.outcome === "fatal") {
      return { iterations, stoppedBy: "fatal" };
    }
    if (result.stage === "completed") {
      ctx.log.info("--- Iteration finished ---");
    }
    if (maxIterations > 0 && iterations >= maxIterations) {
      return { iterations, stoppedBy: "limit" };
    }
    if (delayMs > 0) {
      await sleep(delayMs);
    }
  }
}
