import type { CommandResult, GitRunner } from "./runner.ts";

export interface CommandContextOptions {
  cwd?: string;
}

export function succeeded(result: CommandResult): boolean {
  return result.exitCode === 0;
}

/**
 * Summarize a failed command for a log line: the last line git printed,
 * preferring stderr.
 */
export function describeFailure(result: CommandResult): string {
  for (const stream of [result.stderr, result.stdout]) {
    const lines = stream
      .split("\n")
      .map((l) => l.trim())
      .filter((l) => l.length > 0);
    const last = lines[lines.length - 1];
    if (last) {
      return last;
    }
  }
  return `exit code ${result.exitCode}`;
}

export async function stagePath(
  git: GitRunner,
  path: string,
  options?: CommandContextOptions,
): Promise<CommandResult> {
  return git.run(["add", path], { cwd: options?.cwd });
}

export async function commit(
  git: GitRunner,
  message: string,
  options?: CommandContextOptions,
): Promise<CommandResult> {
  return git.run(["commit", "-m", message], { cwd: options?.cwd });
}

export async function pushBranch(
  git: GitRunner,
  remote: string,
  branch: string,
  options?: CommandContextOptions,
): Promise<CommandResult> {
  return git.run(["push", remote, branch], { cwd: options?.cwd });
}

export async function createTag(
  git: GitRunner,
  name: string,
  options?: CommandContextOptions,
): Promise<CommandResult> {
  return git.run(["tag", name], { cwd: options?.cwd });
}

/**
 * Push every local tag to the remote in a single call.
 */
export async function pushTags(
  git: GitRunner,
  remote: string,
  options?: CommandContextOptions,
): Promise<CommandResult> {
  return git.run(["push", remote, "--tags"], { cwd: options?.cwd });
}
