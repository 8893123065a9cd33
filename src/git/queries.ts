import type { GitRunner } from "./runner.ts";

export interface QueryOptions {
  cwd?: string;
}

export async function isInsideWorkTree(
  git: GitRunner,
  options?: QueryOptions,
): Promise<boolean> {
  const result = await git.run(["rev-parse", "--is-inside-work-tree"], {
    cwd: options?.cwd,
  });
  return result.exitCode === 0 && result.stdout.trim() === "true";
}

/**
 * Look up the URL of a registered remote.
 * Returns null when no remote by that name exists.
 */
export async function getRemoteUrl(
  git: GitRunner,
  remote: string,
  options?: QueryOptions,
): Promise<string | null> {
  const result = await git.run(["remote", "get-url", remote], {
    cwd: options?.cwd,
  });
  if (result.exitCode !== 0) {
    return null;
  }
  return result.stdout.trim();
}

/**
 * Get the current branch name.
 * Returns null in detached HEAD state or when the query fails.
 */
export async function getCurrentBranch(
  git: GitRunner,
  options?: QueryOptions,
): Promise<string | null> {
  const result = await git.run(["branch", "--show-current"], {
    cwd: options?.cwd,
  });
  const branch = result.stdout.trim();
  if (result.exitCode !== 0 || !branch) {
    return null;
  }
  return branch;
}

/**
 * Abbreviated SHA of a ref, or null when it cannot be resolved.
 */
export async function getShortSha(
  git: GitRunner,
  ref: string,
  options?: QueryOptions,
): Promise<string | null> {
  const result = await git.run(["rev-parse", "--short", ref], {
    cwd: options?.cwd,
  });
  const sha = result.stdout.trim();
  if (result.exitCode !== 0 || !sha) {
    return null;
  }
  return sha;
}

export async function getPorcelainStatus(
  git: GitRunner,
  options?: QueryOptions,
): Promise<string[]> {
  const result = await git.run(["status", "--porcelain"], {
    cwd: options?.cwd,
  });
  return result.stdout.split("\n").filter((l) => l.length > 0);
}
