import type { GitRunner } from "./runner.ts";
import { getRemoteUrl, isInsideWorkTree, type QueryOptions } from "./queries.ts";

export class NotAWorkTreeError extends Error {
  constructor() {
    super("Not inside a Git work tree. Please run this command in a Git repository.");
    this.name = "NotAWorkTreeError";
  }
}

export class MissingRemoteError extends Error {
  constructor(public remote: string) {
    super(`Remote '${remote}' not found. Please add a remote named '${remote}'.`);
    this.name = "MissingRemoteError";
  }
}

/**
 * Verify the repository can be worked on before the loop starts.
 * Throws NotAWorkTreeError or MissingRemoteError.
 */
export async function ensureRepository(
  git: GitRunner,
  remote: string,
  options?: QueryOptions,
): Promise<void> {
  if (!(await isInsideWorkTree(git, options))) {
    throw new NotAWorkTreeError();
  }

  const url = await getRemoteUrl(git, remote, options);
  if (url === null) {
    throw new MissingRemoteError(remote);
  }
}
