export type { CommandResult, CommandOptions, GitRunner } from "./runner.ts";
export { createRealGitRunner } from "./runner.ts";

export type { ChurnConfig, ConfigOptions } from "./config.ts";
export { DEFAULT_CONFIG, ConfigurationError, readConfig, clearConfigCache } from "./config.ts";

export type { QueryOptions } from "./queries.ts";
export { isInsideWorkTree, getRemoteUrl, getCurrentBranch, getShortSha, getPorcelainStatus } from "./queries.ts";

export type { CommandContextOptions } from "./commands.ts";
export {
  succeeded,
  describeFailure,
  stagePath,
  commit,
  pushBranch,
  createTag,
  pushTags,
} from "./commands.ts";

export { NotAWorkTreeError, MissingRemoteError, ensureRepository } from "./preflight.ts";
