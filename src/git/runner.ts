import { execa } from "execa";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  cwd?: string;
  env?: Record<string, string>;
  stdin?: string;
}

/**
 * Gateway for every git invocation. Callers await each call before issuing the
 * next one; a non-zero exit is reported in the result, never thrown.
 */
export interface GitRunner {
  run(args: string[], options?: CommandOptions): Promise<CommandResult>;
}

export function createRealGitRunner(): GitRunner {
  return {
    async run(args: string[], options?: CommandOptions): Promise<CommandResult> {
      const result = await execa("git", args, {
        cwd: options?.cwd,
        env: options?.env,
        input: options?.stdin,
        reject: false,
      });
      return {
        stdout: result.stdout,
        stderr: result.stderr,
        // Spawn failures and signals leave exitCode undefined
        exitCode: result.exitCode ?? 1,
      };
    },
  };
}
