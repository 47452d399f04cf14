import { execa } from "execa";
import { HookError } from "./errors.js";

export type HookPhase = "pre-init" | "post-init";

export interface HookResult {
  command: string;
  output: string;
}

/**
 * Runs a hook command through the shell in `cwd`. A non-zero exit, or a
 * command that cannot be started, throws a {@link HookError} carrying the
 * combined output.
 */
export async function runHook(command: string, cwd: string, phase: HookPhase): Promise<HookResult> {
  const result = await execa(command, { shell: true, cwd, reject: false, all: true });
  const output = (result.all ?? "").trim();

  if (result.failed || result.exitCode !== 0) {
    const kind = phase === "pre-init" ? "PreInitFailed" : "PostInitFailed";
    const exitCode = typeof result.exitCode === "number" ? result.exitCode : undefined;
    throw new HookError(kind, command, exitCode, output);
  }

  return { command, output };
}
