import type { ExecaChildProcess } from "execa";
import { CommandFailedError } from "../errors";
import type { CommandOutput, RunCommandOptions } from "../types";

/**
 * Forwards a child's output to the option callbacks and turns an
 * unsuccessful exit into a `CommandFailedError`. The process must be started
 * with `reject: false`.
 */
export async function collect(
  proc: ExecaChildProcess,
  command: string,
  options: RunCommandOptions
): Promise<CommandOutput> {
  const { onStdout, onStderr } = options;
  if (onStdout) {
    proc.stdout?.on("data", (data: Buffer) => onStdout(data.toString()));
  }
  if (onStderr) {
    proc.stderr?.on("data", (data: Buffer) => onStderr(data.toString()));
  }

  const result = await proc;
  const stdout = result.stdout ?? "";
  const stderr = result.stderr ?? "";

  if (result.isCanceled) {
    throw new CommandFailedError(command, {
      reason: "cancelled",
      stderr,
      stdout,
    });
  }
  if (result.failed) {
    throw new CommandFailedError(command, {
      exitCode: result.exitCode,
      stderr,
      stdout,
    });
  }

  return { stderr, stdout };
}
