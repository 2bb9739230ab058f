import { delimiter, join } from "node:path";
import debug from "debug";
import { execa } from "execa";
import type { CommandOutput, CommandRunner, RunCommandOptions } from "../types";
import { collect } from "./process";

const log = debug("box-provision:runner");

export type ShellRunnerOptions = {
  cwd?: string;
  env?: Record<string, string>;
};

/**
 * Runs commands in a local shell (`/bin/sh` on Unix, `cmd.exe` on Windows).
 * The box name is ignored; useful for hosts that are themselves the sandbox.
 */
export class ShellCommandRunner implements CommandRunner {
  private readonly options: ShellRunnerOptions;

  constructor(options: ShellRunnerOptions = {}) {
    this.options = options;
  }

  run(
    _boxName: string,
    command: string,
    options: RunCommandOptions = {}
  ): Promise<CommandOutput> {
    const cwd = this.options.cwd ?? process.cwd();
    const binPath = join(cwd, "node_modules", ".bin");
    // biome-ignore lint/complexity/useLiteralKeys: ts
    const path = [binPath, process.env["PATH"]].filter(Boolean).join(delimiter);

    log(`sh: ${command} (cwd ${cwd})`);
    const proc = execa(command, {
      cwd,
      env: {
        ...process.env,
        ...this.options.env,
        PATH: path,
      },
      reject: false,
      shell: true,
      signal: options.signal,
      stdin: "ignore",
    });
    return collect(proc, command, options);
  }
}
