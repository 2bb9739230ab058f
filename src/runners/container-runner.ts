import debug from "debug";
import { execa } from "execa";
import type { CommandOutput, CommandRunner, RunCommandOptions } from "../types";
import { collect } from "./process";

const log = debug("box-provision:runner");

export type ContainerRunnerOptions = {
  /** Container engine CLI, e.g. `docker` or `podman`. */
  binary?: string;
  /** Shell used inside the box. */
  shell?: string;
};

/**
 * Runs commands inside a running container with `<binary> exec <box> <shell> -c`.
 */
export class ContainerCommandRunner implements CommandRunner {
  private readonly binary: string;
  private readonly shell: string;

  constructor(options: ContainerRunnerOptions = {}) {
    this.binary = options.binary ?? "docker";
    this.shell = options.shell ?? "bash";
  }

  run(
    boxName: string,
    command: string,
    options: RunCommandOptions = {}
  ): Promise<CommandOutput> {
    const args = ["exec", boxName, this.shell, "-c", command];
    log(`${this.binary} ${args.join(" ")}`);

    const proc = execa(this.binary, args, {
      reject: false,
      signal: options.signal,
      stdin: "ignore",
    });
    return collect(proc, command, options);
  }
}
