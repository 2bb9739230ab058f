import debug from "debug";
import { categorizeCommands } from "../core/classifier";
import { CommandFailedError, GroupExecutionError, toError } from "../errors";
import type {
  Batch,
  CommandGroup,
  CommandRunner,
  EngineConfig,
  ProgressEvent,
  Task,
} from "../types";
import { Logger } from "../utils/logger";
import { WorkerPool } from "./worker-pool";

const log = debug("box-provision:setup");

const DEFAULT_SETUP_WORKERS = 3;

/** Sourced before every setup command so tools installed by earlier steps are on PATH. */
export const SHELL_PREAMBLE = ". /root/.bashrc >/dev/null 2>&1 || true; ";

export type SetupExecutorOptions = {
  config: EngineConfig;
  showOutput?: boolean;
  /** Overrides `config.setupCommandWorkers`. */
  maxWorkers?: number;
  logger?: Logger;
  onProgress?: (event: ProgressEvent) => void;
};

export class SetupCommandExecutor {
  private readonly runner: CommandRunner;
  private readonly boxName: string;
  private readonly workerPool: WorkerPool;
  private readonly showOutput: boolean;
  private readonly logger: Logger;
  private readonly onProgress?: (event: ProgressEvent) => void;

  constructor(
    runner: CommandRunner,
    boxName: string,
    options: SetupExecutorOptions
  ) {
    const workers = options.maxWorkers ?? options.config.setupCommandWorkers;
    this.runner = runner;
    this.boxName = boxName;
    this.workerPool = new WorkerPool(
      workers > 0 ? workers : DEFAULT_SETUP_WORKERS,
      options.config.timeouts.setupCommandMs
    );
    this.showOutput = options.showOutput ?? false;
    this.logger = options.logger ?? new Logger();
    this.onProgress = options.onProgress;
  }

  categorizeCommands(commands: readonly string[]): CommandGroup[] {
    return categorizeCommands(commands);
  }

  async executeParallel(commands: readonly string[]): Promise<void> {
    if (commands.length === 0) {
      return;
    }
    await this.executeCommandGroups(this.categorizeCommands(commands));
  }

  /**
   * Runs every parallel group as a batch on the worker pool, waits for all of
   * them, then runs the sequential groups in order. The first failure rejects
   * with a `GroupExecutionError`; sequential groups are skipped once any
   * parallel command has failed.
   */
  async executeCommandGroups(groups: readonly CommandGroup[]): Promise<void> {
    if (groups.length === 0) {
      return;
    }

    const parallelGroups = groups.filter((group) => group.parallel);
    const sequentialGroups = groups.filter((group) => !group.parallel);

    if (parallelGroups.length > 0) {
      await this.runParallelGroups(parallelGroups);
    }

    for (const group of sequentialGroups) {
      if (this.showOutput) {
        this.logger.info(`Executing sequential group: ${group.name}`);
      }

      const total = group.commands.length;
      for (const [i, command] of group.commands.entries()) {
        try {
          await this.executeCommand(command, i + 1, total, group.name);
        } catch (error) {
          throw new GroupExecutionError(group.name, i + 1, false, toError(error));
        }
      }

      if (this.showOutput) {
        this.logger.success(`Sequential group '${group.name}' completed`);
      }
    }
  }

  private async runParallelGroups(groups: CommandGroup[]): Promise<void> {
    if (this.showOutput) {
      this.logger.info(`Executing ${groups.length} parallel command groups...`);
    }

    const batches: Batch[] = groups.map((group) => ({
      name: group.name,
      tasks: group.commands.map((command, i) =>
        this.createCommandTask(command, i + 1, group.commands.length, group.name)
      ),
    }));

    const batchResults = await this.workerPool.executeBatchList(batches);

    for (const [position, batch] of batches.entries()) {
      const outcomes = batchResults[position] ?? [];
      const failedAt = outcomes.findIndex((outcome) => outcome !== undefined);
      const failure = outcomes[failedAt];
      if (failure) {
        log(`Batch ${batch.name} failed at command ${failedAt + 1}`);
        throw new GroupExecutionError(batch.name, failedAt + 1, true, failure);
      }
    }

    if (this.showOutput) {
      this.logger.success("All parallel command groups completed");
    }
  }

  private createCommandTask(
    command: string,
    step: number,
    total: number,
    group: string
  ): Task {
    return (signal) => this.executeCommand(command, step, total, group, signal);
  }

  private async executeCommand(
    command: string,
    step: number,
    total: number,
    group: string,
    signal?: AbortSignal
  ): Promise<void> {
    const event: ProgressEvent = { command, group, step, total };
    this.onProgress?.(event);
    log(`[${group}] ${step}/${total}: ${command}`);

    const groupLogger = this.logger.forGroup(group);
    if (this.showOutput) {
      this.logger.progress(event);
    }

    try {
      await this.runner.run(this.boxName, SHELL_PREAMBLE + command, {
        onStderr: this.showOutput ? (chunk) => groupLogger.error(chunk) : undefined,
        onStdout: this.showOutput ? (chunk) => groupLogger.log(chunk) : undefined,
        signal,
      });
    } catch (error) {
      const failure = this.unwrap(command, error);
      if (!this.showOutput) {
        this.reportCapturedOutput(failure, group);
      }
      throw failure;
    }
  }

  /** Reports the failure against the command as written, without the preamble. */
  private unwrap(command: string, error: unknown): Error {
    if (!(error instanceof CommandFailedError)) {
      return toError(error);
    }
    return new CommandFailedError(command, {
      cause: error.cause,
      exitCode: error.exitCode,
      reason: error.reason,
      stderr: error.stderr,
      stdout: error.stdout,
    });
  }

  private reportCapturedOutput(failure: Error, group: string): void {
    if (!(failure instanceof CommandFailedError)) {
      this.logger.error(group, `Command failed: ${failure.message}`);
      return;
    }
    this.logger.error(group, `Command failed: ${failure.command}`);
    if (failure.stderr) {
      this.logger.error(group, `Error output: ${failure.stderr}`);
    }
    if (failure.stdout) {
      this.logger.error(group, `Standard output: ${failure.stdout}`);
    }
  }
}
