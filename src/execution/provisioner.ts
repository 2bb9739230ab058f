import debug from "debug";
import { toError } from "../errors";
import type {
  CommandRunner,
  EngineConfig,
  PackageLists,
  ProgressEvent,
} from "../types";
import { Logger } from "../utils/logger";
import type { PerformanceMonitor } from "../utils/monitor";
import {
  emptyPackageLists,
  PACKAGE_QUERIES,
  PackageQueryExecutor,
  parsePackageOutput,
} from "./query-executor";
import { SetupCommandExecutor } from "./setup-executor";

const log = debug("box-provision:provisioner");

const SEQUENTIAL_GROUP = "Setup Commands";

export type ProvisionerOptions = {
  config: EngineConfig;
  logger?: Logger;
  showOutput?: boolean;
  monitor?: PerformanceMonitor;
  onProgress?: (event: ProgressEvent) => void;
};

/**
 * Entry point for provisioning a box: runs its setup commands and audits the
 * installed packages, concurrently unless the configuration disables it.
 */
export class Provisioner {
  private readonly runner: CommandRunner;
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly showOutput: boolean;
  private readonly monitor?: PerformanceMonitor;
  private readonly onProgress?: (event: ProgressEvent) => void;

  constructor(runner: CommandRunner, options: ProvisionerOptions) {
    this.runner = runner;
    this.config = options.config;
    this.logger = options.logger ?? new Logger();
    this.showOutput = options.showOutput ?? true;
    this.monitor = options.monitor;
    this.onProgress = options.onProgress;
  }

  /**
   * Runs the setup commands grouped by category. If the grouped run fails,
   * every command is retried one after another.
   */
  async executeSetupCommands(
    boxName: string,
    commands: readonly string[]
  ): Promise<void> {
    if (commands.length === 0) {
      return;
    }

    await this.time("Setup commands", async () => {
      if (!this.config.enableParallel) {
        await this.executeSetupCommandsSequential(boxName, commands);
        return;
      }

      if (this.showOutput) {
        this.logger.info(`Executing setup commands in box '${boxName}'...`);
      }

      const executor = new SetupCommandExecutor(this.runner, boxName, {
        config: this.config,
        logger: this.logger,
        onProgress: this.onProgress,
        showOutput: this.showOutput,
      });

      try {
        await executor.executeParallel(commands);
      } catch (error) {
        this.logger.warn(
          `Parallel execution failed, falling back to sequential: ${toError(error).message}`
        );
        await this.executeSetupCommandsSequential(boxName, commands);
        return;
      }

      if (this.showOutput) {
        this.logger.success("Setup commands completed successfully!");
      }
    });
  }

  async executeSetupCommandsSequential(
    boxName: string,
    commands: readonly string[]
  ): Promise<void> {
    if (commands.length === 0) {
      return;
    }

    if (this.showOutput) {
      this.logger.info(`Executing setup commands in box '${boxName}' sequentially...`);
    }

    const executor = new SetupCommandExecutor(this.runner, boxName, {
      config: this.config,
      logger: this.logger,
      onProgress: this.onProgress,
      showOutput: this.showOutput,
    });
    await executor.executeCommandGroups([
      { commands: [...commands], name: SEQUENTIAL_GROUP, parallel: false },
    ]);

    if (this.showOutput) {
      this.logger.success("Setup commands completed successfully!");
    }
  }

  /**
   * Lists the packages installed in the box per ecosystem. Failed queries are
   * reported as warnings and left `undefined`.
   */
  queryPackages(boxName: string): Promise<PackageLists> {
    return this.time("Package query", () => {
      if (this.config.enableParallel) {
        const executor = new PackageQueryExecutor(this.runner, boxName, {
          config: this.config,
          logger: this.logger,
        });
        return executor.queryAllPackages();
      }
      return this.queryPackagesSequential(boxName);
    });
  }

  private async queryPackagesSequential(boxName: string): Promise<PackageLists> {
    const packageLists = emptyPackageLists();
    for (const query of PACKAGE_QUERIES) {
      try {
        const { stdout } = await this.runner.run(boxName, query.command);
        packageLists[query.name] = parsePackageOutput(query.name, stdout);
      } catch (error) {
        this.logger.warn(
          `failed to query ${query.name} packages: ${toError(error).message}`
        );
      }
    }
    return packageLists;
  }

  private time<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    log(`${operation} started`);
    return this.monitor ? this.monitor.timed(operation, fn) : fn();
  }
}
