import debug from "debug";
import { parseJsonPackageList, parseLineList } from "../core/package-parsers";
import type {
  CommandRunner,
  EngineConfig,
  PackageEcosystem,
  PackageLists,
  PackageQuery,
  StringTask,
} from "../types";
import { Logger } from "../utils/logger";
import { WorkerPool } from "./worker-pool";

const log = debug("box-provision:query");

/** Read-only inspections of the packages installed in a box, one per ecosystem. */
export const PACKAGE_QUERIES: readonly PackageQuery[] = [
  {
    command:
      "dpkg-query -W -f='${Package}=${Version}\\n' $(apt-mark showmanual 2>/dev/null || true) 2>/dev/null | sort",
    name: "apt",
  },
  {
    command: "python3 -m pip freeze 2>/dev/null || pip3 freeze 2>/dev/null || true",
    name: "pip",
  },
  { command: "npm list -g --depth=0 --json 2>/dev/null || true", name: "npm" },
  {
    command:
      "yarn global list --depth=0 2>/dev/null | sed -n 's/^[[:space:]]*[├└]──[[:space:]]*//p' | sed 's/ (.*)//'",
    name: "yarn",
  },
  { command: "pnpm ls -g --depth=0 --json 2>/dev/null || true", name: "pnpm" },
];

const PARSERS: Record<PackageEcosystem, (output: string) => string[]> = {
  apt: parseLineList,
  npm: parseJsonPackageList,
  pip: parseLineList,
  pnpm: parseJsonPackageList,
  yarn: parseLineList,
};

export function parsePackageOutput(
  ecosystem: PackageEcosystem,
  output: string
): string[] {
  return PARSERS[ecosystem](output);
}

export function emptyPackageLists(): PackageLists {
  return {
    apt: undefined,
    npm: undefined,
    pip: undefined,
    pnpm: undefined,
    yarn: undefined,
  };
}

export type QueryExecutorOptions = {
  config: EngineConfig;
  logger?: Logger;
};

export class PackageQueryExecutor {
  private readonly runner: CommandRunner;
  private readonly boxName: string;
  private readonly workerPool: WorkerPool;
  private readonly logger: Logger;

  constructor(
    runner: CommandRunner,
    boxName: string,
    options: QueryExecutorOptions
  ) {
    this.runner = runner;
    this.boxName = boxName;
    this.workerPool = new WorkerPool(
      options.config.packageQueryWorkers,
      options.config.timeouts.packageQueryMs
    );
    this.logger = options.logger ?? new Logger();
  }

  /**
   * Runs every package query concurrently. A failed query is reported as a
   * warning and leaves its ecosystem `undefined`; the call itself never
   * rejects.
   */
  async queryAllPackages(): Promise<PackageLists> {
    const tasks = PACKAGE_QUERIES.map((query) => this.createQueryTask(query));
    const { values, errors } = await this.workerPool.executeStringTasks(tasks);

    const packageLists = emptyPackageLists();
    PACKAGE_QUERIES.forEach((query, i) => {
      const error = errors[i];
      if (error) {
        this.logger.warn(
          `failed to query ${query.name} packages: ${error.message}`
        );
        return;
      }
      packageLists[query.name] = parsePackageOutput(query.name, values[i] ?? "");
      log(`${query.name}: ${packageLists[query.name]?.length ?? 0} packages`);
    });

    return packageLists;
  }

  private createQueryTask(query: PackageQuery): StringTask {
    return async (signal) => {
      const { stdout } = await this.runner.run(this.boxName, query.command, {
        signal,
      });
      return stdout;
    };
  }
}
