export type LoggerOptions = {
  quiet?: boolean;
  prefix?: boolean | string;
};

/**
 * A unit of work scheduled by the worker pool. The signal aborts when the
 * pool's deadline fires.
 */
export type Task = (signal: AbortSignal) => Promise<void>;

export type StringTask = (signal: AbortSignal) => Promise<string>;

/** `undefined` means the task succeeded. */
export type TaskOutcome = Error | undefined;

export type StringOutcomes = {
  values: string[];
  errors: TaskOutcome[];
};

export type Batch = {
  name: string;
  tasks: Task[];
};

export type CommandGroup = {
  name: string;
  commands: string[];
  parallel: boolean;
};

export type PackageEcosystem = "apt" | "pip" | "npm" | "yarn" | "pnpm";

export type PackageQuery = {
  name: PackageEcosystem;
  command: string;
};

export type PackageLists = Record<PackageEcosystem, string[] | undefined>;

export type ProgressEvent = {
  group: string;
  step: number;
  total: number;
  command: string;
};

export type EngineTimeouts = {
  taskMs: number;
  setupCommandMs: number;
  packageQueryMs: number;
};

export type EngineConfig = {
  readonly enableParallel: boolean;
  readonly maxWorkers: number;
  readonly setupCommandWorkers: number;
  readonly packageQueryWorkers: number;
  readonly timeouts: Readonly<EngineTimeouts>;
};

export type CommandOutput = {
  stdout: string;
  stderr: string;
};

export interface RunCommandOptions {
  signal?: AbortSignal;
  onStdout?: (chunk: string) => void;
  onStderr?: (chunk: string) => void;
}

/**
 * Runs one command string against a box. Resolves with the captured output,
 * rejects with a `CommandFailedError` when the command does not succeed.
 */
export interface CommandRunner {
  run(
    boxName: string,
    command: string,
    options?: RunCommandOptions
  ): Promise<CommandOutput>;
}
