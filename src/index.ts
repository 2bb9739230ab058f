export { WorkerPool } from './execution/worker-pool';
export {
  SetupCommandExecutor,
  SHELL_PREAMBLE,
} from './execution/setup-executor';
export {
  PackageQueryExecutor,
  PACKAGE_QUERIES,
  parsePackageOutput,
} from './execution/query-executor';
export { Provisioner } from './execution/provisioner';
export {
  categorizeCommands,
  classifyCommand,
  COMMAND_CATEGORIES,
  OTHER_COMMANDS,
} from './core/classifier';
export { parseJsonPackageList, parseLineList } from './core/package-parsers';
export {
  defaultConfig,
  loadConfig,
  DEFAULT_TIMEOUTS,
  MAX_TIMER_DELAY_MS,
  ENV_KEYS,
} from './core/config';
export { ContainerCommandRunner } from './runners/container-runner';
export { ShellCommandRunner } from './runners/shell-runner';
export {
  CommandFailedError,
  GroupExecutionError,
  TaskTimeoutError,
} from './errors';
export { Logger, GroupLogger } from './utils/logger';
export { PerformanceMonitor, formatDuration } from './utils/monitor';

export type { SetupExecutorOptions } from './execution/setup-executor';
export type { QueryExecutorOptions } from './execution/query-executor';
export type { ProvisionerOptions } from './execution/provisioner';
export type { ContainerRunnerOptions } from './runners/container-runner';
export type { ShellRunnerOptions } from './runners/shell-runner';
export type {
  LoggerOptions,
  Task,
  StringTask,
  TaskOutcome,
  StringOutcomes,
  Batch,
  CommandGroup,
  PackageEcosystem,
  PackageQuery,
  PackageLists,
  ProgressEvent,
  EngineTimeouts,
  EngineConfig,
  CommandOutput,
  RunCommandOptions,
  CommandRunner,
} from './types';
