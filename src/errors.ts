/**
 * Raised by a command runner when a command exits unsuccessfully or cannot be
 * started.
 */
export class CommandFailedError extends Error {
  readonly command: string;
  readonly reason: string;
  readonly exitCode?: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    command: string,
    details: {
      exitCode?: number;
      stdout?: string;
      stderr?: string;
      reason?: string;
      cause?: unknown;
    } = {}
  ) {
    const reason =
      details.reason ??
      (details.exitCode === undefined
        ? "did not complete"
        : `exit code ${details.exitCode}`);
    super(`command failed: ${command}: ${reason}`, { cause: details.cause });
    this.name = "CommandFailedError";
    this.command = command;
    this.reason = reason;
    this.exitCode = details.exitCode;
    this.stdout = details.stdout ?? "";
    this.stderr = details.stderr ?? "";
  }
}

/**
 * Recorded by the worker pool for every task that had not reported back when
 * the deadline fired.
 */
export class TaskTimeoutError extends Error {
  readonly index: number;
  readonly timeoutMs: number;

  constructor(index: number, timeoutMs: number) {
    super("task execution timeout");
    this.name = "TaskTimeoutError";
    this.index = index;
    this.timeoutMs = timeoutMs;
  }
}

export class GroupExecutionError extends Error {
  readonly group: string;
  /** 1-based position of the failing command inside its group. */
  readonly step: number;
  readonly parallel: boolean;

  constructor(group: string, step: number, parallel: boolean, cause: Error) {
    const kind = parallel ? "parallel" : "sequential";
    super(
      `${kind} command group '${group}', command ${step} failed: ${cause.message}`,
      { cause }
    );
    this.name = "GroupExecutionError";
    this.group = group;
    this.step = step;
    this.parallel = parallel;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
