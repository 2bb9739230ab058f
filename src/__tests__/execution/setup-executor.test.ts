import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { defaultConfig } from "../../core/config";
import {
  CommandFailedError,
  GroupExecutionError,
  TaskTimeoutError,
} from "../../errors";
import {
  SetupCommandExecutor,
  SHELL_PREAMBLE,
} from "../../execution/setup-executor";
import type { EngineConfig, ProgressEvent } from "../../types";
import { Logger } from "../../utils/logger";
import { FakeRunner } from "../helpers/fake-runner";

const quiet = () => new Logger({ quiet: true });

describe("SetupCommandExecutor", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
    vi.spyOn(console, "log").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const createExecutor = (
    runner: FakeRunner,
    options: { config?: EngineConfig; maxWorkers?: number; showOutput?: boolean } = {}
  ) =>
    new SetupCommandExecutor(runner, "box_demo", {
      config: options.config ?? defaultConfig(),
      logger: quiet(),
      maxWorkers: options.maxWorkers,
      showOutput: options.showOutput,
    });

  it("does nothing for an empty command list", async () => {
    const runner = new FakeRunner();
    const executor = createExecutor(runner);

    await executor.executeParallel([]);
    await executor.executeCommandGroups([]);

    expect(runner.calls).toEqual([]);
  });

  it("runs every command in the box behind the shell preamble", async () => {
    const runner = new FakeRunner();
    await createExecutor(runner).executeParallel(["echo hello"]);

    expect(runner.calls).toEqual([
      { boxName: "box_demo", command: `${SHELL_PREAMBLE}echo hello` },
    ]);
  });

  it("classifies commands the same way as the classifier", () => {
    const executor = createExecutor(new FakeRunner());
    expect(executor.categorizeCommands(["npm ci", "apt update"])).toEqual([
      { commands: ["apt update"], name: "APT Packages", parallel: false },
      { commands: ["npm ci"], name: "NPM Packages", parallel: true },
    ]);
  });

  it("runs parallel groups before sequential ones", async () => {
    const runner = new FakeRunner();
    await createExecutor(runner).executeCommandGroups([
      { commands: ["apt install -y git"], name: "APT Packages", parallel: false },
      { commands: ["pip install flask"], name: "Python Packages", parallel: true },
      { commands: ["echo done"], name: "Other Commands", parallel: false },
    ]);

    expect(runner.commands).toEqual([
      "pip install flask",
      "apt install -y git",
      "echo done",
    ]);
  });

  it("stops a sequential group at its first failure", async () => {
    const runner = new FakeRunner((command) =>
      command === "exit-fail" ? { exitCode: 1 } : {}
    );

    const run = createExecutor(runner).executeCommandGroups([
      {
        commands: ["echo one", "exit-fail", "echo three"],
        name: "Other Commands",
        parallel: false,
      },
      { commands: ["echo later"], name: "Later", parallel: false },
    ]);

    await expect(run).rejects.toThrow(
      "sequential command group 'Other Commands', command 2 failed: command failed: exit-fail: exit code 1"
    );
    expect(runner.commands).toEqual(["echo one", "exit-fail"]);
  });

  it("describes the failing group and step on the error", async () => {
    const runner = new FakeRunner((command) =>
      command === "apt install -y missing" ? { exitCode: 100, stderr: "E: not found" } : {}
    );

    const error = await createExecutor(runner)
      .executeParallel(["apt update", "apt install -y missing"])
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GroupExecutionError);
    if (error instanceof GroupExecutionError) {
      expect(error.group).toBe("APT Packages");
      expect(error.step).toBe(2);
      expect(error.parallel).toBe(false);
      expect(error.cause).toBeInstanceOf(CommandFailedError);
      if (error.cause instanceof CommandFailedError) {
        expect(error.cause.command).toBe("apt install -y missing");
        expect(error.cause.exitCode).toBe(100);
        expect(error.cause.stderr).toBe("E: not found");
      }
    }
  });

  it("lets sibling batches finish but skips sequential groups after a parallel failure", async () => {
    const runner = new FakeRunner((command) => {
      if (command === "pip install broken") {
        return { exitCode: 1 };
      }
      if (command === "npm install -g slow") {
        return { delayMs: 30 };
      }
      return {};
    });

    const run = createExecutor(runner).executeCommandGroups([
      {
        commands: ["pip install flask", "pip install broken"],
        name: "Python Packages",
        parallel: true,
      },
      { commands: ["npm install -g slow"], name: "NPM Packages", parallel: true },
      { commands: ["echo after"], name: "Other Commands", parallel: false },
    ]);

    await expect(run).rejects.toThrow(
      "parallel command group 'Python Packages', command 2 failed: command failed: pip install broken: exit code 1"
    );
    expect(runner.commands).toContain("npm install -g slow");
    expect(runner.commands).not.toContain("echo after");
  });

  it("reports a failure in a parallel group that shares its name with another", async () => {
    const runner = new FakeRunner((command) =>
      command === "pip install broken" ? { exitCode: 1 } : {}
    );

    const run = createExecutor(runner).executeCommandGroups([
      { commands: ["pip install broken"], name: "Python Packages", parallel: true },
      { commands: ["pip install flask"], name: "Python Packages", parallel: true },
    ]);

    await expect(run).rejects.toThrow(
      "parallel command group 'Python Packages', command 1 failed: command failed: pip install broken: exit code 1"
    );
    expect(runner.commands).toContain("pip install flask");
  });

  it("reports a parallel command that outlives the deadline as a timeout", async () => {
    const config: EngineConfig = {
      ...defaultConfig(),
      timeouts: { packageQueryMs: 1000, setupCommandMs: 40, taskMs: 1000 },
    };
    const runner = new FakeRunner((command) =>
      command === "pip install huge" ? { delayMs: 1000 } : {}
    );

    const error = await createExecutor(runner, { config })
      .executeParallel(["pip install huge"])
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GroupExecutionError);
    if (error instanceof GroupExecutionError) {
      expect(error.parallel).toBe(true);
      expect(error.cause).toBeInstanceOf(TaskTimeoutError);
    }
  });

  it("limits a parallel batch to the configured worker count", async () => {
    const runner = new FakeRunner(() => ({ delayMs: 20 }));
    await createExecutor(runner, { maxWorkers: 1 }).executeParallel([
      "pip install a",
      "pip install b",
      "pip install c",
    ]);

    expect(runner.maxActive).toBe(1);
    expect(runner.commands).toEqual(["pip install a", "pip install b", "pip install c"]);
  });

  it("emits progress for every command", async () => {
    const events: ProgressEvent[] = [];
    const executor = new SetupCommandExecutor(new FakeRunner(), "box_demo", {
      config: defaultConfig(),
      logger: quiet(),
      onProgress: (event) => events.push(event),
    });

    await executor.executeParallel(["pip install a", "pip install b", "echo done"]);

    expect(events).toEqual([
      { command: "pip install a", group: "Python Packages", step: 1, total: 2 },
      { command: "pip install b", group: "Python Packages", step: 2, total: 2 },
      { command: "echo done", group: "Other Commands", step: 1, total: 1 },
    ]);
  });

  it("logs captured output of a failed command when output is hidden", async () => {
    const runner = new FakeRunner(() => ({
      exitCode: 2,
      stderr: "disk full",
      stdout: "partial",
    }));

    await expect(createExecutor(runner).executeParallel(["make install"])).rejects.toThrow(
      GroupExecutionError
    );

    const lines = vi.mocked(console.error).mock.calls.map((c) => String(c[0]));
    expect(lines.some((line) => line.includes("Command failed: make install"))).toBe(true);
    expect(lines.some((line) => line.includes("Error output: disk full"))).toBe(true);
    expect(lines.some((line) => line.includes("Standard output: partial"))).toBe(true);
  });

  it("streams command output and step lines when output is shown", async () => {
    const consoleLogSpy = vi.mocked(console.log);
    const runner = new FakeRunner(() => ({ stdout: "Reading package lists" }));
    const executor = new SetupCommandExecutor(runner, "box_demo", {
      config: defaultConfig(),
      logger: new Logger({ prefix: false }),
      showOutput: true,
    });

    await executor.executeParallel(["apt update"]);

    const lines = consoleLogSpy.mock.calls.map((c) => String(c[0]));
    expect(lines).toContain("Step 1/1: apt update");
    expect(lines).toContain("Reading package lists");
  });
});
