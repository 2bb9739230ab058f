import debug from "debug";
import { MAX_TIMER_DELAY_MS } from "../core/config";
import { TaskTimeoutError, toError } from "../errors";
import type {
  Batch,
  EngineConfig,
  StringOutcomes,
  StringTask,
  Task,
  TaskOutcome,
} from "../types";

const log = debug("box-provision:pool");

const DEFAULT_MAX_WORKERS = 4;
const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;

type Job<T> = (signal: AbortSignal) => Promise<T>;

type Settled<T> = { ok: true; value: T } | { ok: false; error: Error };

/**
 * Bounded-concurrency executor. Every call gets its own deadline, measured
 * from the moment the call starts; results always line up with the input by
 * index.
 */
export class WorkerPool {
  readonly maxWorkers: number;
  readonly timeoutMs: number;

  constructor(maxWorkers = DEFAULT_MAX_WORKERS, timeoutMs = DEFAULT_TIMEOUT_MS) {
    this.maxWorkers =
      Number.isFinite(maxWorkers) && maxWorkers > 0
        ? Math.floor(maxWorkers)
        : DEFAULT_MAX_WORKERS;
    this.timeoutMs =
      Number.isFinite(timeoutMs) && timeoutMs > 0
        ? Math.min(timeoutMs, MAX_TIMER_DELAY_MS)
        : DEFAULT_TIMEOUT_MS;
  }

  /** General-purpose pool sized by `maxWorkers` and `timeouts.taskMs`. */
  static fromConfig(config: EngineConfig): WorkerPool {
    return new WorkerPool(config.maxWorkers, config.timeouts.taskMs);
  }

  async execute(tasks: Task[]): Promise<TaskOutcome[]> {
    const settled = await this.schedule(tasks);
    return settled.map((result) => (result.ok ? undefined : result.error));
  }

  async executeStringTasks(tasks: StringTask[]): Promise<StringOutcomes> {
    const settled = await this.schedule(tasks);
    return {
      errors: settled.map((result) => (result.ok ? undefined : result.error)),
      values: settled.map((result) => (result.ok ? result.value : "")),
    };
  }

  /**
   * Runs each batch as its own `execute` call, all batches at once. A batch
   * that fails or times out does not affect its siblings. Outcomes are keyed
   * by batch name; use `executeBatchList` when names may repeat.
   */
  async executeBatches(batches: Batch[]): Promise<Map<string, TaskOutcome[]>> {
    const results = new Map<string, TaskOutcome[]>();
    const outcomes = await this.executeBatchList(batches);
    batches.forEach((batch, i) => {
      results.set(batch.name, outcomes[i] ?? []);
    });
    return results;
  }

  /** Same as `executeBatches`, with outcomes aligned to the batches by index. */
  async executeBatchList(batches: Batch[]): Promise<TaskOutcome[][]> {
    if (batches.length === 0) {
      return [];
    }

    log(
      `Running ${batches.length} batches:`,
      batches.map((b) => `${b.name} (${b.tasks.length})`)
    );
    return Promise.all(batches.map((batch) => this.execute(batch.tasks)));
  }

  private schedule<T>(jobs: Job<T>[]): Promise<Settled<T>[]> {
    if (jobs.length === 0) {
      return Promise.resolve([]);
    }

    const results: Array<Settled<T> | undefined> = jobs.map(() => undefined);
    const controller = new AbortController();
    const workerCount = Math.max(1, Math.min(this.maxWorkers, jobs.length));
    let cursor = 0;
    let expired = false;

    log(`Scheduling ${jobs.length} tasks on ${workerCount} workers`);

    const work = async (worker: number): Promise<void> => {
      while (!expired && cursor < jobs.length) {
        const index = cursor++;
        const job = jobs[index];
        if (!job) {
          continue;
        }
        log(`Worker ${worker} claimed task ${index}`);
        const result = await settle(job, controller.signal);
        if (!expired) {
          results[index] = result;
        }
      }
    };

    return new Promise((resolve) => {
      const finish = (): void => {
        resolve(
          results.map(
            (result, index): Settled<T> =>
              result ?? {
                error: new TaskTimeoutError(index, this.timeoutMs),
                ok: false,
              }
          )
        );
      };

      const timer = setTimeout(() => {
        expired = true;
        const pending = results.filter((r) => r === undefined).length;
        log(`Deadline of ${this.timeoutMs}ms reached, ${pending} tasks unresolved`);
        controller.abort(new Error(`worker pool deadline of ${this.timeoutMs}ms reached`));
        finish();
      }, this.timeoutMs);

      const workers = Array.from({ length: workerCount }, (_, i) => work(i));
      void Promise.all(workers).then(() => {
        if (expired) {
          return;
        }
        clearTimeout(timer);
        finish();
      });
    });
  }
}

async function settle<T>(job: Job<T>, signal: AbortSignal): Promise<Settled<T>> {
  try {
    return { ok: true, value: await job(signal) };
  } catch (error) {
    return { error: toError(error), ok: false };
  }
}
