export type TaskOutcome<T> =
  | { status: "fulfilled"; value: T; durationMs: number }
  | { status: "rejected"; error: unknown; durationMs: number }
  | { status: "timed_out"; timeoutMs: number; durationMs: number };

export interface BoundedRunOptions<T> {
  concurrency: number;
  /**
   * Per-task limit. A task past it is reported as timed out at the deadline;
   * it is not cancelled and keeps its worker until it settles.
   */
  timeoutMs?: number;
  onSettled?: (index: number, outcome: TaskOutcome<T>) => void;
}

const TIMED_OUT: unique symbol = Symbol("timed_out");

async function raceTimeout<T>(promise: Promise<T>, timeoutMs: number | undefined): Promise<T | typeof TIMED_OUT> {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
  });

  try {
    return await Promise.race([promise, expiry]);
  } finally {
    clearTimeout(timer);
  }
}

async function settle<T>(running: Promise<T>, timeoutMs: number | undefined): Promise<TaskOutcome<T>> {
  const startedAt = Date.now();
  try {
    const value = await raceTimeout(running, timeoutMs);
    const durationMs = Date.now() - startedAt;
    if (value === TIMED_OUT) {
      return { status: "timed_out", timeoutMs: timeoutMs ?? 0, durationMs };
    }
    return { status: "fulfilled", value, durationMs };
  } catch (error) {
    return { status: "rejected", error, durationMs: Date.now() - startedAt };
  }
}

/**
 * Runs tasks on at most `concurrency` workers and settles every one of them.
 * Outcomes come back in input order; no task failure escapes. The returned
 * promise resolves once every task, timed out or not, has finished.
 */
export async function runBounded<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  options: BoundedRunOptions<T>,
): Promise<TaskOutcome<T>[]> {
  const outcomes = new Array<TaskOutcome<T>>(tasks.length);
  const workerCount = Math.max(1, Math.min(Math.floor(options.concurrency), tasks.length));
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < tasks.length) {
      const index = nextIndex;
      nextIndex += 1;

      const task = tasks[index];
      if (!task) {
        continue;
      }

      const running = Promise.resolve().then(task);
      const outcome = await settle(running, options.timeoutMs);
      outcomes[index] = outcome;
      options.onSettled?.(index, outcome);

      if (outcome.status === "timed_out") {
        // The late result or error is dropped: the task was already reported as timed out.
        await running.then(
          () => undefined,
          () => undefined,
        );
      }
    }
  };

  await Promise.all(Array.from({ length: tasks.length === 0 ? 0 : workerCount }, () => worker()));
  return outcomes;
}
