/**
 * Task group with first-error-wins semantics.
 *
 * Every task receives the group's AbortSignal. The first task to fail
 * aborts the signal with its error; errors of the remaining tasks are
 * dropped. wait() settles only after every task has settled.
 */

/** Handle to a task's result, readable once the group has joined cleanly. */
export interface TaskResult<T> {
  readonly settled: boolean;
  readonly value: T;
}

class TaskSlot<T> implements TaskResult<T> {
  private result: { value: T } | null = null;

  get settled(): boolean {
    return this.result !== null;
  }

  get value(): T {
    if (!this.result) {
      throw new Error("task result read before the task completed");
    }
    return this.result.value;
  }

  fill(value: T): void {
    this.result = { value };
  }
}

export class TaskGroup {
  private readonly controller = new AbortController();
  private readonly tasks: Promise<void>[] = [];
  private failure: { error: unknown } | null = null;
  private detachParent: () => void = () => {};

  /**
   * @param parent - Optional outer signal; aborting it aborts the group.
   *   The group stops listening to it once wait() settles.
   */
  constructor(parent?: AbortSignal) {
    if (parent) {
      if (parent.aborted) {
        this.controller.abort(parent.reason);
      } else {
        const onAbort = (): void => this.controller.abort(parent.reason);
        parent.addEventListener("abort", onAbort, { once: true });
        this.detachParent = () => parent.removeEventListener("abort", onAbort);
      }
    }
  }

  /** Signal shared by all tasks; aborted on the first failure. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Start a task. Its result is available through the returned handle. */
  go<T>(task: (signal: AbortSignal) => Promise<T>): TaskResult<T> {
    const slot = new TaskSlot<T>();
    const run = Promise.resolve()
      .then(() => task(this.controller.signal))
      .then(
        (value) => {
          slot.fill(value);
        },
        (error: unknown) => {
          this.fail(error);
        }
      );
    this.tasks.push(run);
    return slot;
  }

  /**
   * Wait for every task to settle.
   *
   * @throws The first error raised by any task.
   */
  async wait(): Promise<void> {
    // Tasks may be added while earlier ones run; drain until stable.
    let joined = 0;
    try {
      while (joined < this.tasks.length) {
        const batch = this.tasks.slice(joined);
        joined = this.tasks.length;
        await Promise.all(batch);
      }
    } finally {
      this.detachParent();
    }
    if (this.failure) {
      throw this.failure.error;
    }
  }

  private fail(error: unknown): void {
    if (this.failure) {
      return;
    }
    this.failure = { error };
    this.controller.abort(error);
  }
}
