/** A unit of work that stops when `signal` aborts. */
export type Task<T = unknown> = (signal: AbortSignal) => Promise<T>;

export type TaskOutcome =
  | { name: string; status: 'fulfilled'; value: unknown }
  | { name: string; status: 'rejected'; reason: unknown };

/**
 * Runs tasks side by side under one AbortController. Whichever task settles
 * first aborts the shared signal so the others wind down; {@link run}
 * resolves once every task has settled and never rejects.
 */
export class TaskGroup {
  private readonly controller = new AbortController();
  private readonly tasks: Array<{ name: string; task: Task }> = [];

  constructor(parent?: AbortSignal) {
    if (parent?.aborted) {
      this.cancel(parent.reason);
    } else {
      parent?.addEventListener('abort', () => this.cancel(parent.reason), { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  add(name: string, task: Task): this {
    this.tasks.push({ name, task });
    return this;
  }

  cancel(reason?: unknown): void {
    if (!this.controller.signal.aborted) this.controller.abort(reason);
  }

  async run(): Promise<TaskOutcome[]> {
    const running = this.tasks.map(({ name, task }) =>
      task(this.signal).finally(() => this.cancel(`${name} finished`)),
    );
    const settled = await Promise.allSettled(running);

    return settled.map((result, i): TaskOutcome => {
      const name = this.tasks[i]?.name ?? `task-${i}`;
      return result.status === 'fulfilled'
        ? { name, status: 'fulfilled', value: result.value }
        : { name, status: 'rejected', reason: result.reason };
    });
  }
}

/** Resolves when `signal` aborts (at once when it already has). */
export function aborted(signal: AbortSignal): Promise<unknown> {
  if (signal.aborted) return Promise.resolve(signal.reason);
  return new Promise((resolve) => {
    signal.addEventListener('abort', () => resolve(signal.reason), { once: true });
  });
}
