// Task scope: the tasks of one connection share a single cancellation signal
// The first task to finish cancels the others; cleanups run once on cancel

import { errorMessage } from "@sealwire/shared";
import { type Logger, createLogger } from "@sealwire/kernel";
import { ClosedResourceError } from "./errors.js";

export type ScopedTask = (signal: AbortSignal) => Promise<void>;

export class TaskScope {
  private readonly controller = new AbortController();
  private readonly tasks: Promise<void>[] = [];
  private readonly cleanups: Array<() => void> = [];
  private readonly log: Logger;
  private failure: unknown = undefined;

  constructor(parent?: AbortSignal, logger?: Logger) {
    this.log = logger ?? createLogger({ name: "task-scope" });
    if (parent) {
      if (parent.aborted) {
        this.cancel(parent.reason);
      } else {
        const onAbort = () => this.cancel(parent.reason);
        parent.addEventListener("abort", onAbort, { once: true });
        this.cleanups.push(() => parent.removeEventListener("abort", onAbort));
      }
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /** First unexpected error raised by a task, if any */
  get error(): unknown {
    return this.failure;
  }

  /** Run a task inside the scope; its completion cancels the scope */
  spawn(name: string, task: ScopedTask): void {
    const running = (async () => {
      try {
        await task(this.signal);
      } catch (e) {
        if (!(e instanceof ClosedResourceError) && !this.cancelled) {
          this.failure ??= e;
          this.log.error("Task failed", { task: name, error: errorMessage(e) });
        }
      } finally {
        this.cancel();
      }
    })();
    this.tasks.push(running);
  }

  /** Register a cleanup run when the scope is cancelled */
  onClose(cleanup: () => void): void {
    if (this.cancelled) {
      cleanup();
      return;
    }
    this.cleanups.push(cleanup);
  }

  cancel(reason?: unknown): void {
    if (this.cancelled) return;
    this.controller.abort(reason);
    for (const cleanup of this.cleanups.splice(0)) {
      try {
        cleanup();
      } catch (e) {
        this.log.warn("Scope cleanup failed", { error: errorMessage(e) });
      }
    }
  }

  /** Resolves once every spawned task has settled */
  async join(): Promise<void> {
    await Promise.allSettled(this.tasks);
  }
}
