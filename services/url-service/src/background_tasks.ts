import type { FastifyBaseLogger } from "fastify";
import { backgroundTaskFailuresTotal, backgroundTasksPending } from "./metrics.js";

export type TaskLogger = Pick<FastifyBaseLogger, "error">;

/**
 * Fire-and-forget execution context.
 *
 * A submitted task runs once on a later event-loop turn; callers never await it.
 * Failures are logged, not rethrown. `close()` stops intake and waits (bounded)
 * for whatever is still in flight.
 */
export class BackgroundTasks {
  private readonly inFlight = new Set<Promise<void>>();
  private closed = false;

  constructor(private readonly log: TaskLogger) {}

  get pending(): number {
    return this.inFlight.size;
  }

  get accepting(): boolean {
    return !this.closed;
  }

  submit(name: string, task: () => Promise<unknown>): boolean {
    if (this.closed) return false;

    const run = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => task())
      .then(
        () => undefined,
        (err: unknown) => {
          backgroundTaskFailuresTotal.inc({ task: name });
          this.log.error({ err, task: name }, "background task failed");
        }
      );

    this.inFlight.add(run);
    backgroundTasksPending.inc();
    void run.finally(() => {
      this.inFlight.delete(run);
      backgroundTasksPending.dec();
    });
    return true;
  }

  /** Resolves true once nothing is in flight, false if `timeoutMs` elapses first. */
  async drain(timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;

    while (this.inFlight.size > 0) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) return false;

      let timer: NodeJS.Timeout | undefined;
      const timedOut = new Promise<"timeout">((resolve) => {
        timer = setTimeout(() => resolve("timeout"), remaining);
      });
      const settled = Promise.allSettled([...this.inFlight]).then(() => "settled" as const);

      const outcome = await Promise.race([settled, timedOut]);
      clearTimeout(timer);
      if (outcome === "timeout") return this.inFlight.size === 0;
    }
    return true;
  }

  async close(timeoutMs: number): Promise<boolean> {
    this.closed = true;
    return this.drain(timeoutMs);
  }
}
