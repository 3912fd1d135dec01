/**
 * Bounded task pool shared by every provider call of one discovery run.
 *
 * At most `concurrency` tasks run at once. When the run signal aborts,
 * queued tasks never start and in-flight tasks are abandoned: their
 * promises reject with {@link DiscoveryTimeoutError} right away and
 * whatever the underlying call settles with later is dropped.
 */

import { DiscoveryTimeoutError, formatErrorMessage } from "../errors.js";
import { silentLogger, type DiscoveryLogger } from "../logging/index.js";
import type { ProviderGateway } from "../gateway/provider.js";

type QueuedTask = {
  start: () => void;
  cancel: () => void;
};

export class TaskPool {
  private active = 0;
  private queue: QueuedTask[] = [];
  private logger: DiscoveryLogger;

  constructor(
    readonly concurrency: number,
    readonly signal: AbortSignal,
    logger?: DiscoveryLogger,
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
    this.logger = logger ?? silentLogger;
    signal.addEventListener("abort", () => this.drain(), { once: true });
  }

  get running(): number {
    return this.active;
  }

  get pending(): number {
    return this.queue.length;
  }

  run<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (this.signal.aborted) {
        reject(new DiscoveryTimeoutError("Discovery run timed out before the lookup started"));
        return;
      }

      const start = () => {
        this.active += 1;
        let settled = false;

        const finish = () => {
          if (settled) return false;
          settled = true;
          this.signal.removeEventListener("abort", onAbort);
          this.active -= 1;
          this.next();
          return true;
        };

        const onAbort = () => {
          if (finish()) {
            reject(new DiscoveryTimeoutError("Discovery run timed out while the lookup was in flight"));
          }
        };
        this.signal.addEventListener("abort", onAbort, { once: true });

        let pending: Promise<T>;
        try {
          pending = task(this.signal);
        } catch (err) {
          pending = Promise.reject(err);
        }

        void pending.then(
          (value) => {
            if (finish()) resolve(value);
          },
          (err: unknown) => {
            if (finish()) {
              reject(err);
            } else {
              this.logger.debug("Abandoned lookup settled after timeout", { error: formatErrorMessage(err) });
            }
          },
        );
      };

      const cancel = () => reject(new DiscoveryTimeoutError("Discovery run timed out before the lookup started"));

      if (this.active < this.concurrency) {
        start();
      } else {
        this.queue.push({ start, cancel });
      }
    });
  }

  private next(): void {
    if (this.signal.aborted) return;
    const queued = this.queue.shift();
    queued?.start();
  }

  private drain(): void {
    const queued = this.queue.splice(0);
    for (const task of queued) {
      task.cancel();
    }
  }
}

/**
 * Route every gateway call through the pool and hand it the run signal
 */
export function createLimitedGateway(gateway: ProviderGateway, pool: TaskPool): ProviderGateway {
  return {
    describePrimary: (identifier, kind) =>
      pool.run((signal) => gateway.describePrimary(identifier, kind, { signal })),
    describeSecondary: (category, identifier) =>
      pool.run((signal) => gateway.describeSecondary(category, identifier, { signal })),
    listBackups: (owner, kind, backupType) =>
      pool.run((signal) => gateway.listBackups(owner, kind, backupType, { signal })),
    listTags: (arn) => pool.run((signal) => gateway.listTags(arn, { signal })),
  };
}
