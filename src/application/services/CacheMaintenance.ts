import { err, ok, type Result } from "neverthrow";
import type { StoreError } from "../../domain/models/errors.ts";
import { debug, error, info, warn } from "../../config/logger.ts";
import type { DocumentCacheStore, SweepReport } from "./DocumentCacheStore.ts";

/**
 * Runs the cache sweep on a fixed interval
 */
export class CacheMaintenance {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly store: DocumentCacheStore,
    private readonly intervalMs: number,
  ) {}

  start(): void {
    if (this.timer) {
      warn("Cache maintenance is already running");
      return;
    }

    this.timer = setInterval(() => {
      this.runOnce().catch((cause: unknown) => {
        error(`Cache sweep crashed: ${cause instanceof Error ? cause.message : String(cause)}`);
      });
    }, this.intervalMs);
    // The sweep alone never keeps the process alive
    this.timer.unref();
    info(`Cache maintenance scheduled every ${this.intervalMs}ms`);
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    debug("Cache maintenance stopped");
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  async runOnce(): Promise<Result<SweepReport, StoreError>> {
    const swept = await this.store.evictExpired();
    if (swept.isErr()) {
      error(`Cache sweep failed: ${swept.error.message}`);
      return err(swept.error);
    }
    return ok(swept.value);
  }
}
