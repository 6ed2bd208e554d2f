import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";
import { settleWithin } from "../utils/with-timeout.js";

export interface SideEffectsSummary {
  /** Side effects registered over the invocation. */
  total: number;
  /** Still running when the wait bound elapsed. */
  abandoned: number;
}

/**
 * Per-invocation registry of best-effort work (refreshes, notifications) that
 * runs after the hook response is decided.
 */
export class SideEffects {
  private readonly pending = new Set<Promise<unknown>>();
  private total = 0;

  constructor(private readonly logger: Logger = noopLogger) {}

  track(label: string, work: Promise<unknown>): void {
    this.total++;
    const settled = work.then(
      () => undefined,
      (err: unknown) => {
        this.logger.debug?.("Side effect failed", { label, error: err });
      },
    );
    this.pending.add(settled);
    void settled.finally(() => this.pending.delete(settled));
  }

  get size(): number {
    return this.pending.size;
  }

  /** Wait for tracked work, giving up after `boundMs`. */
  async settled(boundMs: number): Promise<SideEffectsSummary> {
    const outcome = await settleWithin(Promise.all([...this.pending]), boundMs);
    const abandoned = outcome.status === "timeout" ? this.pending.size : 0;
    if (abandoned > 0) {
      this.logger.debug?.("Abandoning unfinished side effects", { abandoned, boundMs });
    }
    return { total: this.total, abandoned };
  }
}
