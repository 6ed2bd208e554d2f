/**
 * Concurrent dispatch of one operation to every discovered editor instance.
 *
 * Each unit runs under its own timeout; a slow or broken instance only
 * forfeits its own answer. Results are reduced in socket-path order so the
 * outcome does not depend on arrival order.
 */

import { toBufguardError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import {
  CLEAN_BUFFER,
  compareInstances,
  type EditorInstance,
  isBlocking,
  type SelectionContext,
} from "../types/editor.js";
import type { AggregatedDecision } from "../types/hook.js";
import { noopLogger } from "../utils/noop-logger.js";
import { settleWithin } from "../utils/with-timeout.js";
import type { EditorAction, EditorActionFactory } from "./interfaces/editor-action.js";

export interface BroadcastSummary {
  attempted: number;
  succeeded: number;
}

/** Handle for a fire-and-track broadcast. `done` never rejects. */
export interface Broadcast {
  readonly done: Promise<BroadcastSummary>;
}

export interface FanOutOptions {
  createAction: EditorActionFactory;
  timeoutMs: number;
  logger?: Logger;
}

export class FanOut {
  private readonly createAction: EditorActionFactory;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: FanOutOptions) {
    this.createAction = options.createAction;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? noopLogger;
  }

  /** ANY-blocking reduction of `bufferStatus` across instances. */
  async bufferStatus(instances: readonly EditorInstance[], path: string): Promise<AggregatedDecision> {
    const ordered = sorted(instances);
    const statuses = await Promise.all(
      ordered.map((instance) =>
        this.run(instance, "buffer_status", (action) => action.bufferStatus(path), CLEAN_BUFFER),
      ),
    );

    const index = statuses.findIndex(isBlocking);
    const blocking = index === -1 ? undefined : ordered[index];
    if (!blocking) return { blocked: false };
    return { blocked: true, blockingKind: blocking.kind, blockingInstance: blocking };
  }

  refreshBuffer(instances: readonly EditorInstance[], path: string): Broadcast {
    return this.broadcast(instances, "refresh_buffer", (action) => action.refreshBuffer(path));
  }

  sendMessage(instances: readonly EditorInstance[], text: string): Broadcast {
    return this.broadcast(instances, "send_message", (action) => action.sendMessage(text));
  }

  /** First non-null selection in socket-path order. */
  async visualSelection(instances: readonly EditorInstance[]): Promise<SelectionContext | null> {
    const selections = await Promise.all(
      sorted(instances).map((instance) =>
        this.run(instance, "get_visual_selection", (action) => action.getVisualSelection(), null),
      ),
    );
    return selections.find((selection) => selection !== null) ?? null;
  }

  private broadcast(
    instances: readonly EditorInstance[],
    operation: string,
    call: (action: EditorAction) => Promise<boolean>,
  ): Broadcast {
    const units = instances.map((instance) => this.run(instance, operation, call, false));
    const done = Promise.all(units).then((results) => ({
      attempted: results.length,
      succeeded: results.filter(Boolean).length,
    }));
    return { done };
  }

  /** One instance, one operation: bounded, and resolves to `fallback` on any failure. */
  private async run<T>(
    instance: EditorInstance,
    operation: string,
    call: (action: EditorAction) => Promise<T>,
    fallback: T,
  ): Promise<T> {
    let pending: Promise<T>;
    try {
      pending = call(this.createAction(instance));
    } catch (err) {
      pending = Promise.reject(err);
    }

    const outcome = await settleWithin(pending, this.timeoutMs);
    switch (outcome.status) {
      case "fulfilled":
        return outcome.value;
      case "rejected":
        this.logger.warn("Editor adapter threw; treating as no answer", {
          operation,
          socket: instance.socketPath,
          error: toBufguardError(outcome.reason),
        });
        return fallback;
      case "timeout":
        this.logger.debug?.("Editor instance did not answer in time", {
          operation,
          socket: instance.socketPath,
          timeoutMs: this.timeoutMs,
        });
        return fallback;
    }
  }
}

function sorted(instances: readonly EditorInstance[]): EditorInstance[] {
  return [...instances].sort(compareInstances);
}
