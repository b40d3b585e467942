/**
 * Purpose: Serialize mutation batches against one outline engine.
 * Intent: Single-writer queue; each batch (writes, then incremental evaluation) completes before the next starts.
 */

import type { OutlineEngine } from "./engine.js";
import { SessionClosedError } from "./errors.js";
import type { PassReport } from "./evaluator.js";

export type BatchFn = (engine: OutlineEngine) => void;

export class OutlineSession {
  private tail: Promise<void> = Promise.resolve();
  private running: AbortController | null = null;
  private closed = false;

  constructor(readonly engine: OutlineEngine) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /** Queues a batch; resolves with its pass report, rejects with SessionClosedError once closed. */
  submit(fn: BatchFn): Promise<PassReport> {
    if (this.closed) return Promise.reject(new SessionClosedError());

    const run = (): PassReport => {
      if (this.closed) throw new SessionClosedError();
      const controller = new AbortController();
      this.running = controller;
      try {
        return this.engine.batch(fn, controller.signal);
      } finally {
        this.running = null;
      }
    };

    const result = this.tail.then(run);
    // Failures reach the caller through `result`.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /** Resolves once every batch queued so far has settled. */
  whenIdle(): Promise<void> {
    return this.tail;
  }

  /** Rejects queued batches and aborts the running pass; the in-flight node stays dirty. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.running?.abort();
    this.engine.config.logger.info("Session closed", "session");
  }
}
