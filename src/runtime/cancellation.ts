import type { SqliteStore } from "../db/sqliteStore.js";
import { CancellationSignal } from "../errors.js";

export class CancellationToken {
  private cancelledReason: string | null = null;

  cancel(reason = "cancel_requested") {
    this.cancelledReason ??= reason;
  }

  get isCancelled(): boolean {
    return this.cancelledReason !== null;
  }

  get reason(): string | null {
    return this.cancelledReason;
  }
}

export interface CancellationCheck {
  /** Throws `CancellationSignal` when the run must stop. */
  check(): void;
}

/**
 * Checkpoint for one run. Looks at the in-process token first, then at store
 * requests for the batch and the run. The first observation acknowledges the
 * pending request so a later poll sees it as handled.
 */
export class RunCancellation implements CancellationCheck {
  readonly token: CancellationToken;

  constructor(
    private readonly store: SqliteStore,
    readonly runId: string,
    readonly batchId: string,
    token: CancellationToken = new CancellationToken(),
  ) {
    this.token = token;
  }

  /** Reason for a pending request, or null. Does not acknowledge. */
  pendingReason(): string | null {
    if (this.token.isCancelled) return this.token.reason ?? "cancel_requested";
    if (this.store.isCancelRequested("batch", this.batchId)) return "batch_cancel_requested";
    if (this.store.isCancelRequested("run", this.runId)) return "cancel_requested";
    return null;
  }

  check() {
    const reason = this.pendingReason();
    if (reason === null) return;

    this.store.acknowledgeCancel("batch", this.batchId);
    this.store.acknowledgeCancel("run", this.runId);
    this.token.cancel(reason);
    throw new CancellationSignal(reason);
  }
}

/** Checkpoint that never fires; used by tests and by callers without a store. */
export const NEVER_CANCELLED: CancellationCheck = {
  check() {},
};
