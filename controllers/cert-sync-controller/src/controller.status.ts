import { SyncOutcome } from './sync-outcome.interfaces'

export interface ControllerStatusSnapshot {
  readonly totalSyncs: number
  readonly successSyncs: number
  readonly failedSyncs: number
  /**
   * End of the most recent completed reconciliation.
   */
  readonly lastReconciledAt?: Date
}

/**
 * Process-wide sync counters and heartbeat. Written by the reconcile loop only, read by the
 * metrics and health servers through `snapshot`.
 */
export class ControllerStatus {
  #totalSyncs = 0

  #successSyncs = 0

  #failedSyncs = 0

  #lastReconciledAt?: number

  recordOutcome(outcome: SyncOutcome): void {
    this.#totalSyncs += 1

    if (outcome.status === 'failed') {
      this.#failedSyncs += 1
    } else {
      this.#successSyncs += 1
    }
  }

  markReconciled(at: Date): void {
    this.#lastReconciledAt = at.getTime()
  }

  snapshot(): ControllerStatusSnapshot {
    return Object.freeze({
      totalSyncs: this.#totalSyncs,
      successSyncs: this.#successSyncs,
      failedSyncs: this.#failedSyncs,
      lastReconciledAt:
        this.#lastReconciledAt === undefined ? undefined : new Date(this.#lastReconciledAt),
    })
  }
}
