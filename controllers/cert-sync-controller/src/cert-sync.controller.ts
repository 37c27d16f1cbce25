/* eslint-disable no-await-in-loop */

import { Controller }                 from '@cert-sync/controller-runtime'
import { ControllerOptions }          from '@cert-sync/controller-runtime'

import { CertificateSourceDiscovery } from './certificate-source.discovery'
import { CertificateSyncer }          from './certificate.syncer'
import { ControllerStatus }           from './controller.status'

export interface CertSyncControllerOptions extends ControllerOptions {
  now?: () => Date
}

export class CertSyncController extends Controller {
  private readonly now: () => Date

  constructor(
    private readonly discovery: CertificateSourceDiscovery,
    private readonly syncer: CertificateSyncer,
    private readonly status: ControllerStatus,
    options: CertSyncControllerOptions
  ) {
    super(options)

    this.now = options.now ?? (() => new Date())
  }

  /**
   * One tick: discover, then sync every source in order. Counters move after each source, the
   * heartbeat only when every source was processed.
   */
  async reconcile(signal: AbortSignal): Promise<void> {
    this.logger.info('Starting reconciliation')

    const sources = await this.discovery.discover()

    for (const source of sources) {
      if (signal.aborted) {
        this.logger.info('Reconciliation interrupted by shutdown')

        return
      }

      this.status.recordOutcome(await this.syncer.sync(source))
    }

    this.status.markReconciled(this.now())

    const { totalSyncs, successSyncs, failedSyncs } = this.status.snapshot()

    this.logger.info(
      `Reconciliation complete. Found: ${sources.length} | Total: ${totalSyncs} | Success: ${successSyncs} | Failed: ${failedSyncs}`
    )
  }
}
