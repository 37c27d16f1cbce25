/* eslint-disable no-await-in-loop */

import { setTimeout as sleep } from 'node:timers/promises'

import { Logger }              from '@cert-sync/logger'

import { ControllerOptions }   from './controller.interfaces'

/**
 * Fixed-cadence reconciler. The first reconciliation runs immediately on start, the next one
 * `interval` milliseconds after the previous finished. Reconciliations never overlap.
 *
 * `stop` aborts the signal handed to `reconcile` and the pending wait, then resolves once the
 * reconciliation in flight has returned.
 */
export abstract class Controller {
  protected readonly abortController = new AbortController()

  protected readonly logger: Logger

  #running?: Promise<void>

  constructor(protected readonly options: ControllerOptions) {
    this.logger = new Logger(this.constructor.name)
  }

  public get stopped(): boolean {
    return this.abortController.signal.aborted
  }

  public start(): Promise<void> {
    if (!this.#running) {
      this.#running = this.run()
    }

    return this.#running
  }

  public async stop(): Promise<void> {
    this.abortController.abort()

    await this.#running
  }

  protected abstract reconcile(signal: AbortSignal): Promise<void>

  private async run(): Promise<void> {
    const { signal } = this.abortController

    while (!signal.aborted) {
      try {
        await this.reconcile(signal)
      } catch (error) {
        this.logger.error(
          `Reconciliation failed: ${error instanceof Error ? error.message : String(error)}`
        )
      }

      try {
        await sleep(this.options.interval, undefined, { signal })
      } catch (error) {
        if (!signal.aborted) {
          throw error
        }
      }
    }

    this.logger.info('Controller stopped')
  }
}
