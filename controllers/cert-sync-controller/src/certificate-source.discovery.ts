/* eslint-disable no-await-in-loop */

import { Logger }                        from '@cert-sync/logger'

import { CertificateSource }             from './certificate-source.interfaces'
import { CertificateSourceOrigin }       from './certificate-source.interfaces'
import { OrchestrationUnreachableError } from './errors'
import { describeError }                 from './errors'

/**
 * Collects sources from every origin in order. Duplicates are kept: a domain listed twice is
 * synced twice and the later sync owns its hash record.
 */
export class CertificateSourceDiscovery {
  private readonly logger = new Logger(CertificateSourceDiscovery.name)

  constructor(private readonly origins: Array<CertificateSourceOrigin>) {}

  async discover(): Promise<Array<CertificateSource>> {
    const sources: Array<CertificateSource> = []

    for (const origin of this.origins) {
      try {
        const found = await origin.list()

        this.logger.debug(`Found ${found.length} sources in ${origin.name}`)

        sources.push(...found)
      } catch (error) {
        const failure = new OrchestrationUnreachableError(`Cannot list ${origin.name}`, {
          cause: error,
        })

        this.logger.error(describeError(failure))
      }
    }

    return sources
  }
}
