import { X509Certificate }        from 'node:crypto'
import { createHash }             from 'node:crypto'
import { chmod }                  from 'node:fs/promises'
import { writeFile }              from 'node:fs/promises'
import { join }                   from 'node:path'
import { posix }                  from 'node:path'

import { Logger }                 from '@cert-sync/logger'

import tempy                      from 'tempy'

import { CertificateSource }      from './certificate-source.interfaces'
import { HashStore }              from './hash-store.interfaces'
import { RemoteTransport }        from './remote-transport.interfaces'
import { SecretReader }           from './secret-reader.interfaces'
import { TlsSecretData }          from './secret-reader.interfaces'
import { SyncFailureReason }      from './sync-outcome.interfaces'
import { SyncOutcome }            from './sync-outcome.interfaces'
import { ConfigPushError }        from './errors'
import { SourceDataError }        from './errors'
import { TransferError }          from './errors'
import { ValidationError }        from './errors'
import { describeError }          from './errors'
import { renderTraefikTlsConfig } from './traefik-config.generator'

export interface CertificateSyncerOptions {
  remoteCertDir: string
  remoteConfigDir: string
  skipConfigGeneration: boolean
}

interface CertificateMaterial {
  certificate: string
  key: string
}

interface RemoteCertificatePaths {
  dir: string
  certFile: string
  keyFile: string
}

export const REMOTE_CERTIFICATE_FILE = 'tls.crt'

export const REMOTE_KEY_FILE = 'tls.key'

// Domains name remote paths that scp hands to the remote shell unquoted.
const SERVABLE_DOMAIN = /^[A-Za-z0-9]([A-Za-z0-9.-]*[A-Za-z0-9])?$/

export const contentHash = ({ certificate, key }: CertificateMaterial): string =>
  createHash('sha256').update(certificate).update(key).digest('hex')

const toFailureReason = (error: unknown): SyncFailureReason => {
  if (
    error instanceof SourceDataError ||
    error instanceof ValidationError ||
    error instanceof TransferError
  ) {
    return error.reason
  }

  return 'internal'
}

/**
 * Fetch, compare, materialize, validate, transfer, activate and commit one certificate.
 * Decoded material only ever lives in a private scratch directory removed before `sync`
 * returns.
 */
export class CertificateSyncer {
  private readonly logger = new Logger(CertificateSyncer.name)

  constructor(
    private readonly secretReader: SecretReader,
    private readonly hashStore: HashStore,
    private readonly transport: RemoteTransport,
    private readonly options: CertificateSyncerOptions
  ) {}

  async sync(source: CertificateSource): Promise<SyncOutcome> {
    this.logger.info(
      `Checking ${source.domain} (secret: ${source.namespace}/${source.secretName})`
    )

    try {
      return await this.syncSource(source)
    } catch (error) {
      const message = describeError(error)

      this.logger.error(`Sync of ${source.domain} failed: ${message}`)

      return { status: 'failed', source, reason: toFailureReason(error), message }
    }
  }

  private async syncSource(source: CertificateSource): Promise<SyncOutcome> {
    if (!SERVABLE_DOMAIN.test(source.domain)) {
      throw new ValidationError(`Unsupported domain name "${source.domain}"`)
    }

    const material = await this.fetch(source)
    const hash = contentHash(material)

    if ((await this.hashStore.lookup(source.domain)) === hash) {
      this.logger.info(`Unchanged ${source.domain} (hash: ${hash.slice(0, 8)}...)`)

      return { status: 'unchanged', source, hash }
    }

    this.logger.info(`Syncing ${source.domain} (hash: ${hash.slice(0, 8)}...)`)

    const configPushed = await tempy.directory.task(async (scratch) =>
      this.deliver(scratch, source.domain, material))

    try {
      await this.hashStore.update(source.domain, hash)
    } catch (error) {
      this.logger.warn(`Cannot record hash of ${source.domain}: ${describeError(error)}`)
    }

    this.logger.info(`Synced ${source.domain}`)

    return { status: 'transferred', source, hash, configPushed }
  }

  private async fetch({ namespace, secretName }: CertificateSource): Promise<CertificateMaterial> {
    let data: TlsSecretData

    try {
      data = await this.secretReader.read(namespace, secretName)
    } catch (error) {
      throw new SourceDataError(`Cannot read secret ${namespace}/${secretName}`, { cause: error })
    }

    if (!data.certificate || !data.key) {
      throw new SourceDataError(`No certificate data found in ${namespace}/${secretName}`)
    }

    return { certificate: data.certificate, key: data.key }
  }

  private async deliver(
    scratch: string,
    domain: string,
    material: CertificateMaterial
  ): Promise<boolean> {
    await chmod(scratch, 0o700)

    const certificate = Buffer.from(material.certificate, 'base64')
    const localCertFile = join(scratch, REMOTE_CERTIFICATE_FILE)
    const localKeyFile = join(scratch, REMOTE_KEY_FILE)

    await writeFile(localCertFile, certificate, { mode: 0o600 })
    await writeFile(localKeyFile, Buffer.from(material.key, 'base64'), { mode: 0o600 })

    this.validate(domain, certificate)

    const remote = this.getRemotePaths(domain)

    await this.transfer(localCertFile, localKeyFile, remote)

    if (this.options.skipConfigGeneration) {
      this.logger.debug(`Skipping config generation for ${domain}`)

      return false
    }

    try {
      await this.pushConfig(scratch, domain, remote)

      return true
    } catch (error) {
      const failure = new ConfigPushError(`Cannot push config for ${domain}`, { cause: error })

      this.logger.warn(`${describeError(failure)} (continuing anyway)`)

      return false
    }
  }

  private validate(domain: string, certificate: Buffer): void {
    let parsed: X509Certificate

    try {
      parsed = new X509Certificate(certificate)
    } catch (error) {
      throw new ValidationError(`Invalid certificate format for ${domain}`, { cause: error })
    }

    this.logger.info(`Certificate for ${domain} expires ${parsed.validTo}`)
  }

  private getRemotePaths(domain: string): RemoteCertificatePaths {
    const dir = posix.join(this.options.remoteCertDir, domain)

    return {
      dir,
      certFile: posix.join(dir, REMOTE_CERTIFICATE_FILE),
      keyFile: posix.join(dir, REMOTE_KEY_FILE),
    }
  }

  private async transfer(
    localCertFile: string,
    localKeyFile: string,
    remote: RemoteCertificatePaths
  ): Promise<void> {
    try {
      await this.transport.probe()
      await this.transport.mkdir(remote.dir)
      await this.transport.copy(localCertFile, remote.certFile)
      await this.transport.copy(localKeyFile, remote.keyFile)
      await this.transport.chmod('600', [remote.certFile, remote.keyFile])
    } catch (error) {
      throw new TransferError(`Cannot transfer certificate to ${remote.dir}`, { cause: error })
    }
  }

  private async pushConfig(
    scratch: string,
    domain: string,
    remote: RemoteCertificatePaths
  ): Promise<void> {
    const localConfigFile = join(scratch, `${domain}.yml`)
    const remoteConfigFile = posix.join(this.options.remoteConfigDir, `${domain}.yml`)

    await writeFile(
      localConfigFile,
      renderTraefikTlsConfig({ certFile: remote.certFile, keyFile: remote.keyFile }),
      { mode: 0o600 }
    )

    await this.transport.copy(localConfigFile, remoteConfigFile)
    await this.transport.chmod('644', [remoteConfigFile])
  }
}
