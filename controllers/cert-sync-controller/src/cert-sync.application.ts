import { join }                          from 'node:path'

import { Logger }                        from '@cert-sync/logger'
import { SshConnectionOptions }          from '@cert-sync/ssh-tool'

import { CertSyncController }            from './cert-sync.controller'
import { CertificateSourceDiscovery }    from './certificate-source.discovery'
import { CertificateSourceOrigin }       from './certificate-source.interfaces'
import { CertificateSyncer }             from './certificate.syncer'
import { ControllerConfig }              from './controller.config'
import { loadControllerConfig }          from './controller.config'
import { ControllerStatus }              from './controller.status'
import { FileHashStore }                 from './file.hash-store'
import { RemoteTransport }               from './remote-transport.interfaces'
import { SecretReader }                  from './secret-reader.interfaces'
import { HttpServer }                    from './server/http.server'
import { startHttpServer }               from './server/http.server'
import { createHealthRoute }             from './server/health.route'
import { createMetricsRoute }            from './server/metrics.route'
import { prepareSshIdentity }            from './ssh-identity'
import { OrchestrationUnreachableError } from './errors'
import { describeError }                 from './errors'

export interface ClusterAccess {
  getServerVersion: () => Promise<string>
  origins: Array<CertificateSourceOrigin>
  secretReader: SecretReader
}

export interface ProxyAccess {
  registerKnownHost: (knownHostsFile: string) => Promise<void>
  transport: RemoteTransport
}

export interface CertSyncApplicationOptions {
  env: Record<string, string | undefined>
  connectCluster: () => ClusterAccess
  connectProxy: (connection: SshConnectionOptions) => ProxyAccess
}

export interface CertSyncProcess {
  exit: (code: number) => void
  onShutdown: (listener: (signal: NodeJS.Signals) => void) => void
}

export class CertSyncApplication {
  private readonly logger = new Logger(CertSyncApplication.name)

  readonly status = new ControllerStatus()

  #servers: Array<HttpServer> = []

  #controller?: CertSyncController

  #config?: ControllerConfig

  constructor(private readonly options: CertSyncApplicationOptions) {}

  get servers(): ReadonlyArray<HttpServer> {
    return this.#servers
  }

  /**
   * Everything before the first reconciliation. Rejects on missing configuration, a missing
   * ssh credential or an unreachable cluster. Proxy problems are only logged.
   */
  async initialize(): Promise<void> {
    const config = loadControllerConfig(this.options.env)

    if (config.debug) {
      Logger.setLevel('debug')
    }

    this.logConfig(config)

    const identityFile = await prepareSshIdentity(config.credentialPath, config.sshDir)
    const knownHostsFile = join(config.sshDir, 'known_hosts')

    const proxy = this.options.connectProxy({
      host: config.remoteHost,
      user: config.remoteUser,
      identityFile,
      connectTimeout: config.connectTimeout,
      commandTimeout: config.commandTimeout,
      knownHostsFile,
    })

    try {
      await proxy.registerKnownHost(knownHostsFile)
      this.logger.debug('Proxy added to known hosts')
    } catch (error) {
      this.logger.warn(
        `Could not add proxy to known hosts, continuing anyway: ${describeError(error)}`
      )
    }

    const cluster = this.options.connectCluster()

    try {
      this.logger.info(`Kubernetes API ${await cluster.getServerVersion()} reachable`)
    } catch (error) {
      throw new OrchestrationUnreachableError('Cannot access Kubernetes API', { cause: error })
    }

    try {
      await proxy.transport.probe()
      this.logger.info('SSH connection successful')
    } catch (error) {
      this.logger.warn(
        `Cannot connect to proxy via SSH, will retry during sync: ${describeError(error)}`
      )
    }

    const syncer = new CertificateSyncer(
      cluster.secretReader,
      new FileHashStore(config.hashStorePath),
      proxy.transport,
      {
        remoteCertDir: config.remoteCertDir,
        remoteConfigDir: config.remoteConfigDir,
        skipConfigGeneration: config.skipConfigGeneration,
      }
    )

    this.#controller = new CertSyncController(
      new CertificateSourceDiscovery(cluster.origins),
      syncer,
      this.status,
      { interval: config.reconcileInterval * 1000 }
    )

    this.#servers = await Promise.all([
      startHttpServer({
        name: 'MetricsServer',
        port: config.metricsPort,
        app: createMetricsRoute(this.status),
      }),
      startHttpServer({
        name: 'HealthServer',
        port: config.healthPort,
        app: createHealthRoute(this.status),
      }),
    ])

    this.#config = config
  }

  async run(): Promise<void> {
    if (!this.#controller || !this.#config) {
      throw new Error('Application is not initialized')
    }

    this.logger.info(
      `Starting reconciliation loop (interval: ${this.#config.reconcileInterval}s)`
    )

    await this.#controller.start()
  }

  /**
   * Stops answering metrics and health first, then lets the loop finish the source in flight.
   */
  async shutdown(): Promise<void> {
    const servers = this.#servers

    this.#servers = []

    await Promise.all(servers.map(async (server) => server.close()))
    await this.#controller?.stop()
  }

  private logConfig(config: ControllerConfig): void {
    this.logger.info(`Proxy: ${config.remoteUser}@${config.remoteHost}`)
    this.logger.info(`Remote cert dir: ${config.remoteCertDir}`)
    this.logger.info(`Remote config dir: ${config.remoteConfigDir}`)
    this.logger.info(`SSH key: ${config.credentialPath}`)
    this.logger.info(`Reconcile interval: ${config.reconcileInterval}s`)
    this.logger.info(`Skip config generation: ${config.skipConfigGeneration}`)
  }
}

/**
 * Exit codes: 1 when startup fails or shutdown throws, 0 after a shutdown signal.
 */
export const runCertSync = async (
  application: CertSyncApplication,
  { exit, onShutdown }: CertSyncProcess
): Promise<void> => {
  const logger = new Logger('CertSync')

  logger.info('Starting cert-sync-controller')

  try {
    await application.initialize()
  } catch (error) {
    logger.error(describeError(error))
    exit(1)

    return
  }

  const stop = async (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`)

    await application.shutdown()

    exit(0)
  }

  onShutdown((signal) => {
    stop(signal).catch((error) => {
      logger.error(`Shutdown failed: ${describeError(error)}`)
      exit(1)
    })
  })

  await application.run()
}
