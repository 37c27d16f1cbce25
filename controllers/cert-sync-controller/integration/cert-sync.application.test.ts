import { Server }               from 'node:http'
import { existsSync }           from 'node:fs'
import { rmSync }               from 'node:fs'
import { writeFileSync }        from 'node:fs'
import { join }                 from 'node:path'

import tempy                    from 'tempy'

import { Controller }           from '@cert-sync/controller-runtime'
import { SshConnectionOptions } from '@cert-sync/ssh-tool'

import { CertSyncApplication }  from '../src'
import { ClusterAccess }        from '../src'
import { runCertSync }          from '../src'
import { FakeRemoteTransport }  from './fakes'
import { FakeSecretReader }     from './fakes'
import { StaticSourceOrigin }   from './fakes'

type ShutdownListener = (signal: NodeJS.Signals) => void

describe('cert sync application', () => {
  let workdir: string
  let env: Record<string, string | undefined>
  let cluster: ClusterAccess
  let transport: FakeRemoteTransport
  let registerKnownHost: jest.Mock<Promise<void>, [string]>
  let connections: Array<SshConnectionOptions>

  beforeEach(() => {
    workdir = tempy.directory()
    writeFileSync(join(workdir, 'credential'), 'test-key')

    env = {
      PROXY_IP: '10.0.0.5',
      SSH_KEY_PATH: join(workdir, 'credential'),
      SSH_DIR: join(workdir, '.ssh'),
      HASH_STORE_PATH: join(workdir, 'cert-hashes.json'),
      METRICS_PORT: '0',
      HEALTH_PORT: '0',
    }
    cluster = {
      getServerVersion: async () => 'v1.29.0',
      origins: [new StaticSourceOrigin('ingresses', [])],
      secretReader: new FakeSecretReader(),
    }
    transport = new FakeRemoteTransport()
    registerKnownHost = jest.fn<Promise<void>, [string]>(async () => undefined)
    connections = []
  })

  afterEach(() => {
    rmSync(workdir, { recursive: true, force: true })
    jest.restoreAllMocks()
  })

  const start = () => {
    const application = new CertSyncApplication({
      env,
      connectCluster: () => cluster,
      connectProxy: (connection) => {
        connections.push(connection)

        return { registerKnownHost, transport }
      },
    })

    const exit = jest.fn<void, [number]>()
    const exited = new Promise<number>((resolve) => {
      exit.mockImplementation(resolve)
    })

    let onShutdown: (listener: ShutdownListener) => void = () => undefined
    const initialized = new Promise<ShutdownListener>((resolve) => {
      onShutdown = resolve
    })

    const running = runCertSync(application, { exit, onShutdown })

    return { application, exit, exited, initialized, running }
  }

  it('should exit with 1 when the proxy address is missing', async () => {
    delete env.PROXY_IP

    const { exit, exited, running } = start()

    expect(await exited).toBe(1)
    await running

    expect(exit).toHaveBeenCalledTimes(1)
    expect(connections).toEqual([])
  })

  it('should exit with 1 when the ssh credential is missing', async () => {
    env.SSH_KEY_PATH = join(workdir, 'missing')

    const { exited, running } = start()

    expect(await exited).toBe(1)
    await running

    expect(connections).toEqual([])
  })

  it('should exit with 1 when the cluster cannot be reached', async () => {
    cluster.getServerVersion = async () => {
      throw new Error('connect ECONNREFUSED 10.96.0.1:443')
    }

    const { application, exited, running } = start()

    expect(await exited).toBe(1)
    await running

    expect(transport.calls).toEqual([])
    expect(application.servers).toEqual([])
  })

  it('should keep starting when the proxy cannot be reached', async () => {
    registerKnownHost.mockRejectedValue(new Error('ssh-keyscan timed out after 5s'))
    transport.failWhen = ({ operation }) => operation === 'probe'

    const { application, exit, exited, initialized, running } = start()
    const shutdown = await initialized

    expect(exit).not.toHaveBeenCalled()
    expect(transport.calls).toEqual([{ operation: 'probe', args: [] }])
    expect(application.servers).toHaveLength(2)
    expect(existsSync(join(workdir, '.ssh', 'id_rsa'))).toBe(true)

    shutdown('SIGTERM')

    expect(await exited).toBe(0)
    await running
  })

  it('should connect to the proxy with the copied identity and pinned known hosts', async () => {
    const { exited, initialized, running } = start()
    const shutdown = await initialized

    shutdown('SIGINT')

    expect(await exited).toBe(0)
    await running

    expect(connections).toEqual([
      {
        host: '10.0.0.5',
        user: 'cert-sync',
        identityFile: join(workdir, '.ssh', 'id_rsa'),
        connectTimeout: 5,
        commandTimeout: 60,
        knownHostsFile: join(workdir, '.ssh', 'known_hosts'),
      },
    ])
    expect(registerKnownHost).toHaveBeenCalledWith(join(workdir, '.ssh', 'known_hosts'))
  })

  it('should close the servers before stopping the loop and exiting', async () => {
    const close = jest.spyOn(Server.prototype, 'close')
    const stop = jest.spyOn(Controller.prototype, 'stop')

    const { exit, exited, initialized, running } = start()
    const shutdown = await initialized

    shutdown('SIGTERM')

    expect(await exited).toBe(0)
    await running

    expect(close).toHaveBeenCalledTimes(2)
    expect(stop).toHaveBeenCalledTimes(1)
    expect(Math.max(...close.mock.invocationCallOrder)).toBeLessThan(
      stop.mock.invocationCallOrder[0]
    )
    expect(stop.mock.invocationCallOrder[0]).toBeLessThan(exit.mock.invocationCallOrder[0])
  })
})
