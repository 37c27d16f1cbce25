import { CoreV1Api }               from '@kubernetes/client-node'
import { NetworkingV1Api }         from '@kubernetes/client-node'

import { CertificateApi }          from '@cert-sync/cert-manager-api'
import { getServerVersion }        from '@cert-sync/controller-runtime'
import { loadKubeConfig }          from '@cert-sync/controller-runtime'
import { Logger }                  from '@cert-sync/logger'
import { Ssh }                     from '@cert-sync/ssh-tool'

import { CertManagerSourceOrigin } from './cert-manager.source-origin'
import { CertSyncApplication }     from './cert-sync.application'
import { runCertSync }             from './cert-sync.application'
import { IngressSourceOrigin }     from './ingress.source-origin'
import { KubernetesSecretReader }  from './kubernetes.secret-reader'
import { SshRemoteTransport }      from './ssh.remote-transport'
import { registerKnownHost }       from './ssh-identity'
import { describeError }           from './errors'

const application = new CertSyncApplication({
  env: process.env,
  connectCluster: () => {
    const kubeConfig = loadKubeConfig()

    return {
      getServerVersion: async () => getServerVersion(kubeConfig),
      origins: [
        new IngressSourceOrigin(kubeConfig.makeApiClient(NetworkingV1Api)),
        new CertManagerSourceOrigin(new CertificateApi(kubeConfig)),
      ],
      secretReader: new KubernetesSecretReader(kubeConfig.makeApiClient(CoreV1Api)),
    }
  },
  connectProxy: (connection) => {
    const ssh = new Ssh(connection)

    return {
      registerKnownHost: async (knownHostsFile) => registerKnownHost(ssh, knownHostsFile),
      transport: new SshRemoteTransport(ssh),
    }
  },
})

runCertSync(application, {
  exit: (code) => process.exit(code),
  onShutdown: (listener) => {
    process.once('SIGTERM', listener).once('SIGINT', listener)
  },
}).catch((error) => {
  new Logger('CertSync').error(describeError(error))
  process.exit(1)
})
