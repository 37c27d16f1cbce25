import { CoreV1Api }     from '@kubernetes/client-node'

import { SecretReader }  from './secret-reader.interfaces'
import { TlsSecretData } from './secret-reader.interfaces'

export class KubernetesSecretReader implements SecretReader {
  constructor(private readonly k8sApi: CoreV1Api) {}

  async read(namespace: string, name: string): Promise<TlsSecretData> {
    const { body } = await this.k8sApi.readNamespacedSecret(name, namespace)

    return {
      certificate: body.data?.['tls.crt'],
      key: body.data?.['tls.key'],
    }
  }
}
