import { KubeConfig } from '@kubernetes/client-node'
import { VersionApi } from '@kubernetes/client-node'

export const loadKubeConfig = (): KubeConfig => {
  const kubeConfig = new KubeConfig()

  kubeConfig.loadFromDefault()

  return kubeConfig
}

/**
 * Resolves with the API server version, rejects when the server cannot be reached.
 */
export const getServerVersion = async (kubeConfig: KubeConfig): Promise<string> => {
  const { body } = await kubeConfig.makeApiClient(VersionApi).getCode()

  return body.gitVersion
}
