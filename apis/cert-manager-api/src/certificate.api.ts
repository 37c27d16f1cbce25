import { CustomObjectsApi }           from '@kubernetes/client-node'
import { KubeConfig }                 from '@kubernetes/client-node'

import { CertificateList }            from './certificate.interfaces'
import { CertificateResourceVersion } from './certificate.types'
import { CertificateResourceGroup }   from './certificate.types'
import { CertificateDomain }          from './certificate.types'
import { toCertificateList }          from './certificate.guards'

export class CertificateApi {
  private readonly customObjectsApi: CustomObjectsApi

  constructor(private readonly kubeConfig: KubeConfig) {
    this.customObjectsApi = this.kubeConfig.makeApiClient(CustomObjectsApi)
  }

  async listCertificates(): Promise<CertificateList> {
    const { body } = await this.customObjectsApi.listClusterCustomObject(
      CertificateDomain.Group,
      CertificateResourceVersion.v1,
      CertificateResourceGroup.Certificate
    )

    return toCertificateList(body)
  }
}
