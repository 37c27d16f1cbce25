import { CertificateApi }          from '@cert-sync/cert-manager-api'
import { CertificateResource }     from '@cert-sync/cert-manager-api'

import { CertificateSource }       from './certificate-source.interfaces'
import { CertificateSourceOrigin } from './certificate-source.interfaces'

export const certificateToCertificateSources = (
  certificate: CertificateResource
): Array<CertificateSource> => {
  const namespace = certificate.metadata?.namespace || 'default'
  const [domain] = certificate.spec.dnsNames ?? []

  if (!certificate.spec.secretName || !domain) {
    return []
  }

  return [{ namespace, secretName: certificate.spec.secretName, domain }]
}

export class CertManagerSourceOrigin implements CertificateSourceOrigin {
  readonly name = 'certificates'

  constructor(private readonly certificateApi: CertificateApi) {}

  async list(): Promise<Array<CertificateSource>> {
    const { items } = await this.certificateApi.listCertificates()

    return items.flatMap(certificateToCertificateSources)
  }
}
