import { NetworkingV1Api }         from '@kubernetes/client-node'
import { V1Ingress }               from '@kubernetes/client-node'

import { CertificateSource }       from './certificate-source.interfaces'
import { CertificateSourceOrigin } from './certificate-source.interfaces'

export const ingressToCertificateSources = (ingress: V1Ingress): Array<CertificateSource> => {
  const namespace = ingress.metadata?.namespace || 'default'

  return (ingress.spec?.tls ?? []).flatMap((tls) => {
    const [domain] = tls.hosts ?? []

    if (!tls.secretName || !domain) {
      return []
    }

    return [{ namespace, secretName: tls.secretName, domain }]
  })
}

export class IngressSourceOrigin implements CertificateSourceOrigin {
  readonly name = 'ingresses'

  constructor(private readonly networkingApi: NetworkingV1Api) {}

  async list(): Promise<Array<CertificateSource>> {
    const { body } = await this.networkingApi.listIngressForAllNamespaces()

    return body.items.flatMap(ingressToCertificateSources)
  }
}
