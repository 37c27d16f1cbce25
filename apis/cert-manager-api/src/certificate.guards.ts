import { CertificateList }     from './certificate.interfaces'
import { CertificateResource } from './certificate.interfaces'

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

export const isCertificateResource = (value: unknown): value is CertificateResource => {
  if (!isRecord(value) || !isRecord(value.spec)) {
    return false
  }

  const { secretName, dnsNames } = value.spec

  if (typeof secretName !== 'string') {
    return false
  }

  return (
    dnsNames === undefined ||
    (Array.isArray(dnsNames) && dnsNames.every((name) => typeof name === 'string'))
  )
}

/**
 * Keeps the well-formed certificates of a custom objects list response and drops the rest.
 */
export const toCertificateList = (body: unknown): CertificateList => {
  if (!isRecord(body) || !Array.isArray(body.items)) {
    throw new Error('Malformed certificate list response')
  }

  return {
    items: body.items.filter(isCertificateResource),
  }
}
