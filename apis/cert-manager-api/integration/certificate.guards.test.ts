import { toCertificateList } from '../src'

describe('certificate list', () => {
  it('should keep well-formed certificates', () => {
    const certificate = {
      apiVersion: 'cert-manager.io/v1',
      kind: 'Certificate',
      metadata: { namespace: 'cert-manager', name: 'example' },
      spec: { secretName: 'example-tls', dnsNames: ['example.com', 'www.example.com'] },
    }

    expect(toCertificateList({ items: [certificate] })).toEqual({ items: [certificate] })
  })

  it('should drop items without a secret name or with malformed dns names', () => {
    const list = toCertificateList({
      items: [
        { metadata: { name: 'no-spec' } },
        { spec: { dnsNames: ['example.com'] } },
        { spec: { secretName: 'bad-tls', dnsNames: 'example.com' } },
        { spec: { secretName: 'common-tls', commonName: 'example.org' } },
      ],
    })

    expect(list.items).toEqual([{ spec: { secretName: 'common-tls', commonName: 'example.org' } }])
  })

  it('should reject a response without items', () => {
    expect(() => toCertificateList({ kind: 'Status' })).toThrow(
      'Malformed certificate list response'
    )
  })
})
