import { V1Ingress }                       from '@kubernetes/client-node'

import { CertificateResource }             from '@cert-sync/cert-manager-api'

import { CertificateSourceDiscovery }      from '../src'
import { certificateToCertificateSources } from '../src'
import { ingressToCertificateSources }     from '../src'
import { StaticSourceOrigin }              from './fakes'

describe('certificate source discovery', () => {
  describe('ingresses', () => {
    it('should emit one source per tls entry with its first host', () => {
      const ingress: V1Ingress = {
        metadata: { namespace: 'shop', name: 'storefront' },
        spec: {
          tls: [
            { secretName: 'shop-tls', hosts: ['shop.example.com', 'www.shop.example.com'] },
            { secretName: 'api-tls', hosts: ['api.example.com'] },
          ],
        },
      }

      expect(ingressToCertificateSources(ingress)).toEqual([
        { namespace: 'shop', secretName: 'shop-tls', domain: 'shop.example.com' },
        { namespace: 'shop', secretName: 'api-tls', domain: 'api.example.com' },
      ])
    })

    it('should skip ingresses without tls and entries without secret or host', () => {
      expect(ingressToCertificateSources({ metadata: { namespace: 'shop' }, spec: {} })).toEqual(
        []
      )
      expect(
        ingressToCertificateSources({
          metadata: { namespace: 'shop' },
          spec: { tls: [{ hosts: ['shop.example.com'] }, { secretName: 'shop-tls', hosts: [] }] },
        })
      ).toEqual([])
    })
  })

  describe('certificates', () => {
    it('should emit the secret and first dns name', () => {
      const certificate: CertificateResource = {
        metadata: { namespace: 'cert-manager', name: 'example' },
        spec: { secretName: 'example-tls', dnsNames: ['example.com', '*.example.com'] },
      }

      expect(certificateToCertificateSources(certificate)).toEqual([
        { namespace: 'cert-manager', secretName: 'example-tls', domain: 'example.com' },
      ])
    })

    it('should skip certificates without dns names', () => {
      expect(
        certificateToCertificateSources({
          metadata: { namespace: 'cert-manager', name: 'example' },
          spec: { secretName: 'example-tls', commonName: 'example.com' },
        })
      ).toEqual([])
    })
  })

  it('should concatenate origins in order and keep duplicates', async () => {
    const discovery = new CertificateSourceDiscovery([
      new StaticSourceOrigin('ingresses', [
        { namespace: 'shop', secretName: 'shop-tls', domain: 'example.com' },
      ]),
      new StaticSourceOrigin('certificates', [
        { namespace: 'cert-manager', secretName: 'example-tls', domain: 'example.com' },
      ]),
    ])

    await expect(discovery.discover()).resolves.toEqual([
      { namespace: 'shop', secretName: 'shop-tls', domain: 'example.com' },
      { namespace: 'cert-manager', secretName: 'example-tls', domain: 'example.com' },
    ])
  })

  it('should treat a failing origin as empty', async () => {
    const discovery = new CertificateSourceDiscovery([
      new StaticSourceOrigin('ingresses', new Error('connect ECONNREFUSED 10.96.0.1:443')),
      new StaticSourceOrigin('certificates', [
        { namespace: 'cert-manager', secretName: 'example-tls', domain: 'example.com' },
      ]),
    ])

    await expect(discovery.discover()).resolves.toEqual([
      { namespace: 'cert-manager', secretName: 'example-tls', domain: 'example.com' },
    ])
  })

  it('should return a fresh list on every call', async () => {
    const discovery = new CertificateSourceDiscovery([
      new StaticSourceOrigin('certificates', [
        { namespace: 'cert-manager', secretName: 'example-tls', domain: 'example.com' },
      ]),
    ])

    const first = await discovery.discover()
    const second = await discovery.discover()

    expect(second).toEqual(first)
    expect(second).not.toBe(first)
  })
})
