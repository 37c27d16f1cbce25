export interface CertificateSource {
  namespace: string
  secretName: string
  /**
   * First host (ingress) or first DNS name (certificate) of the originating resource. Join key
   * with the hash store.
   */
  domain: string
}

export interface CertificateSourceOrigin {
  readonly name: string

  list(): Promise<Array<CertificateSource>>
}
