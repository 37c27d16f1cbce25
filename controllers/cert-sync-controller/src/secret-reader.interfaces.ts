export interface TlsSecretData {
  /**
   * Base64 encoded `tls.crt`.
   */
  certificate?: string
  /**
   * Base64 encoded `tls.key`.
   */
  key?: string
}

export interface SecretReader {
  read(namespace: string, name: string): Promise<TlsSecretData>
}
