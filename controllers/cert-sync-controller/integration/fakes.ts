/* eslint-disable max-classes-per-file */

import { readFileSync }            from 'node:fs'
import { statSync }                from 'node:fs'
import { join }                    from 'node:path'

import { CertificateSource }       from '../src'
import { CertificateSourceOrigin } from '../src'
import { RemoteTransport }         from '../src'
import { SecretReader }            from '../src'
import { TlsSecretData }           from '../src'

export const CERTIFICATE_PEM = readFileSync(join(__dirname, 'fixtures', 'example.com.crt'))

export const encode = (value: string | Buffer): string => Buffer.from(value).toString('base64')

export const validSecret = (): TlsSecretData => ({
  certificate: encode(CERTIFICATE_PEM),
  key: encode('test-key'),
})

export type TransportOperation = 'probe' | 'mkdir' | 'copy' | 'chmod'

export interface TransportCall {
  operation: TransportOperation
  args: Array<string>
}

export interface LocalFileRecord {
  path: string
  mode: number
}

/**
 * In-process stand-in for the proxy host. Copied files are read at copy time and kept by
 * remote path.
 */
export class FakeRemoteTransport implements RemoteTransport {
  readonly calls: Array<TransportCall> = []

  readonly files = new Map<string, Buffer>()

  readonly modes = new Map<string, string>()

  readonly localFiles: Array<LocalFileRecord> = []

  failWhen?: (call: TransportCall) => boolean

  async probe(): Promise<void> {
    this.record({ operation: 'probe', args: [] })
  }

  async mkdir(path: string): Promise<void> {
    this.record({ operation: 'mkdir', args: [path] })
  }

  async copy(localPath: string, remotePath: string): Promise<void> {
    this.localFiles.push({ path: localPath, mode: statSync(localPath).mode & 0o777 })
    this.record({ operation: 'copy', args: [localPath, remotePath] })
    this.files.set(remotePath, readFileSync(localPath))
  }

  async chmod(mode: string, paths: Array<string>): Promise<void> {
    this.record({ operation: 'chmod', args: [mode, ...paths] })

    for (const path of paths) {
      this.modes.set(path, mode)
    }
  }

  reset(): void {
    this.calls.length = 0
    this.localFiles.length = 0
    this.failWhen = undefined
  }

  private record(call: TransportCall): void {
    this.calls.push(call)

    if (this.failWhen?.(call)) {
      throw new Error(`${call.operation} failed: connection refused`)
    }
  }
}

export class FakeSecretReader implements SecretReader {
  readonly secrets = new Map<string, TlsSecretData>()

  onRead?: (namespace: string, name: string) => void

  set(namespace: string, name: string, data: TlsSecretData): this {
    this.secrets.set(`${namespace}/${name}`, data)

    return this
  }

  async read(namespace: string, name: string): Promise<TlsSecretData> {
    this.onRead?.(namespace, name)

    const data = this.secrets.get(`${namespace}/${name}`)

    if (!data) {
      throw new Error(`secrets "${name}" not found`)
    }

    return data
  }
}

export class StaticSourceOrigin implements CertificateSourceOrigin {
  constructor(
    readonly name: string,
    private readonly sources: Array<CertificateSource> | Error
  ) {}

  async list(): Promise<Array<CertificateSource>> {
    if (this.sources instanceof Error) {
      throw this.sources
    }

    return this.sources
  }
}
