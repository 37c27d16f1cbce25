export interface RemoteTransport {
  probe(): Promise<void>

  mkdir(path: string): Promise<void>

  copy(localPath: string, remotePath: string): Promise<void>

  chmod(mode: string, paths: Array<string>): Promise<void>
}
