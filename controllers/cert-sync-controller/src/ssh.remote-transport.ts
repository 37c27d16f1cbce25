import { Ssh }             from '@cert-sync/ssh-tool'

import { RemoteTransport } from './remote-transport.interfaces'

export class SshRemoteTransport implements RemoteTransport {
  constructor(private readonly ssh: Ssh) {}

  async probe(): Promise<void> {
    await this.ssh.shell.echo('SSH OK')
  }

  async mkdir(path: string): Promise<void> {
    await this.ssh.shell.mkdir(path)
  }

  async copy(localPath: string, remotePath: string): Promise<void> {
    await this.ssh.copy.upload(localPath, remotePath)
  }

  async chmod(mode: string, paths: Array<string>): Promise<void> {
    await this.ssh.shell.chmod(mode, paths)
  }
}
