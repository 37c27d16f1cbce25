import { KeyscanCommand }       from './keyscan.command'
import { RemoteShellCommand }   from './remote-shell.command'
import { SecureCopyCommand }    from './secure-copy.command'
import { SshConnectionOptions } from './ssh.interfaces'

export class Ssh {
  public readonly shell: RemoteShellCommand

  public readonly copy: SecureCopyCommand

  public readonly keyscan: KeyscanCommand

  constructor(public readonly options: SshConnectionOptions) {
    this.shell = new RemoteShellCommand(options)
    this.copy = new SecureCopyCommand(options)
    this.keyscan = new KeyscanCommand(options)
  }
}
