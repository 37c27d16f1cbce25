import { AbstractCommand } from './abstract.command'

export class KeyscanCommand extends AbstractCommand {
  protected readonly binary = 'ssh-keyscan'

  async scan(): Promise<string> {
    return this.run(['-H', '-T', String(this.options.connectTimeout), this.options.host])
  }
}
