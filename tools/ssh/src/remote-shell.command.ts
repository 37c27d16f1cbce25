import { AbstractCommand } from './abstract.command'
import { quote }           from './quote.utils'

export class RemoteShellCommand extends AbstractCommand {
  protected readonly binary = 'ssh'

  async exec(command: string): Promise<string> {
    return this.run([...this.connectionArgs, this.destination, command])
  }

  async echo(message: string): Promise<string> {
    return this.exec(`echo ${quote(message)}`)
  }

  async mkdir(path: string): Promise<void> {
    await this.exec(`mkdir -p ${quote(path)}`)
  }

  async chmod(mode: string, paths: Array<string>): Promise<void> {
    await this.exec(`chmod ${mode} ${paths.map(quote).join(' ')}`)
  }
}
