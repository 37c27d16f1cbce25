import execa                    from 'execa'

import { SshConnectionOptions } from './ssh.interfaces'

export abstract class AbstractCommand {
  protected abstract readonly binary: string

  constructor(protected readonly options: SshConnectionOptions) {}

  protected get destination(): string {
    return `${this.options.user}@${this.options.host}`
  }

  protected get connectionArgs(): Array<string> {
    const args = [
      '-i',
      this.options.identityFile,
      '-o',
      `ConnectTimeout=${this.options.connectTimeout}`,
      '-o',
      'BatchMode=yes',
    ]

    if (this.options.knownHostsFile) {
      args.push('-o', `UserKnownHostsFile=${this.options.knownHostsFile}`)
    }

    return args
  }

  protected async run(args: Array<string>): Promise<string> {
    const { stdout, stderr, exitCode, timedOut } = await execa(this.binary, args, {
      reject: false,
      stdin: 'ignore',
      timeout: this.options.commandTimeout * 1000,
    })

    if (timedOut) {
      throw new Error(`${this.binary} timed out after ${this.options.commandTimeout}s`)
    }

    if (exitCode !== 0) {
      throw new Error(stderr || stdout || `${this.binary} exited with code ${exitCode}`)
    }

    return stdout || stderr
  }
}
