import { AbstractCommand } from './abstract.command'

// Remote paths reach scp unquoted.
const REMOTE_PATTERN = /[*?[\]{}\s'"\\$`;&|<>]/

export class SecureCopyCommand extends AbstractCommand {
  protected readonly binary = 'scp'

  async upload(localPath: string, remotePath: string): Promise<void> {
    if (REMOTE_PATTERN.test(remotePath)) {
      throw new Error(`Refusing to copy to ${remotePath}: path contains shell pattern characters`)
    }

    await this.run([...this.connectionArgs, localPath, `${this.destination}:${remotePath}`])
  }
}
