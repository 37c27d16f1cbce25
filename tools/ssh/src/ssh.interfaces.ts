export interface SshConnectionOptions {
  host: string
  user: string
  identityFile: string
  /**
   * Seconds allowed for establishing the connection.
   */
  connectTimeout: number
  /**
   * Seconds allowed for a whole command run, connection included.
   */
  commandTimeout: number
  knownHostsFile?: string
}
