import { appendFile }  from 'node:fs/promises'
import { copyFile }    from 'node:fs/promises'
import { chmod }       from 'node:fs/promises'
import { mkdir }       from 'node:fs/promises'
import { join }        from 'node:path'

import { Ssh }         from '@cert-sync/ssh-tool'

import { ConfigError } from './errors'

/**
 * Copies the mounted credential next to the ssh client config with owner-only permissions,
 * which ssh requires and mounted secrets rarely have.
 */
export const prepareSshIdentity = async (credentialPath: string, sshDir: string): Promise<string> => {
  const identityFile = join(sshDir, 'id_rsa')

  await mkdir(sshDir, { recursive: true, mode: 0o700 })

  try {
    await copyFile(credentialPath, identityFile)
  } catch (error) {
    throw new ConfigError(`SSH key not found at ${credentialPath}`, { cause: error })
  }

  await chmod(identityFile, 0o600)

  return identityFile
}

export const registerKnownHost = async (ssh: Ssh, knownHostsFile: string): Promise<void> => {
  const keys = await ssh.keyscan.scan()

  await appendFile(knownHostsFile, keys.endsWith('\n') ? keys : `${keys}\n`, { mode: 0o600 })
}
