import { homedir }     from 'node:os'
import { join }        from 'node:path'

import { ConfigError } from './errors'

export interface ControllerConfig {
  remoteHost: string
  remoteUser: string
  remoteCertDir: string
  remoteConfigDir: string
  credentialPath: string
  /**
   * Seconds.
   */
  connectTimeout: number
  /**
   * Seconds.
   */
  commandTimeout: number
  /**
   * Seconds.
   */
  reconcileInterval: number
  debug: boolean
  skipConfigGeneration: boolean
  hashStorePath: string
  sshDir: string
  metricsPort: number
  healthPort: number
}

type Env = Record<string, string | undefined>

const readString = (env: Env, key: string, fallback: string): string => env[key] || fallback

const readBoolean = (env: Env, key: string, fallback: boolean): boolean => {
  const value = env[key]?.trim().toLowerCase()

  if (!value) {
    return fallback
  }

  if (value === 'true' || value === '1') {
    return true
  }

  if (value === 'false' || value === '0') {
    return false
  }

  throw new ConfigError(`${key} must be true or false, got "${env[key]}"`)
}

const readPositiveInteger = (env: Env, key: string, fallback: number): number => {
  const value = env[key]?.trim()

  if (!value) {
    return fallback
  }

  if (!/^\d+$/.test(value) || Number(value) === 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${value}"`)
  }

  return Number(value)
}

const readPort = (env: Env, key: string, fallback: number): number => {
  const value = env[key]?.trim()

  if (!value) {
    return fallback
  }

  if (!/^\d+$/.test(value) || Number(value) > 65535) {
    throw new ConfigError(`${key} must be a port number, got "${value}"`)
  }

  return Number(value)
}

export const loadControllerConfig = (env: Env = process.env): ControllerConfig => {
  const remoteHost = env.PROXY_IP?.trim()

  if (!remoteHost) {
    throw new ConfigError('PROXY_IP environment variable is required')
  }

  const home = env.HOME || homedir()

  return Object.freeze({
    remoteHost,
    remoteUser: readString(env, 'REMOTE_USER', 'cert-sync'),
    remoteCertDir: readString(env, 'REMOTE_CERT_DIR', '/opt/traefik/certs'),
    remoteConfigDir: readString(env, 'REMOTE_CONFIG_DIR', '/etc/traefik/config'),
    credentialPath: readString(env, 'SSH_KEY_PATH', '/secrets/id_rsa'),
    connectTimeout: readPositiveInteger(env, 'SSH_TIMEOUT', 5),
    commandTimeout: readPositiveInteger(env, 'SSH_COMMAND_TIMEOUT', 60),
    reconcileInterval: readPositiveInteger(env, 'RECONCILE_INTERVAL', 30),
    debug: readBoolean(env, 'DEBUG', false),
    skipConfigGeneration: readBoolean(env, 'SKIP_CONFIG_GENERATION', false),
    hashStorePath: readString(
      env,
      'HASH_STORE_PATH',
      join(home, '.cache', 'cert-sync', 'cert-hashes.json')
    ),
    sshDir: readString(env, 'SSH_DIR', join(home, '.ssh')),
    metricsPort: readPort(env, 'METRICS_PORT', 9090),
    healthPort: readPort(env, 'HEALTH_PORT', 8080),
  })
}
