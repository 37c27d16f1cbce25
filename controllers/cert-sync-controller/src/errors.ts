/* eslint-disable max-classes-per-file */

export type CertSyncErrorReason =
  | 'config'
  | 'orchestration-unreachable'
  | 'source-data'
  | 'validation'
  | 'transfer'
  | 'config-push'

export abstract class CertSyncError extends Error {
  abstract readonly reason: CertSyncErrorReason

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)

    this.name = this.constructor.name
  }
}

export class ConfigError extends CertSyncError {
  readonly reason = 'config'
}

export class OrchestrationUnreachableError extends CertSyncError {
  readonly reason = 'orchestration-unreachable'
}

export class SourceDataError extends CertSyncError {
  readonly reason = 'source-data'
}

export class ValidationError extends CertSyncError {
  readonly reason = 'validation'
}

export class TransferError extends CertSyncError {
  readonly reason = 'transfer'
}

export class ConfigPushError extends CertSyncError {
  readonly reason = 'config-push'
}

// Errors raised by node internals come from another realm under test runners, so no instanceof.
const messageOf = (value: unknown): string | undefined => {
  if (typeof value === 'object' && value !== null && 'message' in value) {
    return typeof value.message === 'string' ? value.message : undefined
  }

  return undefined
}

export const describeError = (error: unknown): string => {
  const message = messageOf(error)

  if (message === undefined) {
    return String(error)
  }

  const cause =
    typeof error === 'object' && error !== null && 'cause' in error
      ? messageOf(error.cause)
      : undefined

  return cause === undefined ? message : `${message}: ${cause}`
}
