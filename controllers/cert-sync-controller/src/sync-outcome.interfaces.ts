import { CertificateSource } from './certificate-source.interfaces'

export type SyncFailureReason = 'source-data' | 'validation' | 'transfer' | 'internal'

export interface UnchangedSyncOutcome {
  status: 'unchanged'
  source: CertificateSource
  hash: string
}

export interface TransferredSyncOutcome {
  status: 'transferred'
  source: CertificateSource
  hash: string
  configPushed: boolean
}

export interface FailedSyncOutcome {
  status: 'failed'
  source: CertificateSource
  reason: SyncFailureReason
  message: string
}

export type SyncOutcome = UnchangedSyncOutcome | TransferredSyncOutcome | FailedSyncOutcome
