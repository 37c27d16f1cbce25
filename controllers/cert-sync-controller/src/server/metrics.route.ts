import { Hono }                     from 'hono'

import { ControllerStatus }         from '../controller.status'
import { ControllerStatusSnapshot } from '../controller.status'

export const renderMetrics = ({
  totalSyncs,
  successSyncs,
  failedSyncs,
  lastReconciledAt,
}: ControllerStatusSnapshot): string => {
  const lastSyncTimestamp = lastReconciledAt ? Math.floor(lastReconciledAt.getTime() / 1000) : 0

  return [
    '# HELP cert_sync_controller_up Controller status (1=up, 0=down)',
    '# TYPE cert_sync_controller_up gauge',
    'cert_sync_controller_up 1',
    '# HELP cert_sync_total_syncs Total number of sync operations',
    '# TYPE cert_sync_total_syncs counter',
    `cert_sync_total_syncs ${totalSyncs}`,
    '# HELP cert_sync_success_syncs Successful sync operations',
    '# TYPE cert_sync_success_syncs counter',
    `cert_sync_success_syncs ${successSyncs}`,
    '# HELP cert_sync_failed_syncs Failed sync operations',
    '# TYPE cert_sync_failed_syncs counter',
    `cert_sync_failed_syncs ${failedSyncs}`,
    '# HELP cert_sync_last_sync_timestamp Unix timestamp of last sync',
    '# TYPE cert_sync_last_sync_timestamp gauge',
    `cert_sync_last_sync_timestamp ${lastSyncTimestamp}`,
    '',
  ].join('\n')
}

export const createMetricsRoute = (status: ControllerStatus): Hono => {
  const metrics = new Hono()

  metrics.get('*', (c) =>
    c.text(renderMetrics(status.snapshot()), 200, {
      'Content-Type': 'text/plain; version=0.0.4',
    }))

  return metrics
}
