import { Hono }                     from 'hono'

import { ControllerStatus }         from '../controller.status'
import { ControllerStatusSnapshot } from '../controller.status'

export const HEARTBEAT_STALE_AFTER = 120_000

export type HealthState = 'healthy' | 'stale' | 'no heartbeat'

export const evaluateHealth = (
  { lastReconciledAt }: ControllerStatusSnapshot,
  now: Date,
  staleAfter: number = HEARTBEAT_STALE_AFTER
): HealthState => {
  if (!lastReconciledAt) {
    return 'no heartbeat'
  }

  return now.getTime() - lastReconciledAt.getTime() < staleAfter ? 'healthy' : 'stale'
}

export interface HealthRouteOptions {
  now?: () => Date
  staleAfter?: number
}

export const createHealthRoute = (
  status: ControllerStatus,
  { now = () => new Date(), staleAfter = HEARTBEAT_STALE_AFTER }: HealthRouteOptions = {}
): Hono => {
  const health = new Hono()

  health.get('*', (c) => {
    const state = evaluateHealth(status.snapshot(), now(), staleAfter)

    return c.text(state, state === 'healthy' ? 200 : 503)
  })

  return health
}
