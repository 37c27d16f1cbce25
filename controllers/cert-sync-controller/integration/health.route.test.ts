import { ControllerStatus }  from '../src'
import { createHealthRoute } from '../src'
import { evaluateHealth }    from '../src'

describe('health route', () => {
  const reconciledAt = new Date('2026-10-19T12:00:00Z')
  const after = (seconds: number) => new Date(reconciledAt.getTime() + seconds * 1000)

  const reconciled = () => {
    const status = new ControllerStatus()

    status.markReconciled(reconciledAt)

    return status
  }

  it('should report no heartbeat before the first tick completes', async () => {
    const response = await createHealthRoute(new ControllerStatus()).request('/health')

    expect(response.status).toBe(503)
    expect(await response.text()).toBe('no heartbeat')
  })

  it('should be healthy while the heartbeat is fresh', async () => {
    const response = await createHealthRoute(reconciled(), { now: () => after(30) }).request('/')

    expect(response.status).toBe(200)
    expect(await response.text()).toBe('healthy')
  })

  it('should report a stale heartbeat', async () => {
    const response = await createHealthRoute(reconciled(), { now: () => after(300) }).request('/')

    expect(response.status).toBe(503)
    expect(await response.text()).toBe('stale')
  })

  it('should switch to stale at exactly 120 seconds', () => {
    const snapshot = reconciled().snapshot()

    expect(evaluateHealth(snapshot, after(119))).toBe('healthy')
    expect(evaluateHealth(snapshot, after(120))).toBe('stale')
  })

  it('should follow new heartbeats', async () => {
    const status = reconciled()
    const route = createHealthRoute(status, { now: () => after(200) })

    expect((await route.request('/')).status).toBe(503)

    status.markReconciled(after(150))

    expect((await route.request('/')).status).toBe(200)
  })
})
