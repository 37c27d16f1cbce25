import { get }                from 'node:http'

import { ControllerStatus }   from '../src'
import { HttpServer }         from '../src'
import { createHealthRoute }  from '../src'
import { startHttpServer }    from '../src'

const request = async (port: number): Promise<{ status?: number; body: string }> =>
  new Promise((resolve, reject) => {
    get({ host: '127.0.0.1', port, path: '/', agent: false }, (response) => {
      let body = ''

      response.setEncoding('utf8')
      response.on('data', (chunk: string) => {
        body += chunk
      })
      response.on('end', () => resolve({ status: response.statusCode, body }))
    }).on('error', reject)
  })

describe('http server', () => {
  let server: HttpServer | undefined

  afterEach(async () => {
    await server?.close()
    server = undefined
  })

  it('should serve a route until closed', async () => {
    server = await startHttpServer({
      name: 'HealthServer',
      port: 0,
      app: createHealthRoute(new ControllerStatus()),
    })

    expect(server.port).toBeGreaterThan(0)
    await expect(request(server.port)).resolves.toEqual({ status: 503, body: 'no heartbeat' })

    const { port } = server

    await server.close()
    server = undefined

    await expect(request(port)).rejects.toThrow('ECONNREFUSED')
  })
})
