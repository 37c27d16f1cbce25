import { createServer }       from 'node:http'

import { getRequestListener } from '@hono/node-server'
import { Hono }               from 'hono'

import { Logger }             from '@cert-sync/logger'

export interface HttpServerOptions {
  name: string
  port: number
  app: Hono
}

export interface HttpServer {
  port: number
  close: () => Promise<void>
}

export const startHttpServer = async ({
  name,
  port,
  app,
}: HttpServerOptions): Promise<HttpServer> => {
  const logger = new Logger(name)
  const server = createServer(getRequestListener(app.fetch))

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject)
    server.listen(port, () => {
      server.off('error', reject)
      resolve()
    })
  })

  const address = server.address()
  const listeningPort = typeof address === 'object' && address ? address.port : port

  logger.info(`Listening on :${listeningPort}`)

  return {
    port: listeningPort,
    close: async (): Promise<void> =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error)
          } else {
            logger.info('Closed')
            resolve()
          }
        })

        server.closeIdleConnections()
      }),
  }
}
