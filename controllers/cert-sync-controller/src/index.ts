export * from './cert-sync.controller'
export * from './cert-sync.application'
export * from './cert-manager.source-origin'
export * from './certificate-source.discovery'
export * from './certificate-source.interfaces'
export * from './certificate.syncer'
export * from './controller.config'
export * from './controller.status'
export * from './errors'
export * from './file.hash-store'
export * from './hash-store.interfaces'
export * from './ingress.source-origin'
export * from './kubernetes.secret-reader'
export * from './remote-transport.interfaces'
export * from './secret-reader.interfaces'
export * from './ssh-identity'
export * from './ssh.remote-transport'
export * from './sync-outcome.interfaces'
export * from './traefik-config.generator'
export * from './server/health.route'
export * from './server/http.server'
export * from './server/metrics.route'
