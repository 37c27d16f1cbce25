export * from './certificate.api'
export * from './certificate.guards'
export * from './certificate.interfaces'
export * from './certificate.types'
