export * from './ssh'
export * from './ssh.interfaces'
export * from './quote.utils'
