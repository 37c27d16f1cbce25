export * from './controller'
export * from './controller.interfaces'
export * from './kube-config.utils'
