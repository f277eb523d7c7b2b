export * from './emitter'
export * from './cli-adapter'
