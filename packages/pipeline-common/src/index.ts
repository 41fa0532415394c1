export * from './types'
export * from './record'
export * from './errors'
export * from './logger'
export * from './lines'
