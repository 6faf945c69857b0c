export * from './status'
export * from './errors'
export * from './request'
export * from './header'
export * from './dispatch'
export * from './stream'
export * from './transport'
export * from './exchange'
export type * from './types'
