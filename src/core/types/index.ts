export * from './target'
export * from './execution'
export * from './reporting'
export * from './config'
