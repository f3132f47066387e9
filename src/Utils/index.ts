export * from './collector-errors'
export * from './make-mutex'
export type { ILogger } from './logger'
