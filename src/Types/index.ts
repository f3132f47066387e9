export * from './SessionCollector'
