export * from './session-collector'
export * from './sweep-directory'
