export * from './api-contracts'
export * from './log-event'
export * from './tunnel-contracts'
