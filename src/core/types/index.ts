export * from './app-profile'
export * from './capture-config'
export * from './usage'
export * from './task-run'
export * from './result'
