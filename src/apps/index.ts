export { AppRegistry, AppRegistryError } from './app-registry'
export { builtInApps, exampleTasks } from './profiles'
export { detectApp } from './detect'
