import type { AppRegistry } from './app-registry'

/**
 * Finds the application a task refers to.
 *
 * The first registry key (in insertion order) that occurs anywhere in the
 * lower-cased task wins. No scoring, no fuzzy matching.
 */
export function detectApp(task: string, registry: AppRegistry): string | undefined {
  const taskLower = task.toLowerCase()
  return registry.keys().find((key) => taskLower.includes(key))
}
