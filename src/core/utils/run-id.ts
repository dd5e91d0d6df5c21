import { randomUUID } from 'node:crypto'

const pad = (value: number, width = 2) => value.toString().padStart(width, '0')

/**
 * Builds a run identifier like `20250114_093005_1f3a9c2e`.
 *
 * The timestamp keeps output directories sortable; the random suffix keeps two
 * runs started in the same second apart.
 */
export function createRunId(now: Date = new Date(), suffix: string = randomUUID().replace(/-/g, '').slice(0, 8)): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  return `${date}_${time}_${suffix}`
}
