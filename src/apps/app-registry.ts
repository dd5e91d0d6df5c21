import { AppProfileSchema, type AppProfile, type AppProfileInput } from '../core/types'
import { builtInApps } from './profiles'

export class AppRegistryError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'AppRegistryError'
  }
}

/**
 * Lookup table of supported applications.
 *
 * Built-ins come first; custom profiles with a built-in key replace it in
 * place, new keys are appended. Iteration order is what detection uses.
 */
export class AppRegistry {
  private apps = new Map<string, AppProfile>()

  constructor(customApps: Record<string, AppProfileInput> = {}) {
    Object.values(builtInApps).forEach((app) => {
      this.apps.set(app.key, app)
    })

    Object.entries(customApps).forEach(([key, input]) => {
      const normalizedKey = (input.key ?? key).toLowerCase()
      const parsed = AppProfileSchema.safeParse({ ...input, key: normalizedKey })
      if (!parsed.success) {
        throw new AppRegistryError(
          `Invalid app profile "${key}": ${parsed.error.issues.map((issue) => issue.message).join(', ')}`,
        )
      }
      this.apps.set(normalizedKey, Object.freeze(parsed.data))
    })
  }

  getApp(key: string): AppProfile {
    const app = this.findApp(key)
    if (!app) {
      throw new AppRegistryError(`App not found: ${key}`)
    }
    return app
  }

  findApp(key: string): AppProfile | undefined {
    return this.apps.get(key.toLowerCase())
  }

  hasApp(key: string): boolean {
    return this.apps.has(key.toLowerCase())
  }

  keys(): string[] {
    return Array.from(this.apps.keys())
  }

  listApps(): AppProfile[] {
    return Array.from(this.apps.values())
  }
}
