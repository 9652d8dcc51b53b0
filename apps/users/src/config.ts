// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AppConfig {
  /** Origin of the users API. */
  readonly baseUrl: string
  /** Collection path, resolved against baseUrl. */
  readonly usersPath: string
  /** 0 means the request never times out. */
  readonly requestTimeoutMs: number
  /** Enables the HTTP and store console loggers. */
  readonly debug: boolean
}

/** Shape of Vite's `import.meta.env`. */
export type EnvRecord = Readonly<Record<string, string | boolean | undefined>>

export class ConfigError extends Error {
  constructor(readonly variable: string, message: string) {
    super(`${variable}: ${message}`)
    this.name = 'ConfigError'
  }
}

export const DEFAULT_CONFIG: AppConfig = Object.freeze({
  baseUrl: 'https://api.github.com',
  usersPath: '/users',
  requestTimeoutMs: 0,
  debug: false,
})

// ---------------------------------------------------------------------------
// resolveConfig
// ---------------------------------------------------------------------------

function readString(env: EnvRecord, name: string): string | undefined {
  const raw = env[name]
  if (typeof raw !== 'string') return undefined
  const value = raw.trim()
  return value === '' ? undefined : value
}

function readNonNegativeInt(env: EnvRecord, name: string): number | undefined {
  const raw = readString(env, name)
  if (raw === undefined) return undefined
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(name, `expected a non-negative integer, got "${raw}"`)
  }
  return Number(raw)
}

/**
 * resolveConfig(env)
 *
 *   VITE_USERS_BASE_URL      → baseUrl           (https://api.github.com)
 *   VITE_USERS_PATH          → usersPath         (/users)
 *   VITE_REQUEST_TIMEOUT_MS  → requestTimeoutMs  (0)
 *   DEV                      → debug             (false)
 *
 * Blank values count as unset.
 *
 * @example
 *   const config = resolveConfig(import.meta.env)
 */
export function resolveConfig(env: EnvRecord): AppConfig {
  return Object.freeze({
    baseUrl: readString(env, 'VITE_USERS_BASE_URL') ?? DEFAULT_CONFIG.baseUrl,
    usersPath: readString(env, 'VITE_USERS_PATH') ?? DEFAULT_CONFIG.usersPath,
    requestTimeoutMs: readNonNegativeInt(env, 'VITE_REQUEST_TIMEOUT_MS') ?? DEFAULT_CONFIG.requestTimeoutMs,
    debug: env.DEV === true || env.DEV === 'true',
  })
}
