import type { Observable } from 'rxjs'
import { map } from 'rxjs/operators'
import { createHttpClient } from '@users-screen/http'
import type { HttpClient, HttpInterceptor } from '@users-screen/http'
import type { AppConfig } from '../config'
import { decodeUsers } from './decode'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface UserRecord {
  readonly id: number
  /** The account login; absent when the server sent none. */
  readonly name?: string
  readonly avatarUrl?: string
}

export interface UserFetcher {
  /**
   * One GET per subscription: emits the decoded list once and completes,
   * or errors (network failure, non-2xx, timeout, malformed body).
   * Unsubscribing aborts the request.
   */
  fetchUsers(): Observable<readonly UserRecord[]>
}

// ---------------------------------------------------------------------------
// Interceptors
// ---------------------------------------------------------------------------

export const loggingInterceptor: HttpInterceptor = {
  request: (config) => {
    console.debug(`[http] ${config.method ?? 'GET'} ${config.url}`)
    return config
  },
}

// ---------------------------------------------------------------------------
// Fetcher
// ---------------------------------------------------------------------------

export function createUserFetcher(http: HttpClient, path: string): UserFetcher {
  return {
    fetchUsers: () => http.get<unknown>(path).pipe(map(decodeUsers)),
  }
}

// ---------------------------------------------------------------------------
// API
// ---------------------------------------------------------------------------

/**
 * createApi(config)
 *
 * @example
 *   const api = createApi(resolveConfig(import.meta.env))
 *   api.users.fetchUsers().subscribe(console.log)
 */
export function createApi(config: AppConfig): { users: UserFetcher } {
  const http = createHttpClient({
    baseUrl: config.baseUrl,
    timeoutMs: config.requestTimeoutMs,
    interceptors: config.debug ? [loggingInterceptor] : [],
  })

  return {
    users: createUserFetcher(http, config.usersPath),
  }
}
