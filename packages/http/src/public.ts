import { defer, Observable } from 'rxjs'
import { ajax, AjaxConfig, AjaxError, AjaxTimeoutError } from 'rxjs/ajax'
import { map } from 'rxjs/operators'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HttpRequestOptions
  extends Omit<AjaxConfig, 'url' | 'method' | 'body'> {}

export interface HttpClient {
  /**
   * Cold Observable: the request is sent on subscribe, emits the decoded
   * body once and completes. Unsubscribing aborts the in-flight XHR.
   */
  get<T>(url: string, options?: HttpRequestOptions): Observable<T>
}

/** Rewrites the outgoing request config before the XHR is opened. */
export interface HttpInterceptor {
  request(config: AjaxConfig): AjaxConfig
}

export interface HttpClientConfig {
  /** Prepended to relative paths. Trailing slashes are ignored. */
  baseUrl?: string
  /** Milliseconds before the request fails with a timeout. 0 disables it. */
  timeoutMs?: number
  /** Applied left to right. */
  interceptors?: HttpInterceptor[]
}

// ---------------------------------------------------------------------------
// createHttpClient
// ---------------------------------------------------------------------------

function isAbsolute(url: string): boolean {
  return url.startsWith('http://') || url.startsWith('https://')
}

/**
 * createHttpClient(config?)
 *
 * JSON-over-XHR client built on `rxjs/ajax`. Non-2xx responses error with
 * an `AjaxError` carrying the status.
 *
 * Interceptor execution order:
 *   interceptor[0].request → interceptor[1].request → … → baseUrl → XHR
 *
 * @example
 *   const http = createHttpClient({
 *     baseUrl: 'https://api.github.com',
 *     interceptors: [{ request: (c) => { console.debug(c.url); return c } }],
 *   })
 *
 *   http.get<unknown>('/users').subscribe(console.log) // → GET https://api.github.com/users
 */
export function createHttpClient(config?: HttpClientConfig): HttpClient {
  const baseUrl = config?.baseUrl?.replace(/\/+$/, '') ?? ''
  const timeoutMs = config?.timeoutMs ?? 0
  const interceptors = config?.interceptors ?? []

  function prepare(initial: AjaxConfig): AjaxConfig {
    let cfg: AjaxConfig = {
      timeout: timeoutMs,
      ...initial,
      headers: { Accept: 'application/json', ...initial.headers },
    }

    for (const i of interceptors) {
      cfg = i.request(cfg)
    }

    if (baseUrl && !isAbsolute(cfg.url)) {
      cfg = { ...cfg, url: baseUrl + (cfg.url.startsWith('/') ? cfg.url : '/' + cfg.url) }
    }
    return cfg
  }

  function send<T>(initial: AjaxConfig): Observable<T> {
    // Interceptors run per subscription, so a re-subscribe is a fresh request
    return defer(() => ajax<T>(prepare(initial))).pipe(
      map((res) => res.response),
    )
  }

  return {
    get<T>(url: string, options?: HttpRequestOptions): Observable<T> {
      return send<T>({ responseType: 'json', ...options, url, method: 'GET' })
    },
  }
}

// ---------------------------------------------------------------------------
// describeHttpError
// ---------------------------------------------------------------------------

/**
 * describeHttpError(err)
 *
 * Collapses anything a request pipeline can throw into one non-empty,
 * human-readable line.
 *
 *   AjaxTimeoutError        → 'Request timed out'
 *   AjaxError, status 0     → 'Network request failed'
 *   AjaxError, status 404   → 'HTTP 404'
 *   Error('boom')           → 'boom'
 */
export function describeHttpError(err: unknown): string {
  if (err instanceof AjaxTimeoutError) return 'Request timed out'
  if (err instanceof AjaxError) {
    return err.status > 0 ? `HTTP ${err.status}` : 'Network request failed'
  }
  const message = err instanceof Error ? err.message : typeof err === 'string' ? err : ''
  return message.trim() === '' ? 'Unknown error' : message
}
