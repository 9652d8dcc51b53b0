import { EMPTY, Observable, OperatorFunction, Subject, Subscription, fromEvent, of } from 'rxjs'
import { catchError } from 'rxjs/operators'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AppError {
  /**
   * Where the error originated:
   *   'observable'  — caught inside an RxJS pipeline via catchAndReport
   *   'dom'         — thrown while rendering into the document
   *   'global'      — window 'error' event (uncaught JS error)
   *   'promise'     — 'unhandledrejection' event
   *   'manual'      — explicitly reported via handler.reportError(...)
   */
  source: 'observable' | 'dom' | 'global' | 'promise' | 'manual'
  /** The thrown value, normalised to an Error. */
  error: Error
  /** Alias for error.message. */
  message: string
  /** Date.now() at capture time. */
  timestamp: number
  /** Label identifying the pipeline or component, e.g. 'usersViewModel/fetchUsers'. */
  context?: string
}

export interface ErrorHandlerConfig {
  /**
   * Attach window 'error' and 'unhandledrejection' listeners (default true).
   * Ignored where there is no `window`.
   */
  enableGlobalCapture?: boolean
  /** Called synchronously for every reported error, before errors$ emits. */
  onError?: (error: AppError) => void
}

export interface ErrorHandler {
  /** Hot stream of every captured AppError. Does not replay. */
  errors$: Observable<AppError>
  reportError(error: unknown, source?: AppError['source'], context?: string): void
}

// ---------------------------------------------------------------------------
// toError
// ---------------------------------------------------------------------------

/** Normalise any thrown value to an Error. */
export function toError(raw: unknown): Error {
  if (raw instanceof Error) return raw
  if (typeof raw === 'string') return new Error(raw)
  try {
    return new Error(JSON.stringify(raw))
  } catch {
    return new Error(String(raw))
  }
}

// ---------------------------------------------------------------------------
// createErrorHandler
// ---------------------------------------------------------------------------

/**
 * createErrorHandler(config?)
 *
 * Creates the app-wide error handler. The returned Subscription removes the
 * global listeners when unsubscribed.
 *
 * @example
 *   const [handler, sub] = createErrorHandler({
 *     onError: (e) => console.error(`[${e.source}] ${e.message}`),
 *   })
 *   import.meta.hot?.dispose(() => sub.unsubscribe())
 */
export function createErrorHandler(config?: ErrorHandlerConfig): [ErrorHandler, Subscription] {
  const enableGlobal = config?.enableGlobalCapture ?? true
  const onError = config?.onError

  const bus = new Subject<AppError>()
  const cleanupSub = new Subscription()

  function reportError(raw: unknown, source: AppError['source'] = 'manual', context?: string): void {
    const error = toError(raw)
    const appError: AppError = {
      source,
      error,
      message: error.message,
      timestamp: Date.now(),
      context,
    }
    onError?.(appError)
    bus.next(appError)
  }

  if (enableGlobal && typeof window !== 'undefined') {
    cleanupSub.add(
      fromEvent<ErrorEvent>(window, 'error').subscribe((e) => {
        reportError(e.error ?? new Error(e.message), 'global')
      }),
    )
    cleanupSub.add(
      fromEvent<PromiseRejectionEvent>(window, 'unhandledrejection').subscribe((e) => {
        reportError(e.reason, 'promise')
      }),
    )
  }

  cleanupSub.add(() => bus.complete())

  return [{ errors$: bus.asObservable(), reportError }, cleanupSub]
}

// ---------------------------------------------------------------------------
// catchAndReport
// ---------------------------------------------------------------------------

export type Fallback<T> = T | Observable<T> | ((error: Error) => T)

export interface CatchAndReportOptions<T> {
  /**
   * What to emit after reporting: a value, an Observable, or a function of
   * the normalised error. The stream completes if omitted.
   */
  fallback?: Fallback<T>
  /** Label passed to AppError.context. */
  context?: string
}

function isFallbackFn<T>(fb: Fallback<T>): fb is (error: Error) => T {
  return typeof fb === 'function'
}

/**
 * catchAndReport(handler, options?)
 *
 * `catchError` that reports to the handler before falling back, so a failed
 * request becomes an ordinary value and the outer pipeline stays alive.
 *
 * @example
 *   fetcher.fetchUsers().pipe(
 *     map((users) => ({ type: 'FETCH_SUCCESS' as const, users })),
 *     catchAndReport(handler, {
 *       fallback: (err) => ({ type: 'FETCH_FAILURE' as const, message: err.message }),
 *       context: 'usersViewModel/fetchUsers',
 *     }),
 *   )
 */
export function catchAndReport<T>(
  handler: ErrorHandler,
  options?: CatchAndReportOptions<T>,
): OperatorFunction<T, T> {
  return (source: Observable<T>): Observable<T> =>
    source.pipe(
      catchError((raw: unknown): Observable<T> => {
        handler.reportError(raw, 'observable', options?.context)

        const fb = options?.fallback
        if (fb === undefined) return EMPTY
        if (fb instanceof Observable) return fb
        if (isFallbackFn(fb)) return of(fb(toError(raw)))
        return of(fb)
      }),
    )
}
