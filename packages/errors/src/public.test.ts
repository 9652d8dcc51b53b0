/**
 * @vitest-environment jsdom
 */
import { describe, it, expect, vi, afterEach } from 'vitest'
import { Observable, Subject, of, throwError } from 'rxjs'
import { map, switchMap } from 'rxjs/operators'
import { createErrorHandler, catchAndReport, toError } from './public'
import type { AppError, ErrorHandler } from './public'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let cleanupSubs: Array<{ unsubscribe(): void }> = []

afterEach(() => {
  cleanupSubs.forEach((s) => s.unsubscribe())
  cleanupSubs = []
})

function makeHandler(): { handler: ErrorHandler; collected: AppError[] } {
  const [handler, sub] = createErrorHandler({ enableGlobalCapture: false })
  const collected: AppError[] = []
  cleanupSubs.push(sub, handler.errors$.subscribe((e) => collected.push(e)))
  return { handler, collected }
}

// ---------------------------------------------------------------------------
// toError
// ---------------------------------------------------------------------------

describe('toError', () => {
  it('returns Error instances unchanged', () => {
    const err = new TypeError('bad')
    expect(toError(err)).toBe(err)
  })

  it('wraps strings', () => {
    expect(toError('oops').message).toBe('oops')
  })

  it('serialises plain objects', () => {
    expect(toError({ code: 42 }).message).toBe('{"code":42}')
  })

  it('falls back to String() for values JSON cannot serialise', () => {
    expect(toError(10n).message).toBe('10')
  })
})

// ---------------------------------------------------------------------------
// createErrorHandler
// ---------------------------------------------------------------------------

describe('createErrorHandler', () => {
  it('errors$ emits reported errors with source "manual" by default', () => {
    const { handler, collected } = makeHandler()

    handler.reportError(new Error('boom'))

    expect(collected).toHaveLength(1)
    expect(collected[0].message).toBe('boom')
    expect(collected[0].source).toBe('manual')
    expect(collected[0].context).toBeUndefined()
  })

  it('records explicit source and context', () => {
    const { handler, collected } = makeHandler()

    handler.reportError('render failed', 'dom', 'users/render')

    expect(collected[0].source).toBe('dom')
    expect(collected[0].context).toBe('users/render')
    expect(collected[0].error).toBeInstanceOf(Error)
  })

  it('calls onError synchronously', () => {
    const onError = vi.fn()
    const [handler, sub] = createErrorHandler({ enableGlobalCapture: false, onError })
    cleanupSubs.push(sub)

    handler.reportError(new Error('sync test'))

    expect(onError).toHaveBeenCalledOnce()
    expect(onError.mock.calls[0][0].message).toBe('sync test')
  })

  it('does not replay to late subscribers', () => {
    const [handler, sub] = createErrorHandler({ enableGlobalCapture: false })
    cleanupSubs.push(sub)
    handler.reportError(new Error('early'))

    const collected: AppError[] = []
    cleanupSubs.push(handler.errors$.subscribe((e) => collected.push(e)))

    expect(collected).toHaveLength(0)
  })

  it('stamps each error with the capture time', () => {
    const { handler, collected } = makeHandler()

    const before = Date.now()
    handler.reportError(new Error('timed'))
    const after = Date.now()

    expect(collected[0].timestamp).toBeGreaterThanOrEqual(before)
    expect(collected[0].timestamp).toBeLessThanOrEqual(after)
  })

  it('captures window error events', () => {
    const [handler, sub] = createErrorHandler({ enableGlobalCapture: true })
    const collected: AppError[] = []
    cleanupSubs.push(sub, handler.errors$.subscribe((e) => collected.push(e)))

    window.dispatchEvent(
      new ErrorEvent('error', { error: new Error('global boom'), message: 'global boom' }),
    )

    expect(collected).toHaveLength(1)
    expect(collected[0].source).toBe('global')
    expect(collected[0].message).toBe('global boom')
  })

  it('captures unhandled rejections', () => {
    const [handler, sub] = createErrorHandler({ enableGlobalCapture: true })
    const collected: AppError[] = []
    cleanupSubs.push(sub, handler.errors$.subscribe((e) => collected.push(e)))

    const event = new Event('unhandledrejection')
    Object.defineProperty(event, 'reason', { value: new Error('promise fail') })
    window.dispatchEvent(event)

    expect(collected).toHaveLength(1)
    expect(collected[0].source).toBe('promise')
    expect(collected[0].message).toBe('promise fail')
  })

  it('detaches global listeners and completes errors$ on unsubscribe', () => {
    const [handler, sub] = createErrorHandler({ enableGlobalCapture: true })
    const collected: AppError[] = []
    let completed = false
    handler.errors$.subscribe({
      next: (e) => collected.push(e),
      complete: () => { completed = true },
    })

    sub.unsubscribe()
    window.dispatchEvent(new ErrorEvent('error', { error: new Error('late'), message: 'late' }))

    expect(collected).toHaveLength(0)
    expect(completed).toBe(true)
  })
})

// ---------------------------------------------------------------------------
// catchAndReport
// ---------------------------------------------------------------------------

describe('catchAndReport', () => {
  it('passes values through when no error occurs', () => {
    const { handler, collected } = makeHandler()
    const values: number[] = []

    of(1, 2, 3).pipe(catchAndReport(handler)).subscribe((v) => values.push(v))

    expect(values).toEqual([1, 2, 3])
    expect(collected).toHaveLength(0)
  })

  it('reports with source "observable" and the given context, then completes', () => {
    const { handler, collected } = makeHandler()
    let completed = false

    throwError(() => new Error('bang'))
      .pipe(catchAndReport(handler, { context: 'usersViewModel/fetchUsers' }))
      .subscribe({ complete: () => { completed = true } })

    expect(collected).toHaveLength(1)
    expect(collected[0].message).toBe('bang')
    expect(collected[0].source).toBe('observable')
    expect(collected[0].context).toBe('usersViewModel/fetchUsers')
    expect(completed).toBe(true)
  })

  it('emits a fallback value', () => {
    const { handler } = makeHandler()
    const values: string[] = []

    throwError(() => new Error('fail'))
      .pipe(catchAndReport<string>(handler, { fallback: 'default' }))
      .subscribe((v) => values.push(v))

    expect(values).toEqual(['default'])
  })

  it('emits a fallback Observable', () => {
    const { handler } = makeHandler()
    const values: number[] = []

    throwError(() => new Error('fail'))
      .pipe(catchAndReport<number>(handler, { fallback: of(10, 20) }))
      .subscribe((v) => values.push(v))

    expect(values).toEqual([10, 20])
  })

  it('computes the fallback from the normalised error', () => {
    const { handler } = makeHandler()
    const values: Array<{ type: 'FAILED'; message: string }> = []

    throwError(() => 'offline')
      .pipe(
        catchAndReport<{ type: 'FAILED'; message: string }>(handler, {
          fallback: (err) => ({ type: 'FAILED', message: err.message }),
        }),
      )
      .subscribe((v) => values.push(v))

    expect(values).toEqual([{ type: 'FAILED', message: 'offline' }])
  })

  it('keeps an outer switchMap pipeline alive after an inner failure', () => {
    const { handler, collected } = makeHandler()
    const trigger$ = new Subject<boolean>()
    const results: string[] = []
    const load = (ok: boolean): Observable<string> =>
      ok ? of('loaded') : throwError(() => new Error('nope'))

    cleanupSubs.push(
      trigger$
        .pipe(
          switchMap((ok) =>
            load(ok).pipe(
              map((v) => v.toUpperCase()),
              catchAndReport<string>(handler, { fallback: (e) => `error: ${e.message}` }),
            ),
          ),
        )
        .subscribe((v) => results.push(v)),
    )

    trigger$.next(false)
    trigger$.next(true)

    expect(results).toEqual(['error: nope', 'LOADED'])
    expect(collected).toHaveLength(1)
  })
})
