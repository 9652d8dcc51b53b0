// ---------------------------------------------------------------------------
// Configurable error handler for DOM sinks
// ---------------------------------------------------------------------------

/**
 * @param error  The error thrown or emitted while rendering
 * @param context  Identifies the sink that failed (e.g. `'render'`, `'mount'`)
 */
export type DomErrorHandler = (error: unknown, context: string) => void

const defaultHandler: DomErrorHandler = (error, context) => {
  console.warn(`[@users-screen/dom] Error in ${context}:`, error)
}

let handler: DomErrorHandler = defaultHandler

/**
 * Replace the error handler used by every DOM sink. The default logs with
 * `console.warn`.
 *
 * @example
 * ```ts
 * setDomErrorHandler((error, context) => {
 *   errorHandler.reportError(error, 'dom', context)
 * })
 * ```
 */
export function setDomErrorHandler(fn: DomErrorHandler): void {
  handler = fn
}

/** Restore the `console.warn` handler. */
export function resetDomErrorHandler(): void {
  handler = defaultHandler
}

/**
 * Internal: forward to the configured handler. A handler that throws is
 * logged and otherwise ignored so rendering keeps going.
 */
export function handleDomError(error: unknown, context: string): void {
  try {
    handler(error, context)
  } catch (handlerError) {
    console.error('[@users-screen/dom] DOM error handler threw:', handlerError)
  }
}
