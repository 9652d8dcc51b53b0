import type { UserRecord } from '../api/api'

// ---------------------------------------------------------------------------
// ScreenState — what the users screen currently shows
// ---------------------------------------------------------------------------

export type ScreenState =
  | { readonly status: 'start' }
  | { readonly status: 'loading' }
  | { readonly status: 'success'; readonly users: readonly UserRecord[] }
  | { readonly status: 'failure'; readonly message: string }

const START: ScreenState = Object.freeze({ status: 'start' })
const LOADING: ScreenState = Object.freeze({ status: 'loading' })

export const start = (): ScreenState => START
export const loading = (): ScreenState => LOADING

/** Copies and freezes `users`, so later mutation of the source cannot leak in. */
export const success = (users: readonly UserRecord[]): ScreenState =>
  Object.freeze({ status: 'success', users: Object.freeze([...users]) })

/** Blank messages become 'Unknown error'; a failure always has text to show. */
export const failure = (message: string): ScreenState =>
  Object.freeze({ status: 'failure', message: message.trim() === '' ? 'Unknown error' : message })
