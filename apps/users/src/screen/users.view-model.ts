import { defer, Subscription } from 'rxjs'
import type { Observable, Observer } from 'rxjs'
import { map, switchMap } from 'rxjs/operators'
import { createStore, ofType } from '@users-screen/store'
import { catchAndReport } from '@users-screen/errors'
import type { ErrorHandler } from '@users-screen/errors'
import { describeHttpError } from '@users-screen/http'
import type { UserFetcher, UserRecord } from '../api/api'
import { createLogger } from '../devtools/logger'
import { failure, loading, start, success } from './screen-state'
import type { ScreenState } from './screen-state'

// ---------------------------------------------------------------------------
// Action / Reducer
// ---------------------------------------------------------------------------

export type ScreenAction =
  | { type: 'FETCH' }
  | { type: 'FETCH_SUCCESS'; users: readonly UserRecord[] }
  | { type: 'FETCH_FAILURE'; message: string }

/** Every action fully determines the next state; the previous one is not consulted. */
export function screenReducer(_state: ScreenState, action: ScreenAction): ScreenState {
  switch (action.type) {
    case 'FETCH':         return loading()
    case 'FETCH_SUCCESS': return success(action.users)
    case 'FETCH_FAILURE': return failure(action.message)
  }
}

// ---------------------------------------------------------------------------
// View model
// ---------------------------------------------------------------------------

export interface UsersViewModel {
  /** Replays the current state, then emits synchronously on every change. */
  readonly state$: Observable<ScreenState>
  readonly currentState: ScreenState
  subscribe(observer: Partial<Observer<ScreenState>> | ((state: ScreenState) => void)): Subscription
  /**
   * Enter 'loading' and start a fetch. A fetch still in flight is cancelled,
   * so the screen always reflects the most recent call.
   */
  triggerFetch(): void
  /** Cancel any in-flight fetch and freeze the state. Later calls are no-ops. */
  destroy(): void
}

export interface UsersViewModelOptions {
  fetcher: UserFetcher
  errorHandler: ErrorHandler
  /** Log actions and state changes to the console. */
  debug?: boolean
}

export function createUsersViewModel({
  fetcher,
  errorHandler,
  debug = false,
}: UsersViewModelOptions): UsersViewModel {
  const store = createStore<ScreenState, ScreenAction>(screenReducer, start())
  const scope = new Subscription()

  if (debug) scope.add(createLogger(store, 'UsersScreen'))

  // Effect: FETCH → fetch → FETCH_SUCCESS | FETCH_FAILURE
  scope.add(
    store.actions$.pipe(
      ofType('FETCH'),
      switchMap(() =>
        // defer: a fetcher that throws instead of erroring is caught below too
        defer(() => fetcher.fetchUsers()).pipe(
          map((users): ScreenAction => ({ type: 'FETCH_SUCCESS', users })),
          catchAndReport<ScreenAction>(errorHandler, {
            fallback: (err) => ({ type: 'FETCH_FAILURE', message: describeHttpError(err) }),
            context: 'usersViewModel/fetchUsers',
          }),
        ),
      ),
    ).subscribe((action) => store.dispatch(action)),
  )

  // Runs after the effect is torn down, so nothing is dispatched into a dead store
  scope.add(() => store.destroy())

  return {
    state$: store.state$,
    get currentState() {
      return store.getState()
    },
    subscribe(observer) {
      return store.state$.subscribe(observer)
    },
    triggerFetch() {
      store.dispatch({ type: 'FETCH' })
    },
    destroy() {
      scope.unsubscribe()
    },
  }
}
