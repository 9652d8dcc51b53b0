import { BehaviorSubject, Observable, OperatorFunction, Subject } from 'rxjs'
import { filter, scan, shareReplay, startWith } from 'rxjs/operators'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Reducer<S, A> = (state: S, action: A) => S

export interface Store<S, A> {
  /** Multicasted state stream. Replays the latest value to late subscribers. */
  state$: Observable<S>
  /**
   * Stream of every dispatched action, emitted after the reducer has run.
   * Effects (HTTP calls, timers) hang off this stream instead of the reducer.
   *
   * @example
   *   store.actions$.pipe(
   *     ofType('FETCH'),
   *     switchMap(() => fetcher.fetchUsers().pipe(
   *       map(users => ({ type: 'FETCH_SUCCESS' as const, users })),
   *     )),
   *   ).subscribe(action => store.dispatch(action))
   */
  actions$: Observable<A>
  /** Run an action through the reducer. Subscribers see the new state synchronously. */
  dispatch(action: A): void
  /** Synchronous snapshot of the current state. */
  getState(): S
  /**
   * Complete the store. `state$` and `actions$` complete, and later
   * dispatches are dropped.
   */
  destroy(): void
}

// ---------------------------------------------------------------------------
// createStore
// ---------------------------------------------------------------------------

/**
 * createStore<S, A>(reducer, initialState)
 *
 * MVU-style store built on RxJS:
 *
 *   dispatch(action) → Subject<A> → scan(reducer) → startWith(initial) → shareReplay(1)
 *                          │                                                  ↓
 *                          └──────────────→ actions$                   state$
 *
 * State is reduced before the action is re-emitted on `actions$`, so an
 * effect reading `getState()` always sees the state the action produced.
 *
 * @example
 *   type State = { status: 'idle' | 'busy' }
 *   type Action = { type: 'START' } | { type: 'STOP' }
 *
 *   const store = createStore<State, Action>(
 *     (s, a) => {
 *       switch (a.type) {
 *         case 'START': return { status: 'busy' }
 *         case 'STOP':  return { status: 'idle' }
 *       }
 *     },
 *     { status: 'idle' },
 *   )
 *
 *   store.state$.subscribe(s => console.log(s.status))
 *   store.dispatch({ type: 'START' })
 */
export function createStore<S, A>(reducer: Reducer<S, A>, initialState: S): Store<S, A> {
  const reduceSubject = new Subject<A>()
  const actionsSubject = new Subject<A>()
  const stateBs = new BehaviorSubject<S>(initialState)
  let destroyed = false

  const state$ = reduceSubject.pipe(
    scan(reducer, initialState),
    startWith(initialState),
    shareReplay({ bufferSize: 1, refCount: false }),
  )

  // Keeps the synchronous snapshot current and the pipeline hot
  state$.subscribe((s) => stateBs.next(s))

  return {
    state$,
    actions$: actionsSubject.asObservable(),
    dispatch(action: A) {
      if (destroyed) return
      reduceSubject.next(action)
      actionsSubject.next(action)
    },
    getState(): S {
      return stateBs.value
    },
    destroy() {
      if (destroyed) return
      destroyed = true
      reduceSubject.complete()
      actionsSubject.complete()
    },
  }
}

// ---------------------------------------------------------------------------
// ofType — filter actions by their `type` property
// ---------------------------------------------------------------------------

/**
 * ofType(...types)
 *
 * Filters an action stream down to the listed `type`s and narrows the
 * action type accordingly.
 */
export function ofType<A extends { type: string }, K extends A['type']>(
  ...types: [K, ...K[]]
): OperatorFunction<A, Extract<A, { type: K }>> {
  const wanted = new Set<string>(types)
  return filter((action: A): action is Extract<A, { type: K }> => wanted.has(action.type))
}
