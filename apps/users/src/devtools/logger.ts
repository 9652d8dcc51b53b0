import { Subscription } from 'rxjs'
import { pairwise } from 'rxjs/operators'
import type { Store } from '@users-screen/store'

/**
 * Logs every action and every state change of a store to the console.
 * Unsubscribe the result to stop logging.
 *
 * @param name Label prefixed to each line (e.g. 'UsersScreen').
 */
export function createLogger<S, A extends { type: string }>(
  store: Store<S, A>,
  name = 'Store',
): Subscription {
  const sub = new Subscription()

  sub.add(
    store.actions$.subscribe((action) => {
      console.debug(`[${name}] action ${action.type}`, action)
    }),
  )

  sub.add(
    store.state$.pipe(pairwise()).subscribe(([prev, next]) => {
      console.debug(`[${name}] state`, prev, '→', next)
    }),
  )

  return sub
}
