import type { Observable } from 'rxjs'
import { Subscription } from 'rxjs'
import { distinctUntilChanged } from 'rxjs/operators'
import { handleDomError } from './error-handler'
import { createElementFrom, isSameView } from './node'
import type { ViewNode } from './node'

type Unsub = () => void

/**
 * render(el)(view$)
 *
 * Replaces el's children with the tree of each incoming ViewNode.
 * Structurally equal consecutive trees are skipped. Errors, whether thrown
 * while building the DOM or emitted by view$, go to the DOM error handler;
 * a failed build leaves the previous content in place.
 */
export function render(el: Element) {
  return (view$: Observable<ViewNode>): Subscription =>
    view$.pipe(distinctUntilChanged<ViewNode>(isSameView)).subscribe({
      next: (node) => {
        try {
          el.replaceChildren(createElementFrom(node, el.ownerDocument))
        } catch (e) {
          handleDomError(e, 'render')
        }
      },
      error: (e: unknown) => handleDomError(e, 'render'),
    })
}

/**
 * mount(root, setup)
 *
 * Run setup once, return one Subscription representing the whole view
 * lifecycle. Teardown functions returned by setup run on unsubscribe.
 *
 * @example
 *   const sub = mount(root, (el) => [
 *     render(el)(vm.state$.pipe(map(renderUsersScreen))),
 *     () => vm.destroy(),
 *   ])
 */
export function mount(
  root: Element,
  setup: (root: Element) => Subscription | Array<Subscription | Unsub>,
): Subscription {
  const s = new Subscription()
  const out = setup(root)
  const items = Array.isArray(out) ? out : [out]
  for (const it of items) {
    s.add(typeof it === 'function' ? guard(it) : it)
  }
  return s
}

function guard(fn: Unsub): Unsub {
  return () => {
    try {
      fn()
    } catch (e) {
      handleDomError(e, 'mount/teardown')
    }
  }
}
