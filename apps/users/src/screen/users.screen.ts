import type { Subscription } from 'rxjs'
import { map } from 'rxjs/operators'
import { mount, render } from '@users-screen/dom'
import { renderUsersScreen } from './users.renderer'
import type { UsersViewModel } from './users.view-model'

/**
 * mountUsersScreen(root, viewModel)
 *
 * Renders every state of `viewModel` into `root` and starts the first fetch.
 * Unsubscribing stops rendering, destroys the view model (cancelling any
 * in-flight fetch) and empties `root`.
 */
export function mountUsersScreen(root: Element, viewModel: UsersViewModel): Subscription {
  return mount(root, (el) => {
    const renderSub = render(el)(viewModel.state$.pipe(map(renderUsersScreen)))
    viewModel.triggerFetch()
    return [
      renderSub,
      () => viewModel.destroy(),
      () => el.replaceChildren(),
    ]
  })
}
