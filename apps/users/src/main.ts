import { setDomErrorHandler } from '@users-screen/dom'
import { createApi } from './api/api'
import { resolveConfig } from './config'
import { errorHandler, errorSub } from './error-handler'
import { mountUsersScreen } from './screen/users.screen'
import { createUsersViewModel } from './screen/users.view-model'

import './style.css'

// ---------------------------------------------------------------------------
// Wiring
// ---------------------------------------------------------------------------

const config = resolveConfig(import.meta.env)

setDomErrorHandler((error, context) => errorHandler.reportError(error, 'dom', context))

const api = createApi(config)

const viewModel = createUsersViewModel({
  fetcher: api.users,
  errorHandler,
  debug: config.debug,
})

// ---------------------------------------------------------------------------
// Mount
// ---------------------------------------------------------------------------

const root = document.getElementById('app')
if (!root) throw new Error('Missing #app mount point in index.html')

const sub = mountUsersScreen(root, viewModel)

// HMR cleanup
if (import.meta.hot) {
  import.meta.hot.dispose(() => {
    sub.unsubscribe()
    errorSub.unsubscribe()
  })
}
