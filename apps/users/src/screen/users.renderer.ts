import { h } from '@users-screen/dom'
import type { ViewNode } from '@users-screen/dom'
import type { UserRecord } from '../api/api'
import type { ScreenState } from './screen-state'

/** The login, or 'User #<id>' when the server sent none. */
export function displayName(user: UserRecord): string {
  return user.name ? user.name : `User #${user.id}`
}

function renderUserRow(user: UserRecord): ViewNode {
  const name = displayName(user)
  return h('li', { class: 'user-row', 'data-user-id': user.id },
    user.avatarUrl !== undefined &&
      h('img', { class: 'user-avatar', src: user.avatarUrl, alt: name, width: 40, height: 40 }),
    h('span', { class: 'user-name' }, name),
  )
}

function renderBody(state: ScreenState): ViewNode | null {
  switch (state.status) {
    case 'start':
      return null
    case 'loading':
      return h('div', { class: 'progress-overlay', role: 'progressbar', 'aria-busy': 'true', 'aria-label': 'Loading users' },
        h('div', { class: 'spinner' }),
      )
    case 'success':
      return state.users.length === 0
        ? h('p', { class: 'empty-message' }, 'No users found')
        : h('ul', { class: 'user-list' }, state.users.map(renderUserRow))
    case 'failure':
      return h('p', { class: 'error-message', role: 'alert' }, state.message)
    default: {
      const unhandled: never = state
      throw new Error(`Unhandled screen state: ${JSON.stringify(unhandled)}`)
    }
  }
}

/**
 * renderUsersScreen(state)
 *
 * Pure: the same state always yields an equal tree.
 *
 *   start    → empty section
 *   loading  → progress overlay
 *   success  → one row per user (avatar + name), in order
 *   failure  → centered error text
 */
export function renderUsersScreen(state: ScreenState): ViewNode {
  return h('section', { class: 'users-screen', 'data-status': state.status }, renderBody(state))
}
