import type { UserRecord } from './api'

/** The response body was not a JSON array of users. */
export class MalformedResponseError extends Error {
  constructor(detail: string) {
    super(`Malformed response: ${detail}`)
    this.name = 'MalformedResponseError'
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(entry: Record<string, unknown>, field: string, index: number): string | undefined {
  const value = entry[field]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'string') {
    throw new MalformedResponseError(`user at index ${index} has a non-string "${field}"`)
  }
  return value
}

/**
 * decodeUsers(body)
 *
 * Turns a `[{ id, login?, avatar_url? }]` body into frozen UserRecords,
 * keeping the server's order. `login` and `avatar_url` may be absent or
 * null; `id` must be an integer and unique.
 *
 * @throws MalformedResponseError
 */
export function decodeUsers(body: unknown): readonly UserRecord[] {
  if (!Array.isArray(body)) {
    throw new MalformedResponseError('expected an array of users')
  }

  const seen = new Set<number>()
  const users = body.map((entry: unknown, index): UserRecord => {
    if (!isRecord(entry)) {
      throw new MalformedResponseError(`user at index ${index} is not an object`)
    }

    const id = entry.id
    if (typeof id !== 'number' || !Number.isInteger(id)) {
      throw new MalformedResponseError(`user at index ${index} has no integer "id"`)
    }
    if (seen.has(id)) {
      throw new MalformedResponseError(`duplicate user id ${id}`)
    }
    seen.add(id)

    const name = optionalString(entry, 'login', index)
    const avatarUrl = optionalString(entry, 'avatar_url', index)

    return Object.freeze({
      id,
      ...(name !== undefined ? { name } : {}),
      ...(avatarUrl !== undefined ? { avatarUrl } : {}),
    })
  })

  return Object.freeze(users)
}
