import { createErrorHandler } from '@users-screen/errors'
import type { AppError } from '@users-screen/errors'

export function formatAppError(e: AppError): string {
  return `[${e.source}]${e.context ? ` ${e.context}:` : ''} ${e.message}`
}

export const [errorHandler, errorSub] = createErrorHandler({
  enableGlobalCapture: true,
  onError: (e) => console.error(formatAppError(e)),
})
