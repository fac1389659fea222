/**
 * Error type guards and message extraction.
 */

/** Safely extract the message from an unknown thrown value */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}

/** Ensure an unknown thrown value is an Error instance */
export function ensureError(value: unknown): Error {
  if (value instanceof Error) return value
  return new Error(String(value))
}
