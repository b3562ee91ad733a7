import type { ChapterError, Result } from './errors'

/**
 * Value of a successful result; throws the result's error otherwise
 */
export function expectOk<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error
  }
  return result.value
}

/**
 * Error of a failed result; throws when the result succeeded
 */
export function expectError<T>(result: Result<T>): ChapterError {
  if (result.ok) {
    throw new Error(`Expected a failure, got ${JSON.stringify(result.value)}`)
  }
  return result.error
}
