/**
 * Result type: explicit success/failure for steps whose failure is an outcome
 * rather than an exception (confirmation, backup, remediation)
 */

import { ensureError } from './assertError.js'

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

/** Settle a promise into a Result; thrown non-Errors are wrapped */
export async function fromPromise<T>(promise: Promise<T>): Promise<Result<T, Error>> {
  try {
    return ok(await promise)
  } catch (e) {
    return err(ensureError(e))
  }
}
