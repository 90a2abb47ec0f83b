import type { ParseError, Result } from '../types.ts'

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value }
}

export function err(error: ParseError): Result<never> {
	return { ok: false, error }
}
