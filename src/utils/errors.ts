import type { ParseError, Result } from '../types.ts'

/**
 * Base error class for comver errors
 */
export class ComverError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		public readonly suggestion?: string
	) {
		super(message)
		this.name = 'ComverError'
	}
}

/**
 * Comment or version that could not be parsed
 */
export class ParseFailure extends ComverError {
	constructor(
		public readonly reason: ParseError,
		message: string,
		suggestion?: string
	) {
		super(message, reason.code, suggestion)
		this.name = 'ParseFailure'
	}
}

/**
 * Configuration errors
 */
export class ConfigError extends ComverError {
	constructor(message: string, suggestion?: string) {
		super(message, 'CONFIG_ERROR', suggestion)
		this.name = 'ConfigError'
	}
}

/**
 * Git-related errors
 */
export class GitError extends ComverError {
	constructor(message: string, suggestion?: string) {
		super(message, 'GIT_ERROR', suggestion)
		this.name = 'GitError'
	}
}

const COMMENT_SUGGESTION = 'Use "<fix|feat|refact>: description", or "!" instead of ":" for a breaking change'

/**
 * Wrap a parse error with a readable message
 */
export function toComverError(error: ParseError): ParseFailure {
	switch (error.code) {
		case 'INVALID_COMMENT_FORMAT':
			return new ParseFailure(error, `Invalid comment format: "${error.comment}"`, COMMENT_SUGGESTION)
		case 'UNEXPECTED_SEMANTIC_TYPE':
			return new ParseFailure(error, `Unexpected semantic type "${error.token}"`, COMMENT_SUGGESTION)
		case 'INVALID_VERSION_FORMAT':
			return new ParseFailure(
				error,
				`Invalid version format: "${error.input}"`,
				'Expected v<major>.<minor>.<patch>, e.g. v1.2.3'
			)
		case 'VERSION_NUMBER_CONVERSION':
			return new ParseFailure(
				error,
				`Version number out of range in "${error.input}"`,
				'Each version number must be at most 4294967295'
			)
		case 'SERIALIZATION_ERROR':
			return new ParseFailure(error, `Serialization failed: ${error.reason}`)
	}
}

/**
 * Value of a result, or the wrapped error thrown
 */
export function unwrap<T>(result: Result<T>): T {
	if (!result.ok) throw toComverError(result.error)
	return result.value
}

/**
 * Format error message with suggestion
 */
export function formatError(error: unknown): string {
	if (error instanceof ComverError) {
		let message = `[${error.code}] ${error.message}`
		if (error.suggestion) {
			message += `\n\n💡 ${error.suggestion}`
		}
		return message
	}

	if (error instanceof Error) {
		return error.message
	}

	return String(error)
}
