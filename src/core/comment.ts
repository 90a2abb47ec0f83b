import type { ChangeKind, ChangeType, Classification, Result } from '../types.ts'
import { err, ok } from './result.ts'

/** Comment prefix → change type */
const PREFIX_TYPES = new Map<string, ChangeType>([
	['feat', 'feature'],
	['fix', 'fix'],
	['refact', 'refactoring'],
])

/** Delimiter → breaking flag */
const DELIMITERS = new Map<string, boolean>([
	[':', false],
	['!', true],
])

const WORD_CHAR = /\w/

/**
 * Classify a commit comment
 * Format: <prefix>: description (non breaking) or <prefix>! description (breaking)
 *
 * The prefix is the run of word characters starting at index 0 and must be
 * directly followed by the delimiter. Any later `:` or `!` belongs to the description.
 */
export function classify(comment: string): Result<Classification> {
	let end = 0
	while (end < comment.length && WORD_CHAR.test(comment.charAt(end))) end++

	const breaking = DELIMITERS.get(comment.charAt(end))
	if (end === 0 || breaking === undefined) {
		return err({ code: 'INVALID_COMMENT_FORMAT', comment })
	}

	const token = comment.slice(0, end).trim()
	const type = PREFIX_TYPES.get(token)
	if (!type) {
		return err({ code: 'UNEXPECTED_SEMANTIC_TYPE', token })
	}

	return ok({
		description: comment.slice(end + 1).trim(),
		change: { type, breaking },
	})
}

/**
 * Structural equality of two change kinds
 */
export function isSameChange(a: ChangeKind, b: ChangeKind): boolean {
	return a.type === b.type && a.breaking === b.breaking
}

/**
 * Render a classification back to its comment form
 * e.g. `feat! drop legacy flags`
 */
export function formatComment(classification: Classification): string {
	const { change, description } = classification
	const prefix = prefixFor(change.type)
	const delimiter = change.breaking ? '!' : ':'
	return description ? `${prefix}${delimiter} ${description}` : `${prefix}${delimiter}`
}

function prefixFor(type: ChangeType): string {
	switch (type) {
		case 'feature':
			return 'feat'
		case 'fix':
			return 'fix'
		case 'refactoring':
			return 'refact'
	}
}
