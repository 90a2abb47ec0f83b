import type { ChangeType, Classification, Result } from '../types.ts'
import { err, ok } from './result.ts'

/** Display names of change types, also the JSON keys */
export const TYPE_NAMES: Record<ChangeType, string> = {
	fix: 'Fix',
	feature: 'Feature',
	refactoring: 'Refactoring',
}

const CHANGE_TYPES = new Map<string, ChangeType>([
	['Fix', 'fix'],
	['Feature', 'feature'],
	['Refactoring', 'refactoring'],
])

export interface JsonOptions {
	/** Indent with tabs */
	pretty?: boolean
}

/**
 * Serialize a classification
 * Shape: { "comment": string, "semantic_type": { "<Fix|Feature|Refactoring>": { "is_breaking": bool } } }
 */
export function classificationToJson(
	classification: Classification,
	options: JsonOptions = {}
): Result<string> {
	const { description, change } = classification
	const payload = {
		comment: description,
		semantic_type: {
			[TYPE_NAMES[change.type]]: { is_breaking: change.breaking },
		},
	}

	try {
		return ok(JSON.stringify(payload, null, options.pretty ? '\t' : undefined))
	} catch (error) {
		return err({ code: 'SERIALIZATION_ERROR', reason: describe(error) })
	}
}

/**
 * Parse a classification from its JSON form
 */
export function classificationFromJson(text: string): Result<Classification> {
	let data: unknown
	try {
		data = JSON.parse(text)
	} catch (error) {
		return err({ code: 'SERIALIZATION_ERROR', reason: describe(error) })
	}

	if (!isRecord(data) || typeof data.comment !== 'string' || !isRecord(data.semantic_type)) {
		return err({ code: 'SERIALIZATION_ERROR', reason: 'expected "comment" and "semantic_type"' })
	}

	const entries = Object.entries(data.semantic_type)
	const [entry] = entries
	if (entries.length !== 1 || !entry) {
		return err({ code: 'SERIALIZATION_ERROR', reason: 'expected exactly one semantic type' })
	}

	const [name, metadata] = entry
	const type = CHANGE_TYPES.get(name)
	if (!type) {
		return err({ code: 'SERIALIZATION_ERROR', reason: `unknown semantic type "${name}"` })
	}
	if (!isRecord(metadata) || typeof metadata.is_breaking !== 'boolean') {
		return err({ code: 'SERIALIZATION_ERROR', reason: `"${name}" is missing "is_breaking"` })
	}

	return ok({
		description: data.comment,
		change: { type, breaking: metadata.is_breaking },
	})
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
