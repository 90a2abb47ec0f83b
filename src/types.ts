export type ChangeType = 'fix' | 'feature' | 'refactoring'

export type ReleaseType = 'major' | 'minor' | 'patch'

export type OutputFormat = 'text' | 'json'

/**
 * Intent of a change, as declared by its comment prefix
 * - `fix:` / `fix!` → fix
 * - `feat:` / `feat!` → feature
 * - `refact:` / `refact!` → refactoring
 */
export interface ChangeKind {
	readonly type: ChangeType
	/** `!` delimiter */
	readonly breaking: boolean
}

export interface Classification {
	/** Text after the delimiter, trimmed */
	readonly description: string
	readonly change: ChangeKind
}

export interface SemanticVersion {
	readonly major: number
	readonly minor: number
	readonly patch: number
}

export type ParseError =
	| { readonly code: 'INVALID_COMMENT_FORMAT'; readonly comment: string }
	| { readonly code: 'UNEXPECTED_SEMANTIC_TYPE'; readonly token: string }
	| { readonly code: 'INVALID_VERSION_FORMAT'; readonly input: string }
	| { readonly code: 'VERSION_NUMBER_CONVERSION'; readonly input: string }
	| { readonly code: 'SERIALIZATION_ERROR'; readonly reason: string }

export type ParseErrorCode = ParseError['code']

export type Result<T, E = ParseError> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E }

export interface ComverConfig {
	/** Default output of `comver classify` */
	output?: OutputFormat

	/** Indent JSON output */
	pretty?: boolean

	/** Git fallbacks for a missing comment or version */
	git?: {
		/** Read the last commit subject / highest version tag when an argument is missing */
		enabled?: boolean
		/** Prefix of version tags (e.g. `v1.2.3`) */
		tagPrefix?: string
	}
}
