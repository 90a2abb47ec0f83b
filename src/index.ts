// Types
export type {
	ChangeType,
	ChangeKind,
	Classification,
	SemanticVersion,
	ReleaseType,
	OutputFormat,
	ParseError,
	ParseErrorCode,
	Result,
	ComverConfig,
} from './types.ts'

// Config
export { defineConfig, loadConfig, getDefaultConfig } from './core/config.ts'

// Core functionality
export { classify, isSameChange, formatComment } from './core/comment.ts'

export {
	MAX_VERSION_NUMBER,
	ZERO_VERSION,
	parseVersion,
	formatVersion,
	releaseTypeFor,
	bumpVersion,
	computeNextVersion,
	compareVersions,
	getHighestVersion,
} from './core/version.ts'

export { classificationToJson, classificationFromJson, type JsonOptions } from './core/json.ts'

export { ok, err } from './core/result.ts'

// Errors
export {
	ComverError,
	ParseFailure,
	ConfigError,
	GitError,
	toComverError,
	unwrap,
	formatError,
} from './utils/errors.ts'

// Commands (for programmatic use)
export { runClassify, type ClassifyOptions } from './commands/classify.ts'
export { runNext, type NextOptions } from './commands/next.ts'
export { runInit, type InitOptions } from './commands/init.ts'
