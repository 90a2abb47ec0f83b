import type { ClassifyOptions } from './classify.ts'
import type { NextOptions } from './next.ts'

/**
 * Parsed command-line flags
 * A flag that was not given is undefined; `--no-<flag>` gives false
 */
export interface CommandArgs {
	comment?: unknown
	version?: unknown
	json?: unknown
	pretty?: unknown
}

function optionalString(value: unknown): string | undefined {
	return typeof value === 'string' ? value : undefined
}

function optionalBoolean(value: unknown): boolean | undefined {
	return typeof value === 'boolean' ? value : undefined
}

/**
 * Options for `comver classify`
 * Only flags given explicitly override the config
 */
export function classifyOptionsFromArgs(args: CommandArgs): ClassifyOptions {
	const json = optionalBoolean(args.json)
	return {
		comment: optionalString(args.comment),
		output: json === undefined ? undefined : json ? 'json' : 'text',
		pretty: optionalBoolean(args.pretty),
	}
}

export function nextOptionsFromArgs(args: CommandArgs): NextOptions {
	return {
		version: optionalString(args.version),
		comment: optionalString(args.comment),
	}
}
