import pc from 'picocolors'
import { classify } from '../core/comment.ts'
import { loadConfig } from '../core/config.ts'
import { TYPE_NAMES, classificationToJson } from '../core/json.ts'
import type { Classification, OutputFormat } from '../types.ts'
import { unwrap } from '../utils/errors.ts'
import { resolveComment } from './inputs.ts'

export interface ClassifyOptions {
	cwd?: string
	comment?: string
	/** Overrides the configured output */
	output?: OutputFormat
	pretty?: boolean
}

export async function runClassify(options: ClassifyOptions = {}): Promise<Classification> {
	const cwd = options.cwd ?? process.cwd()
	const config = await loadConfig(cwd)

	const comment = await resolveComment(options.comment, config, cwd)
	const classification = unwrap(classify(comment))

	const output = options.output ?? config.output ?? 'text'
	if (output === 'json') {
		const pretty = options.pretty ?? config.pretty ?? false
		console.log(unwrap(classificationToJson(classification, { pretty })))
	} else {
		printClassification(classification)
	}

	return classification
}

export function printClassification({ change, description }: Classification): void {
	console.log(`  ${pc.dim('Type:')} ${pc.cyan(TYPE_NAMES[change.type])}`)
	console.log(`  ${pc.dim('Breaking:')} ${change.breaking ? pc.red('yes') : pc.green('no')}`)
	console.log(`  ${pc.dim('Description:')} ${description || pc.dim('(empty)')}`)
}
