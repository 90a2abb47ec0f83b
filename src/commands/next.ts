import { loadConfig } from '../core/config.ts'
import { computeNextVersion } from '../core/version.ts'
import { unwrap } from '../utils/errors.ts'
import { resolveComment, resolveVersion } from './inputs.ts'

export interface NextOptions {
	cwd?: string
	/** Current version, e.g. v1.2.3 */
	version?: string
	comment?: string
}

/**
 * Print the version that follows the current one for a comment
 * Only the version string goes to stdout
 */
export async function runNext(options: NextOptions = {}): Promise<string> {
	const cwd = options.cwd ?? process.cwd()
	const config = await loadConfig(cwd)

	const comment = await resolveComment(options.comment, config, cwd)
	const version = await resolveVersion(options.version, config, cwd)

	const next = unwrap(computeNextVersion(version, comment))
	console.log(next)
	return next
}
