import { $ } from 'zx'
import { getHighestVersion } from '../core/version.ts'
import { GitError, formatError } from './errors.ts'

// Configure zx
$.quiet = true

/**
 * Get the subject line of the last commit
 */
export async function getLastCommitSubject(cwd?: string): Promise<string> {
	try {
		const result = await $({ cwd })`git log -1 --pretty=format:%s`
		return result.stdout.trim()
	} catch (error) {
		throw new GitError(
			`Could not read the last commit: ${formatError(error)}`,
			'Pass the comment with --comment'
		)
	}
}

/**
 * Get all tags of the repository
 */
export async function getTags(cwd?: string): Promise<string[]> {
	try {
		const result = await $({ cwd })`git tag -l`
		return parseTagList(result.stdout)
	} catch (error) {
		throw new GitError(`Could not list tags: ${formatError(error)}`, 'Pass the version with --version')
	}
}

export function parseTagList(output: string): string[] {
	return output
		.split('\n')
		.map((line) => line.trim())
		.filter(Boolean)
}

/**
 * Highest version among tags, as `v<major>.<minor>.<patch>`
 * Tags are `<prefix><major>.<minor>.<patch>`, the `v` after the prefix optional
 * (an empty prefix matches both `1.2.3` and `v1.2.3`); anything else is ignored
 */
export function pickLatestVersion(tags: string[], prefix = 'v'): string | null {
	const versions = tags
		.filter((tag) => tag.startsWith(prefix))
		.map((tag) => {
			const rest = tag.slice(prefix.length)
			return rest.startsWith('v') ? rest : `v${rest}`
		})
	return getHighestVersion(versions)
}

/**
 * Get the highest tagged version of the repository
 */
export async function getLatestTaggedVersion(prefix = 'v', cwd?: string): Promise<string | null> {
	return pickLatestVersion(await getTags(cwd), prefix)
}
