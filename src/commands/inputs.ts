import consola from 'consola'
import pc from 'picocolors'
import type { ComverConfig } from '../types.ts'
import { ConfigError, GitError } from '../utils/errors.ts'
import { getLastCommitSubject, getLatestTaggedVersion } from '../utils/git.ts'

/** Notices go to stderr; stdout carries only command output */
export const notices = consola.create({ stdout: process.stderr })

/**
 * Comment from the command line, or the last commit subject
 */
export async function resolveComment(
	comment: string | undefined,
	config: ComverConfig,
	cwd: string
): Promise<string> {
	if (comment !== undefined) return comment

	if (!config.git?.enabled) {
		throw new ConfigError('No comment given', 'Pass the comment with --comment')
	}

	const subject = await getLastCommitSubject(cwd)
	notices.info(`Using last commit: ${pc.cyan(subject)}`)
	return subject
}

/**
 * Version from the command line, or the highest version tag
 */
export async function resolveVersion(
	version: string | undefined,
	config: ComverConfig,
	cwd: string
): Promise<string> {
	if (version !== undefined) return version

	if (!config.git?.enabled) {
		throw new ConfigError('No version given', 'Pass the current version with --version')
	}

	const prefix = config.git.tagPrefix ?? 'v'
	const latest = await getLatestTaggedVersion(prefix, cwd)
	if (!latest) {
		throw new GitError(
			`No version tag found (prefix "${prefix}")`,
			'Pass the current version with --version'
		)
	}

	notices.info(`Using latest tag version: ${pc.cyan(latest)}`)
	return latest
}
