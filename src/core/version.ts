import * as semver from 'semver'
import type { ChangeKind, Classification, ReleaseType, Result, SemanticVersion } from '../types.ts'
import { classify } from './comment.ts'
import { err, ok } from './result.ts'

/** Version components are unsigned 32-bit integers */
export const MAX_VERSION_NUMBER = 4_294_967_295

export const ZERO_VERSION: SemanticVersion = { major: 0, minor: 0, patch: 0 }

// v1.2.3, or the legacy dotted form v.1.2.3
const VERSION_PATTERN = /^v\.?(\d+)\.(\d+)\.(\d+)$/

/**
 * Parse a `v<major>.<minor>.<patch>` version string
 */
export function parseVersion(input: string): Result<SemanticVersion> {
	const match = VERSION_PATTERN.exec(input)
	if (!match) {
		return err({ code: 'INVALID_VERSION_FORMAT', input })
	}

	const [major, minor, patch] = match.slice(1).map(toVersionNumber)
	if (major === undefined || minor === undefined || patch === undefined) {
		return err({ code: 'VERSION_NUMBER_CONVERSION', input })
	}

	return ok({ major, minor, patch })
}

function toVersionNumber(group: string): number | undefined {
	const value = Number(group)
	return Number.isSafeInteger(value) && value <= MAX_VERSION_NUMBER ? value : undefined
}

/**
 * Format a version as `v<major>.<minor>.<patch>`
 */
export function formatVersion(version: SemanticVersion): string {
	return `v${toSemverString(version)}`
}

function toSemverString({ major, minor, patch }: SemanticVersion): string {
	return `${major}.${minor}.${patch}`
}

/**
 * Release type for a change
 * - any breaking change → major
 * - feature → minor
 * - fix, refactoring → patch
 */
export function releaseTypeFor(change: ChangeKind): ReleaseType {
	if (change.breaking) return 'major'

	switch (change.type) {
		case 'feature':
			return 'minor'
		case 'fix':
		case 'refactoring':
			return 'patch'
	}
}

/**
 * Increment a version by release type, resetting the lower components
 */
export function bumpVersion(
	version: SemanticVersion,
	releaseType: ReleaseType
): Result<SemanticVersion> {
	const next = semver.parse(semver.inc(toSemverString(version), releaseType))
	if (!next || [next.major, next.minor, next.patch].some((n) => n > MAX_VERSION_NUMBER)) {
		return err({ code: 'VERSION_NUMBER_CONVERSION', input: formatVersion(version) })
	}

	return ok({ major: next.major, minor: next.minor, patch: next.patch })
}

/**
 * Compute the version that follows `currentVersion` for a change
 *
 * `change` is either a classification or a raw comment, which is classified first.
 *
 * @example
 * ```ts
 * computeNextVersion('v2.3.5', 'feat! breaking feature.')
 * // → { ok: true, value: 'v3.0.0' }
 * ```
 */
export function computeNextVersion(
	currentVersion: string,
	change: Classification | string
): Result<string> {
	const classified = typeof change === 'string' ? classify(change) : ok(change)
	if (!classified.ok) return classified

	const current = parseVersion(currentVersion)
	if (!current.ok) return current

	const next = bumpVersion(current.value, releaseTypeFor(classified.value.change))
	if (!next.ok) return next

	return ok(formatVersion(next.value))
}

/**
 * Compare two versions
 */
export function compareVersions(a: SemanticVersion, b: SemanticVersion): -1 | 0 | 1 {
	return semver.compare(toSemverString(a), toSemverString(b))
}

/**
 * Get the highest version from a list of version strings
 * Strings that do not parse are ignored
 */
export function getHighestVersion(versions: string[]): string | null {
	let highest: SemanticVersion | null = null
	let highestRaw: string | null = null

	for (const raw of versions) {
		const parsed = parseVersion(raw)
		if (!parsed.ok) continue
		if (!highest || compareVersions(parsed.value, highest) > 0) {
			highest = parsed.value
			highestRaw = raw
		}
	}

	return highestRaw
}
