import { join } from 'node:path'
import { pathToFileURL } from 'node:url'
import consola from 'consola'
import { defu } from 'defu'
import type { ComverConfig, OutputFormat } from '../types.ts'
import { ConfigError, formatError } from '../utils/errors.ts'
import { fileExists, readJsonFile } from '../utils/fs.ts'

export const CONFIG_FILES = [
	'comver.config.ts',
	'comver.config.js',
	'comver.config.json',
	'.comverrc',
	'.comverrc.json',
]

const DEFAULT_CONFIG: ComverConfig = {
	output: 'text',
	pretty: false,
	git: {
		enabled: true,
		tagPrefix: 'v',
	},
}

/**
 * Load config from file
 * The first candidate that loads wins; one that fails is reported and skipped
 */
export async function loadConfig(cwd: string): Promise<ComverConfig> {
	for (const configFile of CONFIG_FILES) {
		const configPath = join(cwd, configFile)
		if (!fileExists(configPath)) continue

		try {
			const userConfig = await readConfigFile(configPath)
			return defu(validateConfig(userConfig, configFile), getDefaultConfig())
		} catch (error) {
			consola.warn(`Skipping ${configFile}: ${formatError(error)}`)
		}
	}

	return getDefaultConfig()
}

async function readConfigFile(configPath: string): Promise<unknown> {
	if (configPath.endsWith('.ts') || configPath.endsWith('.js')) {
		// Dynamic import for JS/TS configs
		const loaded: unknown = await import(pathToFileURL(configPath).href)
		return isRecord(loaded) && 'default' in loaded ? loaded.default : loaded
	}

	return readJsonFile(configPath)
}

function validateConfig(value: unknown, configFile: string): ComverConfig {
	if (!isRecord(value)) {
		throw new ConfigError(`${configFile} must export an object`)
	}

	const config: ComverConfig = {}

	if (value.output !== undefined) {
		if (!isOutputFormat(value.output)) {
			throw new ConfigError(
				`Invalid "output" in ${configFile}: ${String(value.output)}`,
				'Use "text" or "json"'
			)
		}
		config.output = value.output
	}

	if (value.pretty !== undefined) {
		if (typeof value.pretty !== 'boolean') {
			throw new ConfigError(`Invalid "pretty" in ${configFile}: expected a boolean`)
		}
		config.pretty = value.pretty
	}

	if (value.git !== undefined) {
		const { git } = value
		if (!isRecord(git)) {
			throw new ConfigError(`Invalid "git" in ${configFile}: expected an object`)
		}
		if (git.enabled !== undefined && typeof git.enabled !== 'boolean') {
			throw new ConfigError(`Invalid "git.enabled" in ${configFile}: expected a boolean`)
		}
		if (git.tagPrefix !== undefined && typeof git.tagPrefix !== 'string') {
			throw new ConfigError(`Invalid "git.tagPrefix" in ${configFile}: expected a string`)
		}
		config.git = { enabled: git.enabled, tagPrefix: git.tagPrefix }
	}

	return config
}

function isOutputFormat(value: unknown): value is OutputFormat {
	return value === 'text' || value === 'json'
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null
}

/**
 * Get default config
 */
export function getDefaultConfig(): ComverConfig {
	return { ...DEFAULT_CONFIG, git: { ...DEFAULT_CONFIG.git } }
}

/**
 * Define config helper for TypeScript support
 */
export function defineConfig(config: ComverConfig): ComverConfig {
	return config
}
