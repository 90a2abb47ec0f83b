import { join } from 'node:path'
import consola from 'consola'
import pc from 'picocolors'
import { getDefaultConfig } from '../core/config.ts'
import { fileExists, writeJsonFile } from '../utils/fs.ts'

export const INIT_CONFIG_FILE = 'comver.config.json'

export interface InitOptions {
	cwd?: string
	force?: boolean
}

/**
 * Write a config file with the defaults
 * Returns false when the file exists and `force` is not set
 */
export async function runInit(options: InitOptions = {}): Promise<boolean> {
	const cwd = options.cwd ?? process.cwd()
	const configPath = join(cwd, INIT_CONFIG_FILE)

	if (fileExists(configPath) && !options.force) {
		consola.warn(`${pc.cyan(INIT_CONFIG_FILE)} already exists. Use ${pc.dim('--force')} to overwrite.`)
		return false
	}

	writeJsonFile(configPath, getDefaultConfig())
	consola.success(`Created ${pc.cyan(INIT_CONFIG_FILE)}`)

	consola.info(`
${pc.bold('Comment format:')}
  ${pc.yellow('fix')}: bug fix (patch version)
  ${pc.yellow('refact')}: refactoring (patch version)
  ${pc.green('feat')}: new feature (minor version)
  ${pc.red('fix!')}, ${pc.red('refact!')} or ${pc.red('feat!')}: breaking change (major version)
`)
	return true
}
