#!/usr/bin/env tsx
import consola from 'consola'
import { defineCommand, runMain, showUsage } from 'citty'
import pkg from '../package.json'
import { classifyOptionsFromArgs, nextOptionsFromArgs } from './commands/args.ts'
import { runClassify } from './commands/classify.ts'
import { runInit } from './commands/init.ts'
import { runNext } from './commands/next.ts'
import { formatError } from './utils/errors.ts'

/**
 * Run a command, reporting failures with a non-zero exit code
 */
async function guard(task: () => Promise<unknown>): Promise<void> {
	try {
		await task()
	} catch (error) {
		consola.error(formatError(error))
		process.exit(1)
	}
}

const classifyCommand = defineCommand({
	meta: {
		name: 'classify',
		description: 'Classify a commit comment (fix, feat, refact; ":" or "!" for breaking)',
	},
	args: {
		comment: {
			type: 'string',
			description: 'Comment to classify (defaults to the last commit subject)',
			alias: 'c',
		},
		json: {
			type: 'boolean',
			description: 'Output JSON',
			alias: 'j',
		},
		pretty: {
			type: 'boolean',
			description: 'Indent JSON output',
		},
	},
	run: async ({ args }) => {
		await guard(() => runClassify(classifyOptionsFromArgs(args)))
	},
})

const nextCommand = defineCommand({
	meta: {
		name: 'next',
		description: 'Compute the next version for a commit comment',
	},
	args: {
		version: {
			type: 'string',
			description: 'Current version, e.g. v1.2.3 (defaults to the highest version tag)',
			alias: 'v',
		},
		comment: {
			type: 'string',
			description: 'Commit comment (defaults to the last commit subject)',
			alias: 'c',
		},
	},
	run: async ({ args }) => {
		await guard(() => runNext(nextOptionsFromArgs(args)))
	},
})

const initCommand = defineCommand({
	meta: {
		name: 'init',
		description: 'Create a comver.config.json',
	},
	args: {
		force: {
			type: 'boolean',
			description: 'Overwrite existing config',
			alias: 'f',
		},
	},
	run: async ({ args }) => {
		await guard(() => runInit({ force: Boolean(args.force) }))
	},
})

const comver = defineCommand({
	meta: {
		name: 'comver',
		version: pkg.version,
		description: pkg.description,
	},
	subCommands: {
		classify: classifyCommand,
		next: nextCommand,
		init: initCommand,
	},
	run: async ({ rawArgs }) => {
		// citty also runs the parent after a sub-command
		if (rawArgs.length === 0) {
			await showUsage(comver)
		}
	},
})

void runMain(comver)
