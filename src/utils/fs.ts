import { existsSync, readFileSync, writeFileSync } from 'node:fs'

export function fileExists(path: string): boolean {
	return existsSync(path)
}

export function readFile(path: string): string | null {
	if (!existsSync(path)) return null
	return readFileSync(path, 'utf-8')
}

export function writeFile(path: string, content: string): void {
	writeFileSync(path, content, 'utf-8')
}

/**
 * Read and parse a JSON file
 * Returns undefined when the file does not exist, throws on invalid JSON
 */
export function readJsonFile(path: string): unknown {
	const content = readFile(path)
	if (content === null) return undefined
	return JSON.parse(content)
}

export function writeJsonFile(path: string, data: unknown): void {
	writeFile(path, `${JSON.stringify(data, null, '\t')}\n`)
}
