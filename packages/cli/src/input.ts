/**
 * Cue sheet file input
 */

import { existsSync, readFileSync } from 'node:fs'
import { resolve } from 'node:path'

/**
 * A cue sheet path that does not exist or cannot be read
 */
export class InputError extends Error {
	constructor(
		message: string,
		readonly path: string
	) {
		super(message)
		this.name = 'InputError'
	}
}

/**
 * Read a cue sheet as UTF-8 text
 */
export function readCueFile(input: string): string {
	const path = resolve(input)
	if (!existsSync(path)) {
		throw new InputError(`File not found: ${input}`, path)
	}

	try {
		return readFileSync(path, 'utf8')
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err)
		throw new InputError(`Cannot read ${input}: ${reason}`, path)
	}
}
