/**
 * CUE sheet lexer
 * Turns sheet text into a flat token sequence, no grammar knowledge
 */

import { LexicalError, Time } from '@cuesheet/core'
import type { CueToken } from './types'

const TIMECODE_LENGTH = 8

/**
 * Unicode whitespace plus U+FEFF, so a byte order mark anywhere is skipped
 */
function isWhitespace(c: string): boolean {
	return /[\s\u0085]/.test(c)
}

function isDigit(c: string | undefined): boolean {
	return c !== undefined && c >= '0' && c <= '9'
}

/**
 * Cursor over the code points of the source
 */
class Reader {
	private readonly chars: string[]
	private position = 0

	constructor(source: string) {
		this.chars = Array.from(source)
	}

	/** True if there are still chars to read */
	get available(): boolean {
		return this.position < this.chars.length
	}

	peek(n = 0): string | undefined {
		return this.chars[this.position + n]
	}

	skipWhitespace(): void {
		let c = this.peek()
		while (c !== undefined && isWhitespace(c)) {
			c = this.chars[++this.position]
		}
	}

	tryTakeTime(): Time | undefined {
		if (this.position + TIMECODE_LENGTH > this.chars.length) return undefined
		const text = this.chars.slice(this.position, this.position + TIMECODE_LENGTH).join('')
		const time = Time.tryParse(text)
		if (time) this.position += TIMECODE_LENGTH
		return time
	}

	// numbers are always exactly two digits
	tryTakeNumber(): number | undefined {
		const first = this.peek()
		const second = this.peek(1)
		if (!isDigit(first) || !isDigit(second)) return undefined

		const boundary = this.peek(2)
		if (boundary !== undefined && !isWhitespace(boundary)) return undefined

		this.position += 2
		return Number(`${first}${second}`)
	}

	takeString(): string {
		const start = this.position

		if (this.peek() === '"') {
			this.position++
			const end = this.chars.indexOf('"', this.position)
			if (end === -1) {
				throw new LexicalError('unterminated-string', start)
			}
			const value = this.chars.slice(this.position, end).join('')
			this.position = end + 1
			return value
		}

		for (let c = this.peek(); c !== undefined && !isWhitespace(c); c = this.peek()) {
			if (c === '"') {
				throw new LexicalError('unexpected-quote', this.position)
			}
			this.position++
		}
		return this.chars.slice(start, this.position).join('')
	}
}

/**
 * Convert sheet text into tokens
 *
 * Recognizers run in a fixed order (timecode, two-digit number, string)
 * so that longer digit runs such as disc IDs fall through to strings.
 */
export function tokenize(source: string): CueToken[] {
	const tokens: CueToken[] = []
	const reader = new Reader(source)

	reader.skipWhitespace()
	while (reader.available) {
		const time = reader.tryTakeTime()
		if (time) {
			tokens.push({ kind: 'time', value: time })
		} else {
			const num = reader.tryTakeNumber()
			if (num !== undefined) {
				tokens.push({ kind: 'number', value: num })
			} else {
				tokens.push({ kind: 'string', value: reader.takeString() })
			}
		}
		reader.skipWhitespace()
	}

	return tokens
}
