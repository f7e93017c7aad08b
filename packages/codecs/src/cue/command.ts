/**
 * CUE sheet command parser
 * Groups tokens into one typed command per keyword. Pure syntax: which
 * track or file a command belongs to is decided later by the decoder.
 */

import { CueSyntaxError, type Time } from '@cuesheet/core'
import {
	formatToken,
	parseFileFormat,
	parseTrackFlag,
	parseTrackType,
	type CueCommand,
	type CueToken,
	type CueTokenKind,
	type CueTrackFlag,
} from './types'

const CATALOG_LENGTH = 13

/**
 * Read-only cursor over a token sequence
 */
class TokenCursor {
	private position = 0

	constructor(private readonly tokens: readonly CueToken[]) {}

	get offset(): number {
		return this.position
	}

	get done(): boolean {
		return this.position >= this.tokens.length
	}

	peek(): CueToken | undefined {
		return this.tokens[this.position]
	}

	next(keyword?: string): CueToken {
		const token = this.tokens[this.position]
		if (!token) {
			throw new CueSyntaxError(
				'unexpected-end',
				keyword ? `Unexpected end of sheet in ${keyword} command` : 'Unexpected end of sheet',
				{ offset: this.position, keyword }
			)
		}
		this.position++
		return token
	}

	expect<K extends CueTokenKind>(kind: K, keyword?: string): Extract<CueToken, { kind: K }> {
		const token = this.next(keyword)
		if (!isKind(token, kind)) {
			throw this.unexpected(token, kind, keyword)
		}
		return token
	}

	unexpected(token: CueToken, expected: CueTokenKind, keyword?: string): CueSyntaxError {
		const found = describeToken(token)
		return new CueSyntaxError(
			'unexpected-token',
			`Expected ${expected} but found ${found}${keyword ? ` in ${keyword} command` : ''}`,
			{ offset: this.position - 1, keyword, expected, found }
		)
	}

	string(keyword: string): string {
		return this.expect('string', keyword).value
	}

	number(keyword: string): number {
		return this.expect('number', keyword).value
	}

	time(keyword: string): Time {
		return this.expect('time', keyword).value
	}

	invalid(keyword: string, message: string, token: CueToken): CueSyntaxError {
		return new CueSyntaxError('invalid-value', `${message} in ${keyword} command`, {
			offset: this.position - 1,
			keyword,
			found: describeToken(token),
		})
	}
}

function isKind<K extends CueTokenKind>(token: CueToken, kind: K): token is Extract<CueToken, { kind: K }> {
	return token.kind === kind
}

function describeToken(token: CueToken): string {
	return `${token.kind} ${JSON.stringify(formatToken(token))}`
}

function parseCatalog(cursor: TokenCursor): string {
	const token = cursor.next('CATALOG')
	switch (token.kind) {
		case 'number':
			return String(token.value).padStart(CATALOG_LENGTH, '0')
		case 'string':
			// a full 13-digit code is too long to lex as a number
			if (/^\d{1,13}$/.test(token.value)) {
				return token.value.padStart(CATALOG_LENGTH, '0')
			}
			throw cursor.invalid('CATALOG', `Invalid catalog number ${JSON.stringify(token.value)}`, token)
		case 'time':
			throw cursor.unexpected(token, 'number', 'CATALOG')
	}
}

function parseFlags(cursor: TokenCursor): CueTrackFlag[] {
	const flags: CueTrackFlag[] = []

	for (let token = cursor.peek(); token && token.kind === 'string'; token = cursor.peek()) {
		const flag = parseTrackFlag(token.value)
		if (!flag) break
		flags.push(flag)
		cursor.next()
	}

	if (flags.length === 0) {
		throw new CueSyntaxError('missing-flags', 'FLAGS command without any track flag', {
			offset: cursor.offset,
			keyword: 'FLAGS',
		})
	}
	return flags
}

function parseCommand(cursor: TokenCursor): CueCommand {
	const start = cursor.offset
	const keyword = cursor.expect('string').value

	switch (keyword.toUpperCase()) {
		case 'CATALOG':
			return { type: 'catalog', code: parseCatalog(cursor) }

		case 'CDTEXTFILE':
			return { type: 'cdtextfile', path: cursor.string('CDTEXTFILE') }

		case 'FILE': {
			const path = cursor.string('FILE')
			const token = cursor.expect('string', 'FILE')
			const format = parseFileFormat(token.value)
			if (!format) {
				throw cursor.invalid('FILE', `Unknown file format ${JSON.stringify(token.value)}`, token)
			}
			return { type: 'file', path, format }
		}

		case 'FLAGS':
			return { type: 'flags', flags: parseFlags(cursor) }

		case 'INDEX': {
			const number = cursor.number('INDEX')
			return { type: 'index', number, time: cursor.time('INDEX') }
		}

		case 'ISRC':
			return { type: 'isrc', code: cursor.string('ISRC') }

		case 'PERFORMER':
			return { type: 'performer', name: cursor.string('PERFORMER') }

		case 'POSTGAP':
			return { type: 'postgap', time: cursor.time('POSTGAP') }

		case 'PREGAP':
			return { type: 'pregap', time: cursor.time('PREGAP') }

		case 'REM': {
			const key = cursor.string('REM')
			return { type: 'rem', key, value: cursor.next('REM') }
		}

		case 'SONGWRITER':
			return { type: 'songwriter', name: cursor.string('SONGWRITER') }

		case 'TITLE':
			return { type: 'title', name: cursor.string('TITLE') }

		case 'TRACK': {
			const number = cursor.number('TRACK')
			const token = cursor.expect('string', 'TRACK')
			const trackType = parseTrackType(token.value)
			if (!trackType) {
				throw cursor.invalid('TRACK', `Unknown track type ${JSON.stringify(token.value)}`, token)
			}
			return { type: 'track', number, trackType }
		}

		default:
			throw new CueSyntaxError('unknown-keyword', `Unknown command ${JSON.stringify(keyword)}`, {
				offset: start,
				keyword,
			})
	}
}

/**
 * Parse a token sequence into commands, in order
 *
 * The input array is only read, never drained.
 */
export function parseCommands(tokens: readonly CueToken[]): CueCommand[] {
	const cursor = new TokenCursor(tokens)
	const commands: CueCommand[] = []

	while (!cursor.done) {
		commands.push(parseCommand(cursor))
	}

	return commands
}
