/**
 * Error taxonomy shared by every parsing stage
 *
 * Each stage fails fast with one of these; callers can branch on `kind`
 * and `reason` instead of matching message text.
 */

/**
 * Stage that raised the error
 */
export type CueErrorKind = 'lexical' | 'syntax' | 'assembly' | 'time'

/**
 * Base class for all cue sheet errors
 */
export class CueError extends Error {
	readonly kind: CueErrorKind

	constructor(kind: CueErrorKind, message: string) {
		super(message)
		this.name = 'CueError'
		this.kind = kind
	}
}

export type LexicalErrorReason = 'unterminated-string' | 'unexpected-quote'

/**
 * Malformed text: bad quoting
 */
export class LexicalError extends CueError {
	readonly reason: LexicalErrorReason
	/** Code point offset into the source */
	readonly offset: number

	constructor(reason: LexicalErrorReason, offset: number) {
		super(
			'lexical',
			reason === 'unterminated-string'
				? `Quoted string opened at offset ${offset} is never closed`
				: `Unexpected '"' inside unquoted string at offset ${offset}`
		)
		this.name = 'LexicalError'
		this.reason = reason
		this.offset = offset
	}
}

export type SyntaxErrorReason =
	| 'unexpected-end'
	| 'unexpected-token'
	| 'unknown-keyword'
	| 'invalid-value'
	| 'missing-flags'

/**
 * Context attached to a syntax error
 */
export interface SyntaxErrorDetails {
	/** Token offset the error was detected at */
	offset: number
	/** Keyword of the command being parsed */
	keyword?: string
	/** Token kind the grammar required at this position */
	expected?: string
	/** Rendering of the token actually found */
	found?: string
}

/**
 * Token stream does not match the command grammar
 *
 * Named to stay clear of the global `SyntaxError`.
 */
export class CueSyntaxError extends CueError {
	readonly reason: SyntaxErrorReason
	readonly offset: number
	readonly keyword: string | undefined
	readonly expected: string | undefined
	readonly found: string | undefined

	constructor(reason: SyntaxErrorReason, message: string, details: SyntaxErrorDetails) {
		super('syntax', message)
		this.name = 'CueSyntaxError'
		this.reason = reason
		this.offset = details.offset
		this.keyword = details.keyword
		this.expected = details.expected
		this.found = details.found
	}
}

export type AssemblyErrorReason =
	| 'missing-album-title'
	| 'missing-track'
	| 'missing-track-title'
	| 'pregap-without-index'
	| 'unexpected-command'

/**
 * Commands are individually valid but do not form a tracklist
 */
export class AssemblyError extends CueError {
	readonly reason: AssemblyErrorReason
	/** Offset into the command sequence */
	readonly offset: number
	/** Track number, for track-level problems */
	readonly track: number | undefined

	constructor(reason: AssemblyErrorReason, message: string, offset: number, track?: number) {
		super('assembly', message)
		this.name = 'AssemblyError'
		this.reason = reason
		this.offset = offset
		this.track = track
	}
}

export type TimeErrorReason = 'invalid-format' | 'out-of-range' | 'underflow'

/**
 * Invalid timecode or time arithmetic that would go below zero
 */
export class TimeError extends CueError {
	readonly reason: TimeErrorReason

	constructor(reason: TimeErrorReason, message: string) {
		super('time', message)
		this.name = 'TimeError'
		this.reason = reason
	}
}

/**
 * Check if a thrown value came from the cue sheet pipeline
 */
export function isCueError(error: unknown): error is CueError {
	return error instanceof CueError
}
