import { TimeError } from './errors'

/**
 * Frames per second in CD audio
 */
export const FRAMES_PER_SECOND = 75

const TIMECODE = /^(\d\d):(\d\d):(\d\d)$/

function pad2(n: number): string {
	return String(n).padStart(2, '0')
}

/**
 * Disc position or length in the `mm:ss:ff` form (minutes:seconds:frames)
 *
 * Immutable. Every value reduces to a non-negative frame count, which is
 * what ordering and arithmetic work on.
 */
export class Time {
	readonly minutes: number
	readonly seconds: number
	readonly frames: number

	constructor(minutes: number, seconds: number, frames: number) {
		if (!Number.isSafeInteger(minutes) || minutes < 0) {
			throw new TimeError('out-of-range', `Invalid minutes: ${minutes}`)
		}
		if (!Number.isInteger(seconds) || seconds < 0 || seconds > 59) {
			throw new TimeError('out-of-range', `Invalid seconds: ${seconds}`)
		}
		if (!Number.isInteger(frames) || frames < 0 || frames >= FRAMES_PER_SECOND) {
			throw new TimeError('out-of-range', `Invalid frames: ${frames}`)
		}
		this.minutes = minutes
		this.seconds = seconds
		this.frames = frames
	}

	static readonly ZERO = new Time(0, 0, 0)

	/**
	 * Parse an exact 8 character `mm:ss:ff` timecode
	 */
	static parse(text: string): Time {
		const match = TIMECODE.exec(text)
		if (!match) {
			throw new TimeError('invalid-format', `Invalid timecode: ${JSON.stringify(text)}`)
		}
		const [, mm, ss, ff] = match
		return new Time(Number(mm), Number(ss), Number(ff))
	}

	/**
	 * Like `parse`, but returns undefined for anything that is not a timecode
	 */
	static tryParse(text: string): Time | undefined {
		if (!TIMECODE.test(text)) return undefined
		try {
			return Time.parse(text)
		} catch (error) {
			if (error instanceof TimeError) return undefined
			throw error
		}
	}

	static fromTotalFrames(total: number): Time {
		if (!Number.isSafeInteger(total)) {
			throw new TimeError('out-of-range', `Invalid frame count: ${total}`)
		}
		if (total < 0) {
			throw new TimeError('underflow', `Negative frame count: ${total}`)
		}
		const frames = total % FRAMES_PER_SECOND
		const allSeconds = Math.floor(total / FRAMES_PER_SECOND)
		return new Time(Math.floor(allSeconds / 60), allSeconds % 60, frames)
	}

	/**
	 * Nearest frame to a length in seconds
	 */
	static fromSeconds(seconds: number): Time {
		return Time.fromTotalFrames(Math.round(seconds * FRAMES_PER_SECOND))
	}

	get totalFrames(): number {
		return (this.minutes * 60 + this.seconds) * FRAMES_PER_SECOND + this.frames
	}

	toSeconds(): number {
		return this.totalFrames / FRAMES_PER_SECOND
	}

	/**
	 * Difference `this - other`
	 *
	 * Throws a `TimeError` with reason `underflow` when `other` lies after
	 * `this`; there is no negative Time.
	 */
	subtract(other: Time): Time {
		const diff = this.totalFrames - other.totalFrames
		if (diff < 0) {
			throw new TimeError('underflow', `Cannot subtract ${other.toString()} from ${this.toString()}`)
		}
		return Time.fromTotalFrames(diff)
	}

	add(other: Time): Time {
		return Time.fromTotalFrames(this.totalFrames + other.totalFrames)
	}

	compare(other: Time): number {
		return this.totalFrames - other.totalFrames
	}

	equals(other: Time): boolean {
		return this.totalFrames === other.totalFrames
	}

	/**
	 * `mm:ss:ff`
	 */
	toString(): string {
		return `${pad2(this.minutes)}:${pad2(this.seconds)}:${pad2(this.frames)}`
	}

	/**
	 * `mm:ss`, frames dropped
	 */
	toShortString(): string {
		return `${pad2(this.minutes)}:${pad2(this.seconds)}`
	}

	toJSON(): string {
		return this.toString()
	}
}
