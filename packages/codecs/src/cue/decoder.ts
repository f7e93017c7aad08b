/**
 * CUE sheet decoder
 * Assembles the command sequence into a tracklist: album header, files,
 * tracks with their indexes, and inferred track durations
 */

import { AssemblyError, Time } from '@cuesheet/core'
import { parseCommands } from './command'
import { tokenize } from './lexer'
import type {
	CueCommand,
	CueFileFormat,
	CueRemark,
	CueTrack,
	CueTrackFile,
	CueTracklist,
} from './types'

/**
 * Read-only cursor over a command sequence
 */
class CommandCursor {
	private position = 0

	constructor(private readonly commands: readonly CueCommand[]) {}

	get offset(): number {
		return this.position
	}

	get done(): boolean {
		return this.position >= this.commands.length
	}

	peek(n = 0): CueCommand | undefined {
		return this.commands[this.position + n]
	}

	advance(): void {
		this.position++
	}
}

interface AlbumHeader {
	title?: string
	performer?: string
	songwriter?: string
	catalog?: string
	cdTextFile?: string
	remarks: CueRemark[]
}

type TrackDraft = Omit<CueTrack, 'title'> & { title?: string }

/**
 * Check if data is a CUE sheet
 */
export function isCue(data: Uint8Array | string): boolean {
	const text = typeof data === 'string' ? data.slice(0, 500) : new TextDecoder().decode(data.slice(0, 500))
	const upper = text.toUpperCase()

	// Look for common CUE commands
	return (
		upper.includes('FILE ') ||
		upper.includes('TRACK ') ||
		upper.includes('INDEX ')
	)
}

/**
 * Tokenize and parse sheet text into commands
 */
export function parseCue(source: string): CueCommand[] {
	return parseCommands(tokenize(source))
}

/**
 * Decode CUE sheet
 */
export function decodeCue(data: Uint8Array | string): CueTracklist {
	const text = typeof data === 'string' ? data : new TextDecoder().decode(data)
	return assembleTracklist(parseCue(text))
}

/**
 * Build a tracklist from commands in file order
 *
 * Album fields come first, then one block per FILE. Later TITLE or
 * PERFORMER commands overwrite earlier ones at the same level.
 */
export function assembleTracklist(commands: readonly CueCommand[]): CueTracklist {
	const cursor = new CommandCursor(commands)

	const header: AlbumHeader = { remarks: [] }
	for (let command = cursor.peek(); command && applyHeaderCommand(header, command); command = cursor.peek()) {
		cursor.advance()
	}

	const { title, ...album } = header
	if (title === undefined) {
		throw new AssemblyError('missing-album-title', 'Sheet has no album TITLE', cursor.offset)
	}

	const files: CueTrackFile[] = []
	for (let command = cursor.peek(); command && command.type === 'file'; command = cursor.peek()) {
		cursor.advance()
		files.push(readFile(cursor, command.path, command.format))
	}

	const rest = cursor.peek()
	if (rest) {
		throw new AssemblyError(
			'unexpected-command',
			`Unexpected ${rest.type.toUpperCase()} command at position ${cursor.offset}`,
			cursor.offset
		)
	}

	return { title, ...album, files }
}

function applyHeaderCommand(header: AlbumHeader, command: CueCommand): boolean {
	switch (command.type) {
		case 'title':
			header.title = command.name
			return true
		case 'performer':
			header.performer = command.name
			return true
		case 'songwriter':
			header.songwriter = command.name
			return true
		case 'catalog':
			header.catalog = command.code
			return true
		case 'cdtextfile':
			header.cdTextFile = command.path
			return true
		case 'rem':
			header.remarks.push({ key: command.key, value: command.value })
			return true
		default:
			return false
	}
}

function readFile(cursor: CommandCursor, name: string, format: CueFileFormat): CueTrackFile {
	const tracks: CueTrack[] = []

	for (let command = cursor.peek(); command && command.type === 'track'; command = cursor.peek()) {
		cursor.advance()
		tracks.push(readTrack(cursor, {
			number: command.number,
			type: command.trackType,
			flags: [],
			indexes: [],
		}))
	}

	if (tracks.length === 0) {
		throw new AssemblyError('missing-track', `FILE ${JSON.stringify(name)} has no TRACK`, cursor.offset)
	}

	return { name, format, tracks: inferDurations(tracks) }
}

function readTrack(cursor: CommandCursor, draft: TrackDraft): CueTrack {
	for (let command = cursor.peek(); command && applyTrackCommand(cursor, draft, command); command = cursor.peek()) {
		cursor.advance()
	}

	const { title, ...track } = draft
	if (title === undefined) {
		throw new AssemblyError(
			'missing-track-title',
			`TRACK ${draft.number} has no TITLE`,
			cursor.offset,
			draft.number
		)
	}
	return { ...track, title }
}

function applyTrackCommand(cursor: CommandCursor, draft: TrackDraft, command: CueCommand): boolean {
	switch (command.type) {
		case 'title':
			draft.title = command.name
			return true
		case 'performer':
			draft.performer = command.name
			return true
		case 'songwriter':
			draft.songwriter = command.name
			return true
		case 'isrc':
			draft.isrc = command.code
			return true
		case 'flags':
			draft.flags.push(...command.flags)
			return true
		case 'index':
			draft.indexes.push({ number: command.number, time: command.time })
			return true
		case 'pregap': {
			// Becomes an implicit INDEX 00 ahead of the index that follows
			const next = cursor.peek(1)
			if (!next || next.type !== 'index') {
				throw new AssemblyError(
					'pregap-without-index',
					`PREGAP in TRACK ${draft.number} is not followed by an INDEX`,
					cursor.offset,
					draft.number
				)
			}
			draft.pregap = command.time
			draft.indexes.push({ number: 0, time: next.time.subtract(command.time), pregap: command.time })
			return true
		}
		case 'postgap':
			draft.postgap = command.time
			return true
		case 'rem':
			return true
		default:
			return false
	}
}

/**
 * Fill in track durations from adjacent pairs
 *
 * A track runs from its last index to the first index of the next track.
 * A track without indexes breaks the chain on both sides, and the last
 * track is left without a duration since nothing bounds it.
 */
export function inferDurations(tracks: readonly CueTrack[]): CueTrack[] {
	return tracks.map((track, i) => {
		const start = track.indexes[track.indexes.length - 1]
		const end = tracks[i + 1]?.indexes[0]
		if (!start || !end) return track
		return { ...track, duration: end.time.subtract(start.time) }
	})
}

/**
 * Get all tracks with their file info
 */
export function getCueTracks(
	tracklist: CueTracklist
): Array<CueTrack & { fileName: string; fileFormat: CueFileFormat }> {
	const tracks: Array<CueTrack & { fileName: string; fileFormat: CueFileFormat }> = []

	for (const file of tracklist.files) {
		for (const track of file.tracks) {
			tracks.push({
				...track,
				fileName: file.name,
				fileFormat: file.format,
			})
		}
	}

	return tracks
}

/**
 * Get track start time
 */
export function getTrackStart(track: CueTrack): Time | undefined {
	// INDEX 01 is the track start (INDEX 00 is pregap)
	const index01 = track.indexes.find(i => i.number === 1)
	return (index01 ?? track.indexes[0])?.time
}

/**
 * Sum of all known track durations
 */
export function getTotalDuration(tracklist: CueTracklist): Time {
	let total = Time.ZERO
	for (const file of tracklist.files) {
		for (const track of file.tracks) {
			if (track.duration) total = total.add(track.duration)
		}
	}
	return total
}
