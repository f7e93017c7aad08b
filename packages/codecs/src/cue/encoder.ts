/**
 * CUE sheet encoder
 * Generates CD track listing files
 */

import { Time } from '@cuesheet/core'
import { inferDurations } from './decoder'
import {
	formatToken,
	formatTrackType,
	type CueEncodeOptions,
	type CueFileFormat,
	type CueToken,
	type CueTrack,
	type CueTracklist,
} from './types'

const MAX_TRACKS = 99

/**
 * Encode CUE sheet
 */
export function encodeCue(tracklist: CueTracklist, options: CueEncodeOptions = {}): string {
	const { includeRemarks = true } = options
	const lines: string[] = []

	// REM entries
	if (includeRemarks) {
		for (const remark of tracklist.remarks) {
			lines.push(`REM ${encodeWord(remark.key)} ${encodeToken(remark.value)}`)
		}
	}

	// Global metadata
	if (tracklist.catalog !== undefined) {
		lines.push(`CATALOG ${tracklist.catalog}`)
	}
	if (tracklist.cdTextFile !== undefined) {
		lines.push(`CDTEXTFILE ${quote(tracklist.cdTextFile)}`)
	}
	if (tracklist.performer !== undefined) {
		lines.push(`PERFORMER ${quote(tracklist.performer)}`)
	}
	if (tracklist.songwriter !== undefined) {
		lines.push(`SONGWRITER ${quote(tracklist.songwriter)}`)
	}
	lines.push(`TITLE ${quote(tracklist.title)}`)

	// Files and tracks
	for (const file of tracklist.files) {
		lines.push(`FILE ${quote(file.name)} ${file.format}`)

		for (const track of file.tracks) {
			encodeTrack(track, lines)
		}
	}

	return lines.join('\n') + '\n'
}

/**
 * Encode a single track
 */
function encodeTrack(track: CueTrack, lines: string[]): void {
	lines.push(`  TRACK ${pad2(track.number)} ${formatTrackType(track.type)}`)
	lines.push(`    TITLE ${quote(track.title)}`)

	if (track.performer !== undefined) {
		lines.push(`    PERFORMER ${quote(track.performer)}`)
	}
	if (track.songwriter !== undefined) {
		lines.push(`    SONGWRITER ${quote(track.songwriter)}`)
	}
	if (track.isrc !== undefined) {
		lines.push(`    ISRC ${encodeWord(track.isrc)}`)
	}
	if (track.flags.length > 0) {
		lines.push(`    FLAGS ${track.flags.join(' ')}`)
	}

	for (const index of track.indexes) {
		// an index synthesized from PREGAP is written back as the PREGAP
		if (index.pregap !== undefined) {
			lines.push(`    PREGAP ${index.pregap.toString()}`)
		} else {
			lines.push(`    INDEX ${pad2(index.number)} ${index.time.toString()}`)
		}
	}

	if (track.postgap !== undefined) {
		lines.push(`    POSTGAP ${track.postgap.toString()}`)
	}
}

function pad2(n: number): string {
	return String(n).padStart(2, '0')
}

function quote(value: string): string {
	if (value.includes('"')) {
		throw new Error(`Cannot encode ${JSON.stringify(value)}: CUE strings cannot contain '"'`)
	}
	return `"${value}"`
}

/**
 * Bare word where it would lex back as the same string, quoted otherwise
 */
function encodeWord(value: string): string {
	const bare =
		/^[^\s"]+$/.test(value) &&
		!/^\d\d$/.test(value) &&
		Time.tryParse(value.slice(0, 8)) === undefined
	return bare ? value : quote(value)
}

function encodeToken(token: CueToken): string {
	return token.kind === 'string' ? encodeWord(token.value) : formatToken(token)
}

/**
 * Create a single-file tracklist from track start times
 */
export function createCue(
	tracks: Array<{
		title: string
		performer?: string
		start: Time
	}>,
	options: {
		fileName: string
		fileFormat?: CueFileFormat
		title: string
		performer?: string
	}
): CueTracklist {
	if (tracks.length > MAX_TRACKS) {
		throw new Error(`A CUE sheet holds at most ${MAX_TRACKS} tracks, got ${tracks.length}`)
	}

	const cueTracks = tracks.map((t, i): CueTrack => ({
		number: i + 1,
		title: t.title,
		type: { kind: 'audio' },
		performer: t.performer,
		flags: [],
		indexes: [{ number: 1, time: t.start }],
	}))

	return {
		title: options.title,
		performer: options.performer,
		remarks: [],
		files: [{
			name: options.fileName,
			format: options.fileFormat ?? 'WAVE',
			tracks: inferDurations(cueTracks),
		}],
	}
}
