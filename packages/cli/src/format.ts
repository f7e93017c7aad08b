/**
 * Tracklist renderers for the CLI
 */

import { encodeCue, getCueTracks, getTotalDuration, type CueTracklist } from '@cuesheet/codec'
import type { OutputFormat } from './args'

const UNKNOWN_DURATION = '??:??'

/**
 * One line per track in the form the MusicBrainz tracklist parser takes:
 * `NN Title - Performer MM:SS`
 *
 * The last track of a file has no known length, since that would need the
 * audio file itself.
 */
export function formatMusicBrainz(tracklist: CueTracklist): string {
	const lines: string[] = []

	for (const track of getCueTracks(tracklist)) {
		const performer = track.performer ?? tracklist.performer
		if (performer === undefined) {
			throw new Error(`Track ${track.number} has no performer and the album has none either`)
		}
		const duration = track.duration?.toShortString() ?? UNKNOWN_DURATION
		lines.push(`${String(track.number).padStart(2, '0')} ${track.title} - ${performer} ${duration}`)
	}

	return lines.join('\n') + '\n'
}

export function formatSummary(tracklist: CueTracklist): string {
	const tracks = getCueTracks(tracklist)
	const lines = [
		`Title: ${tracklist.title}`,
		`Performer: ${tracklist.performer ?? 'unknown'}`,
		`Files: ${tracklist.files.length}`,
		`Tracks: ${tracks.length}`,
		`Known duration: ${getTotalDuration(tracklist).toString()}`,
	]
	if (tracklist.catalog) {
		lines.push(`Catalog: ${tracklist.catalog}`)
	}
	return lines.join('\n') + '\n'
}

export function render(tracklist: CueTracklist, format: OutputFormat): string {
	switch (format) {
		case 'musicbrainz':
			return formatMusicBrainz(tracklist)
		case 'summary':
			return formatSummary(tracklist)
		case 'cue':
			return encodeCue(tracklist)
		case 'json':
			return JSON.stringify(tracklist, null, 2) + '\n'
	}
}
