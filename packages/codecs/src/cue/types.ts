/**
 * CUE sheet types
 * CD track listing format
 */

import type { Time } from '@cuesheet/core'

/**
 * Lexical token
 *
 * Tokens carry no source position; their order is the only relation.
 */
export type CueToken =
	| { kind: 'number'; value: number } // exactly two ASCII digits
	| { kind: 'string'; value: string } // bare or quoted word
	| { kind: 'time'; value: Time } // mm:ss:ff

export type CueTokenKind = CueToken['kind']

/**
 * File type
 */
export type CueFileFormat =
	| 'WAVE'     // WAV audio file (also other lossless formats)
	| 'MP3'      // MP3 audio file
	| 'AIFF'     // AIFF audio file
	| 'BINARY'   // Binary file (little-endian)
	| 'MOTOROLA' // Binary file (big-endian)

/**
 * Track data type
 */
export type CueTrackType =
	| { kind: 'audio' }                                 // Audio/Music (2352 bytes/sector)
	| { kind: 'cdg' }                                   // Karaoke CD+G (2448)
	| { kind: 'mode'; mode: 1 | 2; sectorSize: number } // CD-ROM Mode 1 / XA Mode 2 data
	| { kind: 'cdi'; sectorSize: number }               // CD-I Mode 2 data

/**
 * Track flags
 */
export type CueTrackFlag =
	| 'DCP'  // Digital copy permitted
	| '4CH'  // Four channel audio
	| 'PRE'  // Pre-emphasis enabled
	| 'SCMS' // Serial copy management system

/**
 * One command of the sheet, in file order
 */
export type CueCommand =
	| { type: 'catalog'; code: string } // 13-digit UPC/EAN
	| { type: 'cdtextfile'; path: string }
	| { type: 'file'; path: string; format: CueFileFormat }
	| { type: 'flags'; flags: CueTrackFlag[] }
	| { type: 'index'; number: number; time: Time }
	| { type: 'isrc'; code: string }
	| { type: 'performer'; name: string }
	| { type: 'postgap'; time: Time }
	| { type: 'pregap'; time: Time }
	| { type: 'rem'; key: string; value: CueToken } // value kept verbatim
	| { type: 'songwriter'; name: string }
	| { type: 'title'; name: string }
	| { type: 'track'; number: number; trackType: CueTrackType }

export type CueCommandType = CueCommand['type']

/**
 * Index entry
 */
export interface CueIndex {
	number: number
	time: Time
	/** Length of the PREGAP this index was synthesized from */
	pregap?: Time
}

/**
 * REM entry
 */
export interface CueRemark {
	key: string
	value: CueToken
}

/**
 * Track entry
 */
export interface CueTrack {
	/** Track number as declared, not necessarily contiguous */
	number: number
	title: string
	type: CueTrackType
	performer?: string
	songwriter?: string
	isrc?: string
	flags: CueTrackFlag[]
	pregap?: Time
	postgap?: Time
	/**
	 * Only known once the next track's first index is read, so the last
	 * track of a file never has one.
	 */
	duration?: Time
	indexes: CueIndex[]
}

/**
 * File reference
 */
export interface CueTrackFile {
	name: string
	format: CueFileFormat
	tracks: CueTrack[]
}

/**
 * Assembled album
 */
export interface CueTracklist {
	/** Album/disc title */
	title: string
	/** Performer/artist */
	performer?: string
	/** Songwriter */
	songwriter?: string
	/** Catalog number (MCN/UPC) */
	catalog?: string
	/** CD-TEXT file */
	cdTextFile?: string
	/** Album-level REM entries */
	remarks: CueRemark[]
	/** Files with tracks */
	files: CueTrackFile[]
}

/**
 * Encode options
 */
export interface CueEncodeOptions {
	/** Include REM entries */
	includeRemarks?: boolean
}

const FILE_FORMATS: readonly CueFileFormat[] = ['WAVE', 'MP3', 'AIFF', 'BINARY', 'MOTOROLA']

const TRACK_FLAGS: readonly CueTrackFlag[] = ['DCP', '4CH', 'PRE', 'SCMS']

const TRACK_TYPES: Record<string, CueTrackType> = {
	AUDIO: { kind: 'audio' },
	CDG: { kind: 'cdg' },
	'MODE1/2048': { kind: 'mode', mode: 1, sectorSize: 2048 },
	'MODE1/2352': { kind: 'mode', mode: 1, sectorSize: 2352 },
	'MODE2/2048': { kind: 'mode', mode: 2, sectorSize: 2048 },
	'MODE2/2324': { kind: 'mode', mode: 2, sectorSize: 2324 },
	'MODE2/2336': { kind: 'mode', mode: 2, sectorSize: 2336 },
	'MODE2/2352': { kind: 'mode', mode: 2, sectorSize: 2352 },
	'CDI/2336': { kind: 'cdi', sectorSize: 2336 },
	'CDI/2352': { kind: 'cdi', sectorSize: 2352 },
}

/**
 * Parse file format keyword (case-insensitive)
 */
export function parseFileFormat(text: string): CueFileFormat | undefined {
	const upper = text.toUpperCase()
	return FILE_FORMATS.find(f => f === upper)
}

/**
 * Parse track type keyword (case-insensitive)
 */
export function parseTrackType(text: string): CueTrackType | undefined {
	const type = TRACK_TYPES[text.toUpperCase()]
	return type ? { ...type } : undefined
}

/**
 * Parse track flag keyword (exact match)
 */
export function parseTrackFlag(text: string): CueTrackFlag | undefined {
	return TRACK_FLAGS.find(f => f === text)
}

/**
 * Format track type as its keyword
 */
export function formatTrackType(type: CueTrackType): string {
	switch (type.kind) {
		case 'audio':
			return 'AUDIO'
		case 'cdg':
			return 'CDG'
		case 'mode':
			return `MODE${type.mode}/${type.sectorSize}`
		case 'cdi':
			return `CDI/${type.sectorSize}`
	}
}

/**
 * Format token the way it would appear in a sheet
 */
export function formatToken(token: CueToken): string {
	switch (token.kind) {
		case 'number':
			return String(token.value).padStart(2, '0')
		case 'time':
			return token.value.toString()
		case 'string':
			return token.value
	}
}
