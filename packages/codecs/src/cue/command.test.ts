import { describe, expect, it } from 'vitest'
import { CueSyntaxError, Time } from '@cuesheet/core'
import { parseCommands, parseCue, tokenize } from './index'

describe('parseCommands', () => {
	it('should parse FILE with a case-insensitive keyword and format', () => {
		expect(parseCue('FILE "album.wav" WAVE')).toEqual([
			{ type: 'file', path: 'album.wav', format: 'WAVE' },
		])
		expect(parseCue('file album.mp3 mp3')).toEqual([
			{ type: 'file', path: 'album.mp3', format: 'MP3' },
		])
	})

	it('should parse TRACK types', () => {
		expect(parseCue('TRACK 01 AUDIO TRACK 02 MODE2/2352 TRACK 03 CDI/2336 TRACK 04 cdg')).toEqual([
			{ type: 'track', number: 1, trackType: { kind: 'audio' } },
			{ type: 'track', number: 2, trackType: { kind: 'mode', mode: 2, sectorSize: 2352 } },
			{ type: 'track', number: 3, trackType: { kind: 'cdi', sectorSize: 2336 } },
			{ type: 'track', number: 4, trackType: { kind: 'cdg' } },
		])
	})

	it('should parse INDEX, PREGAP and POSTGAP', () => {
		expect(parseCue('PREGAP 00:02:00 INDEX 01 04:17:52 POSTGAP 00:01:00')).toEqual([
			{ type: 'pregap', time: new Time(0, 2, 0) },
			{ type: 'index', number: 1, time: new Time(4, 17, 52) },
			{ type: 'postgap', time: new Time(0, 1, 0) },
		])
	})

	it('should parse single string commands', () => {
		expect(parseCue('TITLE "A Title" PERFORMER Someone SONGWRITER "Writer" ISRC ABCDE1234567 CDTEXTFILE "text.cdt"')).toEqual([
			{ type: 'title', name: 'A Title' },
			{ type: 'performer', name: 'Someone' },
			{ type: 'songwriter', name: 'Writer' },
			{ type: 'isrc', code: 'ABCDE1234567' },
			{ type: 'cdtextfile', path: 'text.cdt' },
		])
	})

	it('should keep the REM value token verbatim', () => {
		expect(parseCue('REM DATE 1991 REM TRACKS 12 REM COMMENT "Ripped v1.0" REM START 00:00:33')).toEqual([
			{ type: 'rem', key: 'DATE', value: { kind: 'string', value: '1991' } },
			{ type: 'rem', key: 'TRACKS', value: { kind: 'number', value: 12 } },
			{ type: 'rem', key: 'COMMENT', value: { kind: 'string', value: 'Ripped v1.0' } },
			{ type: 'rem', key: 'START', value: { kind: 'time', value: new Time(0, 0, 33) } },
		])
	})

	describe('CATALOG', () => {
		it('should pad a number to 13 digits', () => {
			expect(parseCue('CATALOG 42')).toEqual([{ type: 'catalog', code: '0000000000042' }])
		})

		it('should accept a full catalog number', () => {
			expect(parseCue('CATALOG 1234567890123')).toEqual([{ type: 'catalog', code: '1234567890123' }])
			expect(parseCue('CATALOG 12345')).toEqual([{ type: 'catalog', code: '0000000012345' }])
		})

		it('should reject non-digit codes', () => {
			const run = () => parseCue('CATALOG 12345X')
			expect(run).toThrow(CueSyntaxError)
			expect(run).toThrow(expect.objectContaining({ reason: 'invalid-value', keyword: 'CATALOG', offset: 1 }))
		})
	})

	describe('FLAGS', () => {
		it('should read flags up to the next command', () => {
			expect(parseCue('FLAGS DCP PRE TITLE "PRE"')).toEqual([
				{ type: 'flags', flags: ['DCP', 'PRE'] },
				{ type: 'title', name: 'PRE' },
			])
		})

		it('should read flags up to the end of input', () => {
			expect(parseCue('FLAGS 4CH SCMS')).toEqual([{ type: 'flags', flags: ['4CH', 'SCMS'] }])
		})

		it('should stop at a non-string token', () => {
			const run = () => parseCue('FLAGS DCP 01')
			expect(run).toThrow(expect.objectContaining({ reason: 'unexpected-token', expected: 'string', offset: 2 }))
		})

		it('should reject FLAGS without flags', () => {
			const run = () => parseCue('FLAGS TITLE "x"')
			expect(run).toThrow(CueSyntaxError)
			expect(run).toThrow(expect.objectContaining({ kind: 'syntax', reason: 'missing-flags', keyword: 'FLAGS', offset: 1 }))
		})
	})

	describe('errors', () => {
		it('should reject an unknown keyword', () => {
			const run = () => parseCue('TITLE x BOGUS y')
			expect(run).toThrow(expect.objectContaining({ reason: 'unknown-keyword', keyword: 'BOGUS', offset: 2 }))
		})

		it('should reject a wrong token kind', () => {
			const run = () => parseCue('INDEX 1 00:00:00')
			expect(run).toThrow(expect.objectContaining({
				reason: 'unexpected-token',
				keyword: 'INDEX',
				expected: 'number',
				found: 'string "1"',
				offset: 1,
			}))
		})

		it('should reject a keyword that is not a string', () => {
			const run = () => parseCue('12 TITLE x')
			expect(run).toThrow(expect.objectContaining({ reason: 'unexpected-token', expected: 'string', found: 'number "12"', offset: 0 }))
		})

		it('should reject running out of tokens', () => {
			const run = () => parseCue('INDEX 01')
			expect(run).toThrow(expect.objectContaining({ reason: 'unexpected-end', keyword: 'INDEX', offset: 2 }))
		})

		it('should reject unknown file formats and track types', () => {
			expect(() => parseCue('FILE a.flac FLAC')).toThrow(expect.objectContaining({ reason: 'invalid-value', keyword: 'FILE' }))
			expect(() => parseCue('TRACK 01 VIDEO')).toThrow(expect.objectContaining({ reason: 'invalid-value', keyword: 'TRACK' }))
		})
	})

	it('should leave the token array untouched', () => {
		const tokens = tokenize('TITLE "x" FLAGS DCP FILE a.wav WAVE')
		const copy = [...tokens]
		parseCommands(tokens)
		expect(tokens).toEqual(copy)
	})
})
