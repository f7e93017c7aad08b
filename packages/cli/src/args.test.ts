import { describe, expect, it } from 'vitest'
import { parseArgs } from './args'

describe('parseArgs', () => {
	it('should default to the MusicBrainz format', () => {
		expect(parseArgs(['album.cue'])).toEqual({
			inputs: ['album.cue'],
			options: { format: 'musicbrainz' },
		})
	})

	it('should read flags and the output format', () => {
		const { inputs, options } = parseArgs(['-v', 'album.cue', '--format', 'JSON'])

		expect(inputs).toEqual(['album.cue'])
		expect(options).toEqual({ format: 'json', verbose: true })
		expect(parseArgs(['album.cue', '-q']).options).toEqual({ format: 'musicbrainz', quiet: true })
	})

	it('should reject --quiet together with --verbose', () => {
		expect(() => parseArgs(['-q', '-v', 'album.cue'])).toThrow('--quiet and --verbose cannot be combined')
	})

	it('should accept --format=value', () => {
		expect(parseArgs(['--format=cue', 'a.cue']).options.format).toBe('cue')
	})

	it('should read help and version', () => {
		expect(parseArgs(['--help']).options.help).toBe(true)
		expect(parseArgs(['-V']).options.version).toBe(true)
	})

	it('should reject unknown options and formats', () => {
		expect(() => parseArgs(['--bogus'])).toThrow('Unknown option: --bogus')
		expect(() => parseArgs(['-f', 'xml'])).toThrow('Unknown format: xml')
		expect(() => parseArgs(['--format'])).toThrow('Missing value for --format')
	})
})
