/**
 * Command-line argument parsing
 */

export type OutputFormat = 'musicbrainz' | 'summary' | 'cue' | 'json'

export interface CliOptions {
	format: OutputFormat

	// Flags
	verbose?: boolean
	quiet?: boolean

	// Commands
	help?: boolean
	version?: boolean
}

const OUTPUT_FORMATS: readonly OutputFormat[] = ['musicbrainz', 'summary', 'cue', 'json']

function parseFormat(value: string): OutputFormat {
	const format = OUTPUT_FORMATS.find(f => f === value.toLowerCase())
	if (!format) {
		throw new Error(`Unknown format: ${value} (expected ${OUTPUT_FORMATS.join(', ')})`)
	}
	return format
}

export function parseArgs(args: string[]): { inputs: string[]; options: CliOptions } {
	const inputs: string[] = []
	const options: CliOptions = { format: 'musicbrainz' }

	let i = 0
	while (i < args.length) {
		const arg = args[i]!

		if (arg === '--help' || arg === '-h') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet' || arg === '-q') {
			options.quiet = true
		} else if (arg === '--format' || arg === '-f') {
			const value = args[++i]
			if (value === undefined) {
				throw new Error(`Missing value for ${arg}`)
			}
			options.format = parseFormat(value)
		} else if (arg.startsWith('--format=')) {
			options.format = parseFormat(arg.slice('--format='.length))
		} else if (arg.startsWith('-') && arg !== '-') {
			throw new Error(`Unknown option: ${arg}`)
		} else {
			inputs.push(arg)
		}
		i++
	}

	if (options.quiet && options.verbose) {
		throw new Error('--quiet and --verbose cannot be combined')
	}

	return { inputs, options }
}
