#!/usr/bin/env node
/**
 * cuesheet CLI - Read a cue sheet and print its tracklist
 */

import { isCueError } from '@cuesheet/core'
import { assembleTracklist, parseCommands, tokenize, type CueTracklist } from '@cuesheet/codec'
import { parseArgs, type CliOptions } from './args'
import { render } from './format'
import { readCueFile } from './input'

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

const VERSION = '0.1.0'

const EXIT_USAGE = 1
const EXIT_PARSE = 2

const HELP = `
cuesheet - Cue sheet to tracklist converter

USAGE:
  cuesheet <file.cue> [options]

OPTIONS:
  -f, --format <name>   Output: musicbrainz (default), summary, cue, json
  -v, --verbose         Report each parsing stage on stderr
  -q, --quiet           Report failures by exit code only
  -h, --help            Show this help
  -V, --version         Show version

EXAMPLES:
  cuesheet album.cue                      # MusicBrainz tracklist
  cuesheet album.cue --format summary     # Album overview
  cuesheet album.cue -f cue               # Normalized cue sheet
`

// ─────────────────────────────────────────────────────────────────────────────
// Conversion
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Run the pipeline stage by stage so verbose mode can report each one
 */
function decode(source: string, options: CliOptions): CueTracklist {
	const tokens = tokenize(source)
	if (options.verbose) console.error(`Tokens: ${tokens.length}`)

	const commands = parseCommands(tokens)
	if (options.verbose) console.error(`Commands: ${commands.length}`)

	const tracklist = assembleTracklist(commands)
	if (options.verbose) {
		const trackCount = tracklist.files.reduce((n, f) => n + f.tracks.length, 0)
		console.error(`Files: ${tracklist.files.length}, tracks: ${trackCount}`)
	}
	return tracklist
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

function main(): number {
	let parsed: ReturnType<typeof parseArgs>
	try {
		parsed = parseArgs(process.argv.slice(2))
	} catch (err) {
		console.error(`Error: ${err instanceof Error ? err.message : String(err)}`)
		return EXIT_USAGE
	}
	const { inputs, options } = parsed

	const fail = (code: number, message: string, usage = false): number => {
		if (!options.quiet) {
			console.error(`Error: ${message}`)
			if (usage) console.error(HELP)
		}
		return code
	}

	if (options.help) {
		console.log(HELP)
		return 0
	}
	if (options.version) {
		console.log(`cuesheet v${VERSION}`)
		return 0
	}

	const input = inputs[0]
	if (input === undefined || inputs.length > 1) {
		return fail(EXIT_USAGE, 'Expected exactly one cue sheet path', true)
	}

	if (options.verbose) console.error(`Reading: ${input}`)
	let source: string
	try {
		source = readCueFile(input)
	} catch (err) {
		return fail(EXIT_USAGE, err instanceof Error ? err.message : String(err))
	}

	try {
		process.stdout.write(render(decode(source, options), options.format))
	} catch (err) {
		if (isCueError(err)) {
			return fail(EXIT_PARSE, err.message)
		}
		if (err instanceof Error) {
			return fail(EXIT_USAGE, err.message)
		}
		throw err
	}
	return 0
}

process.exitCode = main()
