/**
 * CUE sheet codec
 *
 * Pipeline: text -> tokens -> commands -> tracklist.
 *
 * Features:
 * - Timecode, two-digit number and quoted/bare string tokens
 * - All standard commands incl. FLAGS, PREGAP/POSTGAP, REM, CATALOG
 * - Track durations inferred from adjacent indexes
 * - Implicit INDEX 00 synthesized from PREGAP
 * - Encoding back to sheet text
 */

export * from './types'
export * from './lexer'
export * from './command'
export * from './decoder'
export * from './encoder'
