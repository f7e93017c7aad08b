export * from './cue'
