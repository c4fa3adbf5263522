export type { Note, Chord, DrumHit, InstrumentTrack, DrumTrack, Section, Score, ParseResult } from './types'
export * from './score'
