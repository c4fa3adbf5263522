export { normalizeNoteName, noteSemitone, pitchOf, parseNoteToken, clampPitch, toMidiVelocity } from './pitch'
export { parseChordSymbol, resolveChordIntervals, chordPitches, type ChordSymbol } from './chord'
