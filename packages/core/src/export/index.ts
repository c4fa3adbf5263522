// =============================================================================
// SongSketch - Export Module Public API
// =============================================================================

// --- MIDI Export ---
export { exportMidi, saveMidiFile, MidiExportError } from './midi'

// --- MIDI Reading ---
export { parseMidiBuffer, readTempo, type MidiFile, type MidiTrack, type MidiEvent, type SmfFormat } from './midi-reader'

// --- Types ---
export type { MidiExportOptions, MidiExportResult, MidiExportTrackInfo } from './types'

// --- Utilities ---
export {
  writeVLQ,
  readVLQ,
  beatsToTicks,
  bpmToMicrosPerBeat,
  microsPerBeatToBpm,
  unitToMidi,
  CC_VOLUME,
  CC_PAN,
  CC_ALL_NOTES_OFF
} from './midi-utils'
