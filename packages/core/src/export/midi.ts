// =============================================================================
// SongSketch - MIDI File Export
// =============================================================================

import { writeFile } from 'fs/promises'
import type { Chord, DrumTrack, InstrumentTrack, Score } from '../score/types'
import { BEATS_PER_BAR, DEFAULT_DRUM_TRACK_NAME, DEFAULT_TRACK_PAN, hasDrumHits, totalBeats } from '../score/score'
import { DEFAULT_TABLES, lookupDrumPitch, melodicProgram, type MusicTables } from '../tables'
import { chordPitches } from '../theory/chord'
import { clampPitch } from '../theory/pitch'
import { DRUM_CHANNEL, melodicChannel } from '../compiler/channels'
import type { MidiExportOptions, MidiExportResult, MidiExportTrackInfo, MidiTrackData, MidiTrackEvent } from './types'
import {
  CC_PAN,
  CC_VOLUME,
  beatsToTicks,
  concatArrays,
  controlChange,
  endOfTrackMeta,
  noteOff,
  noteOn,
  programChange,
  tempoMeta,
  trackNameMeta,
  unitToMidi,
  writeAscii,
  writeUint16BE,
  writeUint32BE,
  writeVLQ
} from './midi-utils'

// =============================================================================
// Default Options
// =============================================================================

const DEFAULT_OPTIONS: Required<MidiExportOptions> = {
  ppq: 480,
  includeTrackNames: true,
  includeMixer: true
}

/** Shortest note written, in beats */
const MIN_NOTE_BEATS = 0.1

/** Drum hits are written with this fixed length, in beats */
const DRUM_HIT_BEATS = 0.25

const SMF_FORMAT = 1

export class MidiExportError extends Error {
  constructor(
    message: string,
    public readonly scoreTitle: string
  ) {
    super(message)
    this.name = 'MidiExportError'
  }
}

// =============================================================================
// Main Export Function
// =============================================================================

/**
 * Export a score to a format 1 Standard MIDI File.
 *
 * Track 0 carries the tempo. Instrument tracks follow, one per distinct track
 * name sorted by name, then a "Drums" track on channel 9 when any section has
 * hits. Channels are numbered by that sorted position, which can differ from
 * the first-seen order used for live playback.
 *
 * @example
 * ```typescript
 * const { score } = parseSong(text)
 * const { buffer } = exportMidi(score)
 * ```
 */
export function exportMidi(
  score: Score,
  options: MidiExportOptions = {},
  tables: MusicTables = DEFAULT_TABLES
): MidiExportResult {
  const opts = { ...DEFAULT_OPTIONS, ...options }

  if (score.sections.length === 0) {
    throw new MidiExportError('Score has no sections to export', score.title)
  }

  const names = [...new Set(score.sections.flatMap(section => section.tracks.map(track => track.name)))].sort()
  const tracks: MidiTrackData[] = [buildTempoTrack(score)]
  const infos: MidiExportTrackInfo[] = []

  names.forEach((name, index) => {
    const { track, info } = buildInstrumentTrack(score, name, melodicChannel(index), opts, tables)
    tracks.push(track)
    infos.push(info)
  })

  if (hasDrumHits(score)) {
    const { track, info } = buildDrumTrack(score, opts, tables)
    tracks.push(track)
    infos.push(info)
  }

  return {
    buffer: buildMidiFile(tracks, opts),
    trackCount: tracks.length,
    durationTicks: beatsToTicks(totalBeats(score), opts.ppq),
    ppq: opts.ppq,
    tracks: infos
  }
}

/**
 * Export a score and write it to disk.
 */
export async function saveMidiFile(
  score: Score,
  path: string,
  options: MidiExportOptions = {},
  tables: MusicTables = DEFAULT_TABLES
): Promise<MidiExportResult> {
  const result = exportMidi(score, options, tables)
  await writeFile(path, new Uint8Array(result.buffer))
  return result
}

// =============================================================================
// Track Building
// =============================================================================

function buildTempoTrack(score: Score): MidiTrackData {
  return {
    events: [{ tick: 0, order: 0, data: tempoMeta(score.tempo) }]
  }
}

function mixerEvents(channel: number, volume: number, pan: number): MidiTrackEvent[] {
  return [
    { tick: 0, order: 0, data: controlChange(channel, CC_VOLUME, unitToMidi(volume)) },
    { tick: 0, order: 0, data: controlChange(channel, CC_PAN, unitToMidi(pan)) }
  ]
}

function pushNote(
  events: MidiTrackEvent[],
  channel: number,
  pitch: number,
  startBeats: number,
  durationBeats: number,
  velocity: number,
  ppq: number
): void {
  const note = clampPitch(pitch)
  const vel = Math.max(1, Math.min(127, Math.trunc(velocity * 127)))
  const startTick = beatsToTicks(startBeats, ppq)
  const endTick = beatsToTicks(startBeats + Math.max(MIN_NOTE_BEATS, durationBeats), ppq)

  events.push({ tick: startTick, order: 2, data: noteOn(channel, note, vel) })
  events.push({ tick: endTick, order: 1, data: noteOff(channel, note) })
}

function buildInstrumentTrack(
  score: Score,
  name: string,
  channel: number,
  opts: Required<MidiExportOptions>,
  tables: MusicTables
): { track: MidiTrackData; info: MidiExportTrackInfo } {
  const events: MidiTrackEvent[] = []
  let first: InstrumentTrack | undefined
  let noteCount = 0

  for (const section of score.sections) {
    const sectionStart = section.startBar * BEATS_PER_BAR

    for (const track of section.tracks) {
      if (track.name !== name) continue
      first ??= track

      for (const note of track.notes) {
        pushNote(events, channel, note.pitch, sectionStart + note.start, note.duration, note.velocity, opts.ppq)
        noteCount++
      }
      for (const chord of track.chords) {
        noteCount += pushChord(events, channel, chord, sectionStart, opts.ppq, tables)
      }
    }
  }

  const program = first ? melodicProgram(first.instrument, tables) : tables.defaultProgram
  events.push({ tick: 0, order: 0, data: programChange(channel, program) })
  if (opts.includeMixer && first) {
    events.push(...mixerEvents(channel, first.volume, first.pan))
  }

  return {
    track: { name, events },
    info: { name, channel, program, noteCount }
  }
}

function pushChord(
  events: MidiTrackEvent[],
  channel: number,
  chord: Chord,
  sectionStart: number,
  ppq: number,
  tables: MusicTables
): number {
  const pitches = chordPitches(chord, tables)
  for (const pitch of pitches) {
    pushNote(events, channel, pitch, sectionStart + chord.start, chord.duration, chord.velocity, ppq)
  }
  return pitches.length
}

function buildDrumTrack(
  score: Score,
  opts: Required<MidiExportOptions>,
  tables: MusicTables
): { track: MidiTrackData; info: MidiExportTrackInfo } {
  const events: MidiTrackEvent[] = []
  let first: DrumTrack | undefined
  let noteCount = 0

  for (const section of score.sections) {
    if (!section.drums || section.drums.hits.length === 0) continue
    first ??= section.drums

    const sectionStart = section.startBar * BEATS_PER_BAR
    for (const hit of section.drums.hits) {
      const pitch = lookupDrumPitch(hit.drum, tables)
      pushNote(events, DRUM_CHANNEL, pitch, sectionStart + hit.start, DRUM_HIT_BEATS, hit.velocity, opts.ppq)
      noteCount++
    }
  }

  if (opts.includeMixer && first) {
    events.push(...mixerEvents(DRUM_CHANNEL, first.volume, DEFAULT_TRACK_PAN))
  }

  return {
    track: { name: DEFAULT_DRUM_TRACK_NAME, events },
    info: { name: DEFAULT_DRUM_TRACK_NAME, channel: DRUM_CHANNEL, program: null, noteCount }
  }
}

// =============================================================================
// MIDI File Building
// =============================================================================

function buildMidiFile(tracks: MidiTrackData[], options: Required<MidiExportOptions>): ArrayBuffer {
  const chunks: Uint8Array[] = [buildHeaderChunk(tracks.length, options.ppq)]

  for (const track of tracks) {
    chunks.push(buildTrackChunk(track, options))
  }

  const result = concatArrays(...chunks)
  // Copy into a plain ArrayBuffer so callers never see a SharedArrayBuffer
  const arrayBuffer = new ArrayBuffer(result.byteLength)
  new Uint8Array(arrayBuffer).set(result)
  return arrayBuffer
}

function buildHeaderChunk(trackCount: number, ppq: number): Uint8Array {
  return concatArrays(
    writeAscii('MThd'),
    writeUint32BE(6),
    writeUint16BE(SMF_FORMAT),
    writeUint16BE(trackCount),
    writeUint16BE(ppq)
  )
}

function buildTrackChunk(track: MidiTrackData, options: Required<MidiExportOptions>): Uint8Array {
  const eventBytes: Uint8Array[] = []

  if (track.name && options.includeTrackNames) {
    eventBytes.push(writeVLQ(0), trackNameMeta(track.name))
  }

  // Stable: events of equal tick and order keep insertion order
  const sorted = [...track.events].sort((a, b) => a.tick - b.tick || a.order - b.order)

  let prevTick = 0
  for (const event of sorted) {
    eventBytes.push(writeVLQ(Math.max(0, event.tick - prevTick)), event.data)
    prevTick = event.tick
  }

  eventBytes.push(writeVLQ(0), endOfTrackMeta())

  const trackData = concatArrays(...eventBytes)
  return concatArrays(writeAscii('MTrk'), writeUint32BE(trackData.length), trackData)
}
