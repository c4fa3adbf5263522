import { mkdtemp, readFile, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { MidiExportError, exportMidi, saveMidiFile } from '../export/midi'
import { parseMidiBuffer, readTempo, type MidiEvent, type MidiTrack } from '../export/midi-reader'
import { bpmToMicrosPerBeat, readVLQ, writeVLQ } from '../export/midi-utils'
import { createDrumTrack, createInstrumentTrack, createScore, createSection } from '../score/score'
import type { Score } from '../score/types'

function sampleScore(): Score {
  return createScore({
    title: 'Export',
    tempo: 120,
    sections: [
      createSection('A', 1, {
        tracks: [
          createInstrumentTrack('Piano', 'piano', {
            chords: [{ root: 'C', quality: '', octave: 4, start: 0, duration: 4, velocity: 0.5 }]
          }),
          createInstrumentTrack('Bass', 'bass', {
            notes: [{ pitch: 36, start: 2, duration: 0.05, velocity: 1 }],
            volume: 1,
            pan: 0
          })
        ],
        drums: createDrumTrack({ hits: [{ drum: 'kick', start: 0, velocity: 0.8 }] })
      })
    ]
  })
}

function channelEvents(track: MidiTrack): MidiEvent[] {
  return track.events.filter(e => e.type !== 'meta')
}

describe('MIDI export', () => {
  it('writes a tempo track, sorted instrument tracks and a trailing drum track', () => {
    const result = exportMidi(sampleScore())

    expect(result.trackCount).toBe(4)
    expect(result.ppq).toBe(480)
    expect(result.durationTicks).toBe(1920)
    expect(result.tracks).toEqual([
      { name: 'Bass', channel: 0, program: 33, noteCount: 1 },
      { name: 'Piano', channel: 1, program: 0, noteCount: 3 },
      { name: 'Drums', channel: 9, program: null, noteCount: 1 }
    ])

    const file = parseMidiBuffer(result.buffer)
    expect(file.format).toBe(1)
    expect(file.trackCount).toBe(4)
    expect(file.ppq).toBe(480)
    expect(file.tracks.map(t => t.name)).toEqual([undefined, 'Bass', 'Piano', 'Drums'])
    expect(readTempo(file)).toBe(120)
  })

  it('writes setup events first and stretches very short notes', () => {
    const file = parseMidiBuffer(exportMidi(sampleScore()).buffer)

    expect(channelEvents(file.tracks[1])).toEqual([
      { type: 'program_change', tick: 0, channel: 0, program: 33 },
      { type: 'control_change', tick: 0, channel: 0, controller: 7, value: 127 },
      { type: 'control_change', tick: 0, channel: 0, controller: 10, value: 0 },
      { type: 'note_on', tick: 960, channel: 0, note: 36, velocity: 127 },
      { type: 'note_off', tick: 1008, channel: 0, note: 36, velocity: 0 }
    ])
  })

  it('expands chords and gives drum hits a fixed length', () => {
    const file = parseMidiBuffer(exportMidi(sampleScore()).buffer)

    const pianoNotes = channelEvents(file.tracks[2]).filter(e => e.type === 'note_on')
    expect(pianoNotes).toEqual([
      { type: 'note_on', tick: 0, channel: 1, note: 60, velocity: 63 },
      { type: 'note_on', tick: 0, channel: 1, note: 64, velocity: 63 },
      { type: 'note_on', tick: 0, channel: 1, note: 67, velocity: 63 }
    ])

    expect(channelEvents(file.tracks[3])).toEqual([
      { type: 'control_change', tick: 0, channel: 9, controller: 7, value: 101 },
      { type: 'control_change', tick: 0, channel: 9, controller: 10, value: 63 },
      { type: 'note_on', tick: 0, channel: 9, note: 36, velocity: 101 },
      { type: 'note_off', tick: 120, channel: 9, note: 36, velocity: 0 }
    ])
  })

  it('puts note-offs before note-ons on the same tick', () => {
    const score = createScore({
      sections: [createSection('A', 1, {
        tracks: [createInstrumentTrack('Lead', 'lead', {
          notes: [
            { pitch: 72, start: 0, duration: 1, velocity: 0.7 },
            { pitch: 74, start: 1, duration: 1, velocity: 0.7 }
          ]
        })]
      })]
    })
    const notes = channelEvents(parseMidiBuffer(exportMidi(score, { ppq: 96 }).buffer).tracks[1])
      .filter(e => e.type === 'note_on' || e.type === 'note_off')

    expect(notes.map(e => [e.type, e.tick])).toEqual([
      ['note_on', 0],
      ['note_off', 96],
      ['note_on', 96],
      ['note_off', 192]
    ])
  })

  it('can leave out track names and mixer settings', () => {
    const file = parseMidiBuffer(exportMidi(sampleScore(), { includeTrackNames: false, includeMixer: false }).buffer)

    expect(file.tracks.map(t => t.name)).toEqual([undefined, undefined, undefined, undefined])
    expect(file.tracks.flatMap(t => t.events).some(e => e.type === 'control_change')).toBe(false)
  })

  it('numbers channels past the drum channel', () => {
    const tracks = Array.from({ length: 10 }, (_, i) => createInstrumentTrack(`T${i}`, 'piano', {
      notes: [{ pitch: 60, start: 0, duration: 1, velocity: 0.7 }]
    }))
    const result = exportMidi(createScore({ sections: [createSection('A', 1, { tracks })] }))

    expect(result.tracks.map(t => t.channel)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 10])
  })

  it('refuses a score without sections', () => {
    expect(() => exportMidi(createScore({ title: 'Empty' }))).toThrow(MidiExportError)
    try {
      exportMidi(createScore({ title: 'Empty' }))
    } catch (e) {
      expect(e instanceof MidiExportError && e.scoreTitle).toBe('Empty')
    }
  })

  it('saves a file that reads back', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'songsketch-midi-'))
    try {
      const path = join(dir, 'song.mid')
      const result = await saveMidiFile(sampleScore(), path)
      const bytes = new Uint8Array(await readFile(path))

      expect(bytes.length).toBe(result.buffer.byteLength)
      expect(parseMidiBuffer(bytes).trackCount).toBe(4)
    } finally {
      await rm(dir, { recursive: true, force: true })
    }
  })
})

describe('MIDI utilities', () => {
  it('encodes variable-length quantities', () => {
    expect(Array.from(writeVLQ(0))).toEqual([0x00])
    expect(Array.from(writeVLQ(127))).toEqual([0x7F])
    expect(Array.from(writeVLQ(128))).toEqual([0x81, 0x00])
    expect(Array.from(writeVLQ(0x3FFF))).toEqual([0xFF, 0x7F])
    expect(Array.from(writeVLQ(0x200000))).toEqual([0x81, 0x80, 0x80, 0x00])
  })

  it('rejects negative and fractional quantities', () => {
    expect(() => writeVLQ(-1)).toThrow('VLQ value must be a non-negative integer: -1')
    expect(() => writeVLQ(1.5)).toThrow()
  })

  it('decodes what it encodes', () => {
    expect(readVLQ(new Uint8Array([0x00, 0x81, 0x00]), 1)).toEqual({ value: 128, bytesRead: 2 })
  })

  it('converts tempo to microseconds per beat', () => {
    expect(bpmToMicrosPerBeat(120)).toBe(500000)
    expect(bpmToMicrosPerBeat(90)).toBe(666667)
  })

  it('rejects files that are not MIDI', () => {
    expect(() => parseMidiBuffer(new Uint8Array([0x52, 0x49, 0x46, 0x46, 0, 0, 0, 6]))).toThrow(
      "Invalid MIDI file: expected 'MThd' header, got 'RIFF'"
    )
  })
})
