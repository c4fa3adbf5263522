// =============================================================================
// SongSketch - Standard MIDI File Reader
// =============================================================================

import { META_END_OF_TRACK, META_SET_TEMPO, META_TRACK_NAME, microsPerBeatToBpm, readVLQ } from './midi-utils'

export type SmfFormat = 0 | 1 | 2

export interface MidiFile {
  format: SmfFormat
  trackCount: number
  /** Pulses (ticks) per quarter note */
  ppq: number
  tracks: MidiTrack[]
}

export interface MidiTrack {
  /** From the track name meta event, if present */
  name?: string
  /** In file order, with absolute ticks */
  events: MidiEvent[]
}

export type MidiEvent =
  | { type: 'note_on'; tick: number; channel: number; note: number; velocity: number }
  | { type: 'note_off'; tick: number; channel: number; note: number; velocity: number }
  | { type: 'control_change'; tick: number; channel: number; controller: number; value: number }
  | { type: 'program_change'; tick: number; channel: number; program: number }
  | { type: 'meta'; tick: number; metaType: number; data: Uint8Array; text?: string }

function toFormat(value: number): SmfFormat {
  if (value === 0) return 0
  if (value === 1) return 1
  if (value === 2) return 2
  throw new Error(`Unsupported MIDI format: ${value}`)
}

/**
 * Parse a Standard MIDI File. Only PPQ time division is supported.
 *
 * Channel messages other than note, controller and program change are skipped.
 *
 * @throws Error if the file is invalid or truncated
 */
export function parseMidiBuffer(buffer: ArrayBuffer | Uint8Array): MidiFile {
  const bytes = buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer)
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  let offset = 0

  const headerId = readChunkId(bytes, offset)
  if (headerId !== 'MThd') {
    throw new Error(`Invalid MIDI file: expected 'MThd' header, got '${headerId}'`)
  }
  const headerLength = view.getUint32(4, false)
  if (headerLength < 6) {
    throw new Error(`Invalid MIDI header length: ${headerLength}`)
  }

  const format = toFormat(view.getUint16(8, false))
  const trackCount = view.getUint16(10, false)
  const division = view.getUint16(12, false)
  if (division & 0x8000) {
    throw new Error('SMPTE timing is not supported, only PPQ (ticks per quarter note)')
  }

  offset = 8 + headerLength

  const tracks: MidiTrack[] = []
  for (let i = 0; i < trackCount; i++) {
    const chunkId = readChunkId(bytes, offset)
    if (chunkId !== 'MTrk') {
      throw new Error(`Invalid track chunk: expected 'MTrk', got '${chunkId}' at offset ${offset}`)
    }
    const length = view.getUint32(offset + 4, false)
    const start = offset + 8
    const end = start + length
    if (end > bytes.length) {
      throw new Error(`Track ${i} extends beyond file: needs ${end}, have ${bytes.length}`)
    }

    tracks.push(parseTrack(bytes, start, end))
    offset = end
  }

  return { format, trackCount, ppq: division, tracks }
}

function parseTrack(bytes: Uint8Array, start: number, end: number): MidiTrack {
  const events: MidiEvent[] = []
  let offset = start
  let tick = 0
  let runningStatus = 0
  let name: string | undefined

  while (offset < end) {
    const delta = readVLQ(bytes, offset)
    tick += delta.value
    offset += delta.bytesRead
    if (offset >= end) break

    let status = bytes[offset]
    if (status < 0x80) {
      // Running status: the byte is already data
      if (runningStatus === 0) {
        throw new Error(`Invalid running status at offset ${offset}`)
      }
      status = runningStatus
    } else {
      offset++
      runningStatus = status < 0xF0 ? status : 0
    }

    if (status === 0xFF) {
      const metaType = bytes[offset++]
      const length = readVLQ(bytes, offset)
      offset += length.bytesRead
      const data = bytes.slice(offset, offset + length.value)
      offset += length.value

      const text = metaType >= 0x01 && metaType <= 0x07 ? String.fromCharCode(...data) : undefined
      if (metaType === META_TRACK_NAME) name = text
      events.push(text === undefined ? { type: 'meta', tick, metaType, data } : { type: 'meta', tick, metaType, data, text })

      if (metaType === META_END_OF_TRACK) break
      continue
    }

    if (status === 0xF0 || status === 0xF7) {
      const length = readVLQ(bytes, offset)
      offset += length.bytesRead + length.value
      continue
    }

    const channel = status & 0x0F
    switch (status & 0xF0) {
      case 0x80:
        events.push({ type: 'note_off', tick, channel, note: bytes[offset], velocity: bytes[offset + 1] })
        offset += 2
        break
      case 0x90:
        events.push({ type: 'note_on', tick, channel, note: bytes[offset], velocity: bytes[offset + 1] })
        offset += 2
        break
      case 0xB0:
        events.push({ type: 'control_change', tick, channel, controller: bytes[offset], value: bytes[offset + 1] })
        offset += 2
        break
      case 0xC0:
        events.push({ type: 'program_change', tick, channel, program: bytes[offset] })
        offset += 1
        break
      case 0xD0:
        offset += 1
        break
      default:
        // Poly pressure and pitch bend carry two data bytes
        offset += 2
        break
    }
  }

  return name === undefined ? { events } : { name, events }
}

/**
 * Tempo of the first Set Tempo meta event in the file, in BPM.
 */
export function readTempo(file: MidiFile): number | undefined {
  for (const track of file.tracks) {
    for (const event of track.events) {
      if (event.type === 'meta' && event.metaType === META_SET_TEMPO && event.data.length === 3) {
        const micros = (event.data[0] << 16) | (event.data[1] << 8) | event.data[2]
        return microsPerBeatToBpm(micros)
      }
    }
  }
  return undefined
}

function readChunkId(bytes: Uint8Array, offset: number): string {
  if (offset + 4 > bytes.length) {
    throw new Error(`Unexpected end of file at offset ${offset}`)
  }
  return String.fromCharCode(bytes[offset], bytes[offset + 1], bytes[offset + 2], bytes[offset + 3])
}
