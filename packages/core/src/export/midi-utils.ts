// =============================================================================
// SongSketch - MIDI Byte Builders
// =============================================================================

// =============================================================================
// Variable Length Quantity (VLQ)
// =============================================================================

/**
 * Encode a delta time or length as a MIDI Variable Length Quantity.
 *
 * Seven value bits per byte, most significant group first; every byte but the
 * last has bit 7 set. At most 4 bytes (28-bit value).
 */
export function writeVLQ(value: number): Uint8Array {
  if (value < 0 || !Number.isInteger(value)) {
    throw new Error(`VLQ value must be a non-negative integer: ${value}`)
  }

  const bytes = [value & 0x7F]
  for (let rest = value >>> 7; rest > 0; rest >>>= 7) {
    bytes.unshift((rest & 0x7F) | 0x80)
  }
  return new Uint8Array(bytes)
}

/**
 * Decode a VLQ starting at `offset`.
 */
export function readVLQ(bytes: Uint8Array, offset: number): { value: number; bytesRead: number } {
  let value = 0
  let bytesRead = 0

  while (offset + bytesRead < bytes.length) {
    const byte = bytes[offset + bytesRead]
    bytesRead++
    value = (value << 7) | (byte & 0x7F)

    if ((byte & 0x80) === 0) break
    if (bytesRead >= 4) {
      throw new Error(`Invalid VLQ: too many bytes at offset ${offset}`)
    }
  }

  return { value, bytesRead }
}

// =============================================================================
// Unit Conversion
// =============================================================================

export function beatsToTicks(beats: number, ppq: number): number {
  return Math.round(beats * ppq)
}

/**
 * Microseconds per quarter note, as stored in the Set Tempo meta event.
 */
export function bpmToMicrosPerBeat(bpm: number): number {
  return Math.round(60_000_000 / bpm)
}

export function microsPerBeatToBpm(microsPerBeat: number): number {
  return 60_000_000 / microsPerBeat
}

/**
 * Map a 0-1 level (volume, pan) to a 7-bit controller value, truncating.
 */
export function unitToMidi(value: number): number {
  return Math.max(0, Math.min(127, Math.trunc(value * 127)))
}

// =============================================================================
// Binary Writing
// =============================================================================

export function writeUint16BE(value: number): Uint8Array {
  return new Uint8Array([(value >> 8) & 0xFF, value & 0xFF])
}

export function writeUint24BE(value: number): Uint8Array {
  return new Uint8Array([(value >> 16) & 0xFF, (value >> 8) & 0xFF, value & 0xFF])
}

export function writeUint32BE(value: number): Uint8Array {
  return new Uint8Array([(value >>> 24) & 0xFF, (value >> 16) & 0xFF, (value >> 8) & 0xFF, value & 0xFF])
}

/**
 * 7-bit ASCII bytes; characters outside the range lose their high bits.
 */
export function writeAscii(str: string): Uint8Array {
  return Uint8Array.from(str, ch => ch.charCodeAt(0) & 0x7F)
}

export function concatArrays(...arrays: Uint8Array[]): Uint8Array {
  const result = new Uint8Array(arrays.reduce((sum, arr) => sum + arr.length, 0))
  let offset = 0
  for (const arr of arrays) {
    result.set(arr, offset)
    offset += arr.length
  }
  return result
}

// =============================================================================
// Channel Messages
// =============================================================================

export const CC_VOLUME = 7
export const CC_PAN = 10
export const CC_ALL_NOTES_OFF = 123

export function noteOn(channel: number, note: number, velocity: number): Uint8Array {
  return new Uint8Array([0x90 | (channel & 0x0F), note & 0x7F, velocity & 0x7F])
}

export function noteOff(channel: number, note: number, velocity: number = 0): Uint8Array {
  return new Uint8Array([0x80 | (channel & 0x0F), note & 0x7F, velocity & 0x7F])
}

export function controlChange(channel: number, controller: number, value: number): Uint8Array {
  return new Uint8Array([0xB0 | (channel & 0x0F), controller & 0x7F, value & 0x7F])
}

export function programChange(channel: number, program: number): Uint8Array {
  return new Uint8Array([0xC0 | (channel & 0x0F), program & 0x7F])
}

// =============================================================================
// Meta Events
// =============================================================================

export const META_TRACK_NAME = 0x03
export const META_END_OF_TRACK = 0x2F
export const META_SET_TEMPO = 0x51

export function tempoMeta(bpm: number): Uint8Array {
  return concatArrays(new Uint8Array([0xFF, META_SET_TEMPO, 0x03]), writeUint24BE(bpmToMicrosPerBeat(bpm)))
}

export function trackNameMeta(name: string): Uint8Array {
  const nameBytes = writeAscii(name)
  return concatArrays(new Uint8Array([0xFF, META_TRACK_NAME]), writeVLQ(nameBytes.length), nameBytes)
}

export function endOfTrackMeta(): Uint8Array {
  return new Uint8Array([0xFF, META_END_OF_TRACK, 0x00])
}
