// =============================================================================
// SongSketch - Timed-Event Compiler
// =============================================================================

import type { Score } from '../score/types'
import { BEATS_PER_BAR, DEFAULT_DRUM_TRACK_NAME, durationSeconds } from '../score/score'
import { DEFAULT_TABLES, lookupDrumPitch, type MusicTables } from '../tables'
import { chordPitches } from '../theory/chord'
import { clampPitch, toMidiVelocity } from '../theory/pitch'
import { DRUM_CHANNEL, assignChannels } from './channels'
import type { CompiledScore, TimedEvent } from './types'

/** Drum hits are not sustained; the note-off follows the note-on after this many seconds */
export const DRUM_HIT_SECONDS = 0.1

function pushPair(
  events: TimedEvent[],
  track: string,
  channel: number,
  pitch: number,
  velocity: number,
  start: number,
  end: number
): void {
  events.push(Object.freeze({ kind: 'note_on', seconds: start, channel, pitch, velocity, track }))
  events.push(Object.freeze({ kind: 'note_off', seconds: end, channel, pitch, velocity: 0, track }))
}

/**
 * Compile a score into absolute-time events plus the channel plan used to play them.
 *
 * All timing uses the song tempo; section tempos are informational. The score
 * is only read.
 *
 * @example
 * ```typescript
 * const { score } = parseSong(text)
 * const compiled = compileScore(score)
 * compiled.events[0] // { kind: 'note_on', seconds: 0, channel: 0, ... }
 * ```
 */
export function compileScore(score: Score, tables: MusicTables = DEFAULT_TABLES): CompiledScore {
  const channels = assignChannels(score, tables)
  const channelOf = new Map(channels.map(assignment => [assignment.track, assignment.channel]))

  const beatsPerSecond = score.tempo / 60
  const toSeconds = (beats: number): number => beats / beatsPerSecond

  const events: TimedEvent[] = []

  for (const section of score.sections) {
    const sectionStart = toSeconds(section.startBar * BEATS_PER_BAR)

    for (const track of section.tracks) {
      const channel = channelOf.get(track.name) ?? 0

      for (const note of track.notes) {
        const start = sectionStart + toSeconds(note.start)
        const end = start + toSeconds(note.duration)
        pushPair(events, track.name, channel, clampPitch(note.pitch), toMidiVelocity(note.velocity), start, end)
      }

      for (const chord of track.chords) {
        const start = sectionStart + toSeconds(chord.start)
        const end = start + toSeconds(chord.duration)
        const velocity = toMidiVelocity(chord.velocity)
        for (const pitch of chordPitches(chord, tables)) {
          pushPair(events, track.name, channel, pitch, velocity, start, end)
        }
      }
    }

    if (section.drums) {
      for (const hit of section.drums.hits) {
        const start = sectionStart + toSeconds(hit.start)
        const pitch = clampPitch(lookupDrumPitch(hit.drum, tables))
        pushPair(
          events,
          DEFAULT_DRUM_TRACK_NAME,
          DRUM_CHANNEL,
          pitch,
          toMidiVelocity(hit.velocity),
          start,
          start + DRUM_HIT_SECONDS
        )
      }
    }
  }

  // Array.prototype.sort is stable, so ties keep enumeration order
  events.sort((a, b) => a.seconds - b.seconds)

  return Object.freeze({
    events: Object.freeze(events),
    channels: Object.freeze(channels.map(assignment => Object.freeze(assignment))),
    tempo: score.tempo,
    durationSeconds: durationSeconds(score)
  })
}

/**
 * Just the sorted events of {@link compileScore}.
 */
export function compileEvents(score: Score, tables: MusicTables = DEFAULT_TABLES): readonly TimedEvent[] {
  return compileScore(score, tables).events
}
