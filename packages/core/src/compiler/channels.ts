import type { Score } from '../score/types'
import { DEFAULT_DRUM_TRACK_NAME, DEFAULT_TRACK_VOLUME, DEFAULT_TRACK_PAN, hasDrumHits } from '../score/score'
import { DEFAULT_TABLES, melodicProgram, type MusicTables } from '../tables'
import type { ChannelAssignment } from './types'

export const DRUM_CHANNEL = 9
export const MAX_CHANNEL = 15

/**
 * Channel for the n-th melodic track, stepping over the drum channel.
 * Tracks past the last channel share it.
 */
export function melodicChannel(index: number): number {
  const channel = index < DRUM_CHANNEL ? index : index + 1
  return Math.min(channel, MAX_CHANNEL)
}

/**
 * Live-playback channel plan: track names in first-seen order across all
 * sections, then a "Drums" track on channel 9 when any section has hits.
 *
 * MIDI export numbers its channels by sorted track name instead, so the two
 * may differ for the same score.
 */
export function assignChannels(score: Score, tables: MusicTables = DEFAULT_TABLES): ChannelAssignment[] {
  const assignments: ChannelAssignment[] = []
  const seen = new Set<string>()

  for (const section of score.sections) {
    for (const track of section.tracks) {
      if (seen.has(track.name)) continue
      seen.add(track.name)

      assignments.push({
        track: track.name,
        instrument: track.instrument,
        channel: melodicChannel(assignments.length),
        program: melodicProgram(track.instrument, tables),
        percussion: false,
        volume: track.volume,
        pan: track.pan
      })
    }
  }

  if (hasDrumHits(score)) {
    const drums = score.sections.find(section => section.drums !== undefined)?.drums
    assignments.push({
      track: DEFAULT_DRUM_TRACK_NAME,
      instrument: 'drums',
      channel: DRUM_CHANNEL,
      program: 0,
      percussion: true,
      volume: drums?.volume ?? DEFAULT_TRACK_VOLUME,
      pan: DEFAULT_TRACK_PAN
    })
  }

  return assignments
}
