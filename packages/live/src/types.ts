/**
 * Live playback types: the backend contract and player configuration.
 */

import type { TimedEvent } from '@songsketch/core'

// =============================================================================
// Backend
// =============================================================================

/**
 * Sound and mixer settings for one MIDI channel.
 */
export interface ChannelSetup {
  channel: number
  /** General MIDI program (0-127) */
  program: number
  /** Sound bank; 128 selects the percussion bank on channel 9 */
  bank: number
  /** 0-1 */
  volume: number
  /** 0 = left, 0.5 = center, 1 = right */
  pan: number
}

/**
 * A synthesizer output the player drives.
 *
 * Times are in the backend's own clock, in seconds.
 */
export interface PlaybackBackend {
  getCurrentTime(): number
  setupChannel(setup: ChannelSetup): void
  /** Deliver `event` at `atTime` (backend clock) */
  schedule(event: TimedEvent, atTime: number): void
  /** Drop everything scheduled but not yet sent, then silence every channel */
  cancelAll(): void
  dispose(): void
}

// =============================================================================
// Player
// =============================================================================

export type PlayerState = 'stopped' | 'playing' | 'paused'

/**
 * Sound assigned to a track, overriding what the compiler chose.
 */
export interface TrackSound {
  program: number
  bank: number
  volume: number
  pan: number
}

export interface PlayerOptions {
  /**
   * How far ahead of the playhead events are handed to the backend, in seconds.
   * @default 0.1
   */
  lookahead?: number

  /**
   * Scheduling loop period in milliseconds.
   * @default 25
   */
  scheduleInterval?: number

  /** Per-track sound overrides keyed by track name */
  sounds?: Record<string, Partial<TrackSound>>

  /** Called once when playback runs past the end of the song */
  onEnded?: () => void
}
