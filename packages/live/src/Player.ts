/**
 * Live playback transport.
 *
 * Plays a compiled score through a PlaybackBackend with a lookahead loop.
 * Each tick hands the backend every event inside the lookahead window,
 * stamped with its target time on the backend clock.
 */

import type { ChannelAssignment, CompiledScore, TimedEvent } from '@songsketch/core'
import type { ChannelSetup, PlaybackBackend, PlayerOptions, PlayerState, TrackSound } from './types'

// =============================================================================
// Constants
// =============================================================================

/** Default lookahead in seconds */
export const DEFAULT_LOOKAHEAD = 0.1

/** Default scheduling interval in milliseconds */
export const DEFAULT_SCHEDULE_INTERVAL = 25

/** Note-ons later than this are dropped rather than played late */
const LATE_NOTE_TOLERANCE = 0.05

const PERCUSSION_BANK = 128

// =============================================================================
// Player
// =============================================================================

export class Player {
  private readonly backend: PlaybackBackend
  private readonly lookahead: number
  private readonly scheduleInterval: number
  private readonly onEnded?: () => void

  private compiled: CompiledScore
  private sounds: Map<string, TrackSound> = new Map()

  // Playback state
  private state: PlayerState = 'stopped'
  private intervalId: ReturnType<typeof setInterval> | null = null
  /** Backend time at which the playhead stood at `startPosition` */
  private startTime: number = 0
  private startPosition: number = 0
  /** Playhead while not playing */
  private heldPosition: number = 0
  private scheduledIndex: number = 0

  constructor(backend: PlaybackBackend, compiled: CompiledScore, options: PlayerOptions = {}) {
    this.backend = backend
    this.lookahead = options.lookahead ?? DEFAULT_LOOKAHEAD
    this.scheduleInterval = options.scheduleInterval ?? DEFAULT_SCHEDULE_INTERVAL
    this.onEnded = options.onEnded
    this.compiled = compiled
    this.resetSounds(options.sounds ?? {})
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  /**
   * Start playback, or resume from the paused position.
   */
  play(): void {
    if (this.state === 'playing') return

    if (this.state === 'stopped') {
      this.setupChannels()
    }

    this.startPosition = this.heldPosition
    this.startTime = this.backend.getCurrentTime()
    this.state = 'playing'
    this.reindex()

    this.intervalId = setInterval(() => this.tick(), this.scheduleInterval)
    this.tick() // Run immediately
  }

  /**
   * Freeze the playhead and silence the output.
   */
  pause(): void {
    if (this.state !== 'playing') return

    this.heldPosition = this.getPosition()
    this.clearLoop()
    this.backend.cancelAll()
    this.state = 'paused'
  }

  /**
   * Stop and rewind to the start.
   */
  stop(): void {
    this.clearLoop()
    if (this.state !== 'stopped') {
      this.backend.cancelAll()
    }
    this.state = 'stopped'
    this.heldPosition = 0
    this.startPosition = 0
  }

  /**
   * Move the playhead. The position is clamped to the song.
   */
  seek(seconds: number): void {
    const position = Math.max(0, Math.min(seconds, this.getDuration()))

    if (this.state !== 'playing') {
      this.heldPosition = position
      return
    }

    this.backend.cancelAll()
    this.startPosition = position
    this.startTime = this.backend.getCurrentTime()
    this.reindex()
    this.tick()
  }

  /**
   * Replace the score. Playback stops.
   */
  load(compiled: CompiledScore, sounds: Record<string, Partial<TrackSound>> = {}): void {
    this.stop()
    this.compiled = compiled
    this.resetSounds(sounds)
  }

  dispose(): void {
    this.stop()
    this.backend.dispose()
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * Playhead in seconds from the start of the song.
   */
  getPosition(): number {
    if (this.state !== 'playing') return this.heldPosition

    const elapsed = this.backend.getCurrentTime() - this.startTime
    return Math.min(this.startPosition + elapsed, this.getDuration())
  }

  getDuration(): number {
    return this.compiled.durationSeconds
  }

  getState(): PlayerState {
    return this.state
  }

  getTrackSound(track: string): TrackSound | undefined {
    const sound = this.sounds.get(track)
    return sound ? { ...sound } : undefined
  }

  // ===========================================================================
  // Mixer
  // ===========================================================================

  setTrackVolume(track: string, volume: number): void {
    this.setTrackSound(track, { volume: Math.max(0, Math.min(1, volume)) })
  }

  /**
   * Change a track's sound. Applies immediately to its channel.
   * Unknown track names are ignored.
   */
  setTrackSound(track: string, sound: Partial<TrackSound>): void {
    const current = this.sounds.get(track)
    const assignment = this.assignmentFor(track)
    if (!current || !assignment) return

    const next = { ...current, ...sound }
    this.sounds.set(track, next)
    this.backend.setupChannel(this.toSetup(assignment, next))
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  /**
   * Main scheduler tick - called on interval.
   */
  private tick(): void {
    if (this.state !== 'playing') return

    const now = this.backend.getCurrentTime()
    const position = this.startPosition + (now - this.startTime)
    const horizon = position + this.lookahead
    const events = this.compiled.events

    while (this.scheduledIndex < events.length) {
      const event = events[this.scheduledIndex]
      if (event.seconds > horizon) break

      const atTime = this.startTime + (event.seconds - this.startPosition)
      this.scheduledIndex++

      // Note-offs always go out so nothing hangs
      if (event.kind === 'note_on' && atTime < now - LATE_NOTE_TOLERANCE) continue
      this.backend.schedule(event, Math.max(atTime, now))
    }

    if (this.scheduledIndex >= events.length && position >= this.getDuration()) {
      this.finish()
    }
  }

  private finish(): void {
    this.clearLoop()
    this.backend.cancelAll()
    this.state = 'stopped'
    this.heldPosition = 0
    this.startPosition = 0

    if (this.onEnded) {
      try {
        this.onEnded()
      } catch (e) {
        console.error('Player onEnded callback error:', e)
      }
    }
  }

  private clearLoop(): void {
    if (this.intervalId !== null) {
      clearInterval(this.intervalId)
      this.intervalId = null
    }
  }

  /**
   * Point the schedule cursor at the first event at or after the playhead.
   */
  private reindex(): void {
    const events: readonly TimedEvent[] = this.compiled.events
    const target = this.startPosition

    // Binary search for the first event >= target
    let lo = 0
    let hi = events.length
    while (lo < hi) {
      const mid = Math.floor((lo + hi) / 2)
      if (events[mid].seconds < target) {
        lo = mid + 1
      } else {
        hi = mid
      }
    }

    this.scheduledIndex = lo
  }

  private assignmentFor(track: string): ChannelAssignment | undefined {
    return this.compiled.channels.find(assignment => assignment.track === track)
  }

  private resetSounds(overrides: Record<string, Partial<TrackSound>>): void {
    this.sounds = new Map()
    for (const assignment of this.compiled.channels) {
      const defaults: TrackSound = {
        program: assignment.program,
        bank: assignment.percussion ? PERCUSSION_BANK : 0,
        volume: assignment.volume,
        pan: assignment.pan
      }
      this.sounds.set(assignment.track, { ...defaults, ...overrides[assignment.track] })
    }
  }

  private setupChannels(): void {
    for (const assignment of this.compiled.channels) {
      const sound = this.sounds.get(assignment.track)
      if (sound) {
        this.backend.setupChannel(this.toSetup(assignment, sound))
      }
    }
  }

  private toSetup(assignment: ChannelAssignment, sound: TrackSound): ChannelSetup {
    return {
      channel: assignment.channel,
      program: sound.program,
      bank: sound.bank,
      volume: sound.volume,
      pan: sound.pan
    }
  }
}
