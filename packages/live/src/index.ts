/**
 * @songsketch/live
 *
 * Realtime playback of compiled song sketches.
 */

export { Player, DEFAULT_LOOKAHEAD, DEFAULT_SCHEDULE_INTERVAL } from './Player'
export type { PlaybackBackend, ChannelSetup, PlayerState, TrackSound, PlayerOptions } from './types'
