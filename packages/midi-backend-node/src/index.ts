/**
 * @songsketch/midi-backend-node
 *
 * Node.js MIDI backend using jzz library.
 * Implements PlaybackBackend from @songsketch/live.
 */

export { NodeMIDIBackend } from './NodeMIDIBackend'
export type { MIDIDevice } from './NodeMIDIBackend'
