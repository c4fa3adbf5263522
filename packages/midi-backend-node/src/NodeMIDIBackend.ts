/**
 * @songsketch/midi-backend-node
 *
 * Node.js MIDI backend using jzz library.
 * Implements the PlaybackBackend interface of @songsketch/live.
 *
 * Requirements:
 * - Node.js 20+
 * - jzz package installed
 */

import JZZ from 'jzz'
import type { TimedEvent } from '@songsketch/core'
import type { ChannelSetup, PlaybackBackend } from '@songsketch/live'

// =============================================================================
// Local Type Definitions
// =============================================================================

/**
 * MIDI device information.
 */
export interface MIDIDevice {
  id: string
  name: string
  manufacturer?: string
}

/** The parts of a jzz engine this backend calls */
interface MidiEngine {
  info(): unknown
  openMidiOut(index: number): unknown
}

/** The parts of a jzz output port this backend calls */
interface MidiOutPort {
  send(message: number[]): unknown
  close(): unknown
}

function isMidiEngine(value: unknown): value is MidiEngine {
  return typeof value === 'object' && value !== null &&
    'info' in value && typeof value.info === 'function' &&
    'openMidiOut' in value && typeof value.openMidiOut === 'function'
}

function isMidiOutPort(value: unknown): value is MidiOutPort {
  return typeof value === 'object' && value !== null &&
    'send' in value && typeof value.send === 'function' &&
    'close' in value && typeof value.close === 'function'
}

function readOutputs(info: unknown): MIDIDevice[] {
  if (typeof info !== 'object' || info === null || !('outputs' in info) || !Array.isArray(info.outputs)) {
    return []
  }

  const outputs: unknown[] = info.outputs
  return outputs.map((output, index) => {
    const name = typeof output === 'object' && output !== null && 'name' in output && typeof output.name === 'string'
      ? output.name
      : ''
    const manufacturer = typeof output === 'object' && output !== null && 'manufacturer' in output && typeof output.manufacturer === 'string'
      ? output.manufacturer
      : ''
    return {
      id: String(index),
      name: name || `Output ${index}`,
      manufacturer: manufacturer || undefined
    }
  })
}

// =============================================================================
// Constants
// =============================================================================

/** MIDI message types */
const MIDI_NOTE_ON = 0x90
const MIDI_NOTE_OFF = 0x80
const MIDI_CONTROL_CHANGE = 0xB0
const MIDI_PROGRAM_CHANGE = 0xC0

const CC_BANK_SELECT = 0
const CC_VOLUME = 7
const CC_PAN = 10
const CC_ALL_NOTES_OFF = 123

const CHANNEL_COUNT = 16

function toMidiValue(level: number): number {
  return Math.max(0, Math.min(127, Math.trunc(level * 127)))
}

// =============================================================================
// NodeMIDIBackend
// =============================================================================

/**
 * Node.js MIDI backend using jzz library.
 *
 * Each scheduled event gets its own timer. Without a MIDI output every call
 * is a no-op, so a player keeps running silently.
 */
export class NodeMIDIBackend implements PlaybackBackend {
  // jzz state
  private midi: MidiEngine | null = null
  private midiOutput: MidiOutPort | null = null

  // Pending timers for cancellation
  private timers: Set<ReturnType<typeof setTimeout>> = new Set()

  // State
  private disposed: boolean = false
  private initialized: boolean = false

  // Timing reference
  private startTime: number = performance.now()

  // Selected output info
  private selectedDevice: MIDIDevice | null = null

  // ===========================================================================
  // Static Methods
  // ===========================================================================

  /**
   * Check if Node.js MIDI is supported (always true in Node.js environment).
   */
  static async isSupported(): Promise<boolean> {
    return typeof process !== 'undefined' && process.versions?.node !== undefined
  }

  // ===========================================================================
  // Setup
  // ===========================================================================

  /**
   * Initialize the jzz MIDI engine and open the first output.
   *
   * @returns True if an output is open
   */
  async init(): Promise<boolean> {
    if (this.initialized) return this.midiOutput !== null

    try {
      const outputs = await this.listOutputs()
      if (outputs.length > 0) {
        await this.selectOutput(outputs[0].id)
        console.log(`NodeMIDIBackend: Using output "${outputs[0].name}"`)
      } else {
        console.warn('NodeMIDIBackend: No MIDI outputs available')
      }
    } catch (err) {
      console.warn('NodeMIDIBackend: JZZ initialization failed:', err)
    }

    this.initialized = true
    return this.midiOutput !== null
  }

  /**
   * List available MIDI outputs.
   */
  async listOutputs(): Promise<MIDIDevice[]> {
    const midi = await this.engine()
    return midi ? readOutputs(midi.info()) : []
  }

  /**
   * Open a MIDI output by device ID, closing the previous one.
   */
  async selectOutput(deviceId: string): Promise<boolean> {
    const midi = await this.engine()
    if (!midi) return false

    const device = readOutputs(midi.info()).find(o => o.id === deviceId)
    if (!device) return false

    try {
      const port = midi.openMidiOut(parseInt(deviceId, 10))
      if (!isMidiOutPort(port)) {
        console.warn(`NodeMIDIBackend: Output "${device.name}" did not open`)
        return false
      }
      this.closeOutput()
      this.midiOutput = port
      this.selectedDevice = device
      return true
    } catch (err) {
      console.warn('NodeMIDIBackend: Failed to open MIDI output:', err)
      return false
    }
  }

  /**
   * Get the currently selected MIDI output.
   */
  getSelectedOutput(): MIDIDevice | null {
    return this.selectedDevice
  }

  /**
   * Check if backend is ready.
   */
  isReady(): boolean {
    return this.initialized && !this.disposed && this.midiOutput !== null
  }

  // ===========================================================================
  // PlaybackBackend Implementation
  // ===========================================================================

  /**
   * Seconds since the backend was created (using performance.now).
   */
  getCurrentTime(): number {
    return (performance.now() - this.startTime) / 1000
  }

  /**
   * Send bank, program, volume and pan for a channel.
   * Bank 128 denotes the GM percussion kit, which channel 9 plays without a bank select.
   */
  setupChannel(setup: ChannelSetup): void {
    if (this.disposed || !this.midiOutput) return

    const channel = setup.channel & 0x0F
    if (setup.bank < 128) {
      this.send([MIDI_CONTROL_CHANGE | channel, CC_BANK_SELECT, setup.bank & 0x7F])
    }
    this.send([MIDI_PROGRAM_CHANGE | channel, setup.program & 0x7F])
    this.send([MIDI_CONTROL_CHANGE | channel, CC_VOLUME, toMidiValue(setup.volume)])
    this.send([MIDI_CONTROL_CHANGE | channel, CC_PAN, toMidiValue(setup.pan)])
  }

  /**
   * Send the event when the backend clock reaches `atTime`.
   */
  schedule(event: TimedEvent, atTime: number): void {
    if (this.disposed || !this.midiOutput) return

    const delay = Math.max(0, (atTime - this.getCurrentTime()) * 1000)
    const status = (event.kind === 'note_on' ? MIDI_NOTE_ON : MIDI_NOTE_OFF) | (event.channel & 0x0F)
    const message = [status, event.pitch & 0x7F, event.kind === 'note_on' ? event.velocity & 0x7F : 0]

    const timer = setTimeout(() => {
      this.timers.delete(timer)
      if (!this.disposed) this.send(message)
    }, delay)
    this.timers.add(timer)
  }

  /**
   * Drop pending events and send All Notes Off on every channel.
   */
  cancelAll(): void {
    if (this.disposed) return

    for (const timer of this.timers) {
      clearTimeout(timer)
    }
    this.timers.clear()

    if (this.midiOutput) {
      for (let ch = 0; ch < CHANNEL_COUNT; ch++) {
        this.send([MIDI_CONTROL_CHANGE | ch, CC_ALL_NOTES_OFF, 0])
      }
    }
  }

  /**
   * Clean up resources.
   */
  dispose(): void {
    if (this.disposed) return

    this.cancelAll()
    this.closeOutput()
    this.midi = null
    this.disposed = true
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async engine(): Promise<MidiEngine | null> {
    if (this.midi) return this.midi

    try {
      const engine: unknown = await JZZ()
      if (!isMidiEngine(engine)) {
        console.warn('NodeMIDIBackend: JZZ returned no usable engine')
        return null
      }
      this.midi = engine
      return engine
    } catch (err) {
      console.warn('NodeMIDIBackend: JZZ is unavailable:', err)
      return null
    }
  }

  private send(message: number[]): void {
    if (!this.midiOutput) return
    try {
      this.midiOutput.send(message)
    } catch (err) {
      console.warn('NodeMIDIBackend: Send failed:', err)
    }
  }

  private closeOutput(): void {
    if (!this.midiOutput) return
    try {
      this.midiOutput.close()
    } catch (err) {
      console.warn('NodeMIDIBackend: Failed to close MIDI output:', err)
    }
    this.midiOutput = null
    this.selectedDevice = null
  }
}
