import type { SongPromptParameters } from './generator'

export type PresetName =
  | 'pop_ballad'
  | 'rock_anthem'
  | 'chill_lofi'
  | 'epic_cinematic'
  | 'jazz_standard'
  | 'electronic_dance'
  | 'ambient'
  | 'classical_piece'

/**
 * Ready-made parameter sets for common song types.
 */
export const PRESET_PROMPTS: Readonly<Record<PresetName, SongPromptParameters>> = {
  pop_ballad: {
    style: 'pop ballad',
    mood: 'emotional, heartfelt',
    tempoHint: '70-85',
    instruments: ['piano', 'strings', 'bass', 'drums'],
    structureHint: 'intro, verse, chorus, verse, chorus, bridge, chorus, outro'
  },
  rock_anthem: {
    style: 'rock anthem',
    mood: 'powerful, energetic',
    tempoHint: '120-140',
    instruments: ['guitar', 'bass', 'drums', 'synth'],
    structureHint: 'intro, verse, pre-chorus, chorus, verse, chorus, solo, chorus, outro'
  },
  chill_lofi: {
    style: 'lo-fi hip hop',
    mood: 'relaxed, nostalgic',
    tempoHint: '75-90',
    instruments: ['piano', 'bass', 'drums', 'pad'],
    structureHint: 'intro, main loop A, main loop B, main loop A, outro'
  },
  epic_cinematic: {
    style: 'cinematic orchestral',
    mood: 'epic, dramatic',
    tempoHint: '90-110',
    instruments: ['strings', 'brass', 'piano', 'drums', 'choir'],
    structureHint: 'intro, build, climax, resolution'
  },
  jazz_standard: {
    style: 'jazz',
    mood: 'sophisticated, smooth',
    tempoHint: '120-160',
    instruments: ['piano', 'bass', 'drums', 'sax'],
    structureHint: 'head, solo section, head out'
  },
  electronic_dance: {
    style: 'electronic dance',
    mood: 'energetic, driving',
    tempoHint: '125-130',
    instruments: ['synth', 'bass', 'drums', 'lead', 'pad'],
    structureHint: 'intro, buildup, drop, breakdown, buildup, drop, outro'
  },
  ambient: {
    style: 'ambient',
    mood: 'atmospheric, peaceful',
    tempoHint: '60-80',
    instruments: ['pad', 'strings', 'piano'],
    structureHint: 'evolving texture, minimal structure'
  },
  classical_piece: {
    style: 'classical',
    mood: 'elegant, refined',
    // Left without a BPM so the model picks per movement
    instruments: ['piano', 'strings', 'flute'],
    structureHint: 'exposition, development, recapitulation'
  }
}

export function isPresetName(name: string): name is PresetName {
  return Object.prototype.hasOwnProperty.call(PRESET_PROMPTS, name)
}
