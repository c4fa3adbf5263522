export {
  generateSongPrompt,
  generateSectionPrompt,
  getPresetPrompt,
  type SongPromptParameters,
  type SongPromptRequest,
  type SectionPromptRequest
} from './generator'
export { PRESET_PROMPTS, isPresetName, type PresetName } from './presets'
export { SONG_DSL_REFERENCE } from './format'
