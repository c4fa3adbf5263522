export { normalize, clean, STRUCTURAL_KEYWORDS, INSTRUMENT_MARKERS } from './normalize'
export { classifyLine, type SectionLine, type HeaderField } from './lines'
export { parseParams, parsePitchedPattern, parseDrumPattern, type PitchedPattern, type DrumPattern } from './patterns'
export {
  DslParser,
  parseSong,
  titleCase,
  NO_CONTENT_ERROR,
  NO_SECTIONS_ERROR,
  type DslParserOptions
} from './parse'
