export * from './types'
export { ScoreFormatError } from './errors'
export { serializeScore, deserializeScore, scoreToJSON, scoreFromJSON } from './document'
export { saveScore, loadScore } from './file'
