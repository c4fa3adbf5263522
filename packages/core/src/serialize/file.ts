import { readFile, writeFile } from 'fs/promises'
import type { Score } from '../score/types'
import type { ValidateSchemaOptions } from '../schema/validate'
import { scoreFromJSON, scoreToJSON } from './document'

/**
 * Write a score as an indented JSON project file.
 */
export async function saveScore(score: Score, path: string): Promise<void> {
  await writeFile(path, scoreToJSON(score), 'utf-8')
}

/**
 * Read a JSON project file written by {@link saveScore} (or an unversioned one).
 */
export async function loadScore(path: string, options: ValidateSchemaOptions = {}): Promise<Score> {
  const json = await readFile(path, 'utf-8')
  return scoreFromJSON(json, options)
}
