/**
 * Thrown when a score document is structurally malformed.
 */
export class ScoreFormatError extends Error {
  constructor(
    /** JSON path of the offending value, e.g. `sections[1].tracks[0].notes[2].pitch` */
    public readonly path: string,
    public readonly expected: string
  ) {
    super(`Invalid score document at ${path}: expected ${expected}`)
    this.name = 'ScoreFormatError'
  }
}
