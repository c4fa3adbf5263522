import { parseDrumPattern, parseParams, parsePitchedPattern } from '../parser/patterns'
import { DEFAULT_TABLES } from '../tables'

describe('parseParams', () => {
  it('reads duration and dynamics codes', () => {
    expect(parseParams('h, ff', DEFAULT_TABLES)).toEqual({ duration: 2.0, velocity: 0.95 })
    expect(parseParams('DQ,pp', DEFAULT_TABLES)).toEqual({ duration: 1.5, velocity: 0.25 })
  })

  it('ignores unknown codes and keeps the defaults', () => {
    expect(parseParams('loud, e', DEFAULT_TABLES)).toEqual({ duration: 0.5, velocity: 0.7 })
    expect(parseParams('xyz', DEFAULT_TABLES)).toEqual({ duration: 1.0, velocity: 0.7 })
  })
})

describe('parsePitchedPattern', () => {
  it('lays entries out back to back within a bar', () => {
    const { notes, chords, barsUsed } = parsePitchedPattern('C4(q) E4(e) G4(e, f)', DEFAULT_TABLES)

    expect(notes).toEqual([
      { pitch: 60, start: 0, duration: 1, velocity: 0.7 },
      { pitch: 64, start: 1, duration: 0.5, velocity: 0.7 },
      { pitch: 67, start: 1.5, duration: 0.5, velocity: 0.85 }
    ])
    expect(chords).toEqual([])
    expect(barsUsed).toBe(1)
  })

  it('advances one bar per slot, rests included', () => {
    const { chords, barsUsed } = parsePitchedPattern('Am(h) | _ | | F(w)', DEFAULT_TABLES)

    expect(chords).toEqual([
      { root: 'A', quality: 'm', octave: 4, start: 0, duration: 2, velocity: 0.7 },
      { root: 'F', quality: '', octave: 4, start: 12, duration: 4, velocity: 0.7 }
    ])
    expect(barsUsed).toBe(4)
  })

  it('does not count a trailing empty slot', () => {
    expect(parsePitchedPattern('C4(q) |', DEFAULT_TABLES).barsUsed).toBe(1)
  })

  it('separates octave-qualified notes from chord symbols', () => {
    const { notes, chords } = parsePitchedPattern('F#4(q) bb3(q) Dm3(q) Am7(q)', DEFAULT_TABLES)

    expect(notes.map(n => n.pitch)).toEqual([66, 58])
    expect(chords.map(c => [c.root, c.quality, c.octave, c.start])).toEqual([
      ['D', 'm', 3, 2],
      ['A', 'm7', 4, 3]
    ])
  })

  it('skips text that is not an entry', () => {
    const { notes, chords } = parsePitchedPattern('hello C4 world | G4(w)', DEFAULT_TABLES)
    expect(chords).toEqual([])
    expect(notes).toEqual([{ pitch: 67, start: 4, duration: 4, velocity: 0.7 }])
  })
})

describe('parseDrumPattern', () => {
  it('places listed beats by slot index', () => {
    const { hits, barsUsed } = parseDrumPattern('kick(1,3) snare(2,4) | | KICK(1)')

    expect(hits).toEqual([
      { drum: 'kick', start: 0, velocity: 0.8 },
      { drum: 'kick', start: 2, velocity: 0.8 },
      { drum: 'snare', start: 1, velocity: 0.8 },
      { drum: 'snare', start: 3, velocity: 0.8 },
      { drum: 'kick', start: 8, velocity: 0.8 }
    ])
    expect(barsUsed).toBe(3)
  })

  it('expands eighths into 8 hits per bar', () => {
    const { hits } = parseDrumPattern('hat(8ths)')
    expect(hits.map(h => h.start)).toEqual([0, 0.5, 1, 1.5, 2, 2.5, 3, 3.5])
    expect(hits.every(h => h.velocity === 0.7)).toBe(true)
  })

  it('expands sixteenths into 16 hits per bar', () => {
    const { hits } = parseDrumPattern('_ | hh(sixteenths)')
    expect(hits).toHaveLength(16)
    expect(hits[0]).toEqual({ drum: 'hh', start: 4, velocity: 0.6 })
    expect(hits[15].start).toBe(7.75)
  })

  it('accepts fractional beats', () => {
    expect(parseDrumPattern('kick(1, 2.5)').hits.map(h => h.start)).toEqual([0, 1.5])
  })

  it('discards a beat list with anything that is not a beat number', () => {
    expect(parseDrumPattern('clap(x)').hits).toEqual([])
    expect(parseDrumPattern('kick(1,two)').hits).toEqual([])
    expect(parseDrumPattern('kick(0)').hits).toEqual([])
    expect(parseDrumPattern('clap(x) | snare(2)')).toEqual({
      hits: [{ drum: 'snare', start: 5, velocity: 0.8 }],
      barsUsed: 2
    })
  })
})
