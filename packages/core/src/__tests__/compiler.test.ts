import { assignChannels, melodicChannel } from '../compiler/channels'
import { DRUM_HIT_SECONDS, compileEvents, compileScore } from '../compiler/compile'
import { createDrumTrack, createInstrumentTrack, createScore, createSection } from '../score/score'
import { parseSong } from '../parser/parse'
import type { Note, Score } from '../score/types'

function note(pitch: number, start: number, duration: number = 1): Note {
  return { pitch, start, duration, velocity: 0.7 }
}

function parsed(text: string): Score {
  const { score } = parseSong(text)
  if (!score) throw new Error('expected a score')
  return score
}

describe('Timed-event compiler', () => {
  it('converts beats to seconds at the song tempo', () => {
    const score = createScore({
      tempo: 60,
      sections: [
        createSection('A', 1, { startBar: 0, tracks: [createInstrumentTrack('Piano', 'piano', { notes: [note(60, 1, 2)] })] }),
        createSection('B', 1, { startBar: 1, tempo: 200, tracks: [createInstrumentTrack('Piano', 'piano', { notes: [note(62, 0)] })] })
      ]
    })

    expect(compileEvents(score).map(e => [e.kind, e.pitch, e.seconds])).toEqual([
      ['note_on', 60, 1],
      ['note_off', 60, 3],
      ['note_on', 62, 4],
      ['note_off', 62, 5]
    ])
  })

  it('expands a C maj7 chord into four simultaneous pairs', () => {
    const score = createScore({
      sections: [createSection('A', 1, {
        tracks: [createInstrumentTrack('Keys', 'keys', {
          chords: [{ root: 'C', quality: 'maj7', octave: 4, start: 0, duration: 2, velocity: 1 }]
        })]
      })]
    })
    const events = compileEvents(score)

    expect(events.filter(e => e.kind === 'note_on').map(e => [e.pitch, e.seconds, e.velocity])).toEqual([
      [60, 0, 127], [64, 0, 127], [67, 0, 127], [71, 0, 127]
    ])
    expect(events.filter(e => e.kind === 'note_off').map(e => [e.pitch, e.seconds, e.velocity])).toEqual([
      [60, 1, 0], [64, 1, 0], [67, 1, 0], [71, 1, 0]
    ])
  })

  it('keeps extension chords in the fourth octave', () => {
    const score = parsed('SECTION: A [1 bars]\n  PIANO: Em9(q) Am6(q)')
    const ons = compileEvents(score).filter(e => e.kind === 'note_on')

    expect(ons.map(e => [e.pitch, e.seconds, e.channel])).toEqual([
      [64, 0, 0], [67, 0, 0], [71, 0, 0],
      [69, 0.5, 0], [72, 0.5, 0], [76, 0.5, 0]
    ])
  })

  it('plays hat eighths across one bar', () => {
    const events = compileEvents(parsed('TEMPO: 120\nSECTION: A [1 bars]\n  DRUMS: hat(8ths)'))
    const ons = events.filter(e => e.kind === 'note_on')

    expect(ons.map(e => e.seconds)).toEqual([0, 0.25, 0.5, 0.75, 1, 1.25, 1.5, 1.75])
    expect(ons.every(e => e.channel === 9 && e.pitch === 42 && e.velocity === 88)).toBe(true)
  })

  it('gives drum hits a fixed short length', () => {
    const score = createScore({
      tempo: 120,
      sections: [createSection('A', 1, { drums: createDrumTrack({ hits: [{ drum: 'kick', start: 0, velocity: 0.8 }] }) })]
    })

    expect(compileEvents(score)).toEqual([
      { kind: 'note_on', seconds: 0, channel: 9, pitch: 36, velocity: 101, track: 'Drums' },
      { kind: 'note_off', seconds: DRUM_HIT_SECONDS, channel: 9, pitch: 36, velocity: 0, track: 'Drums' }
    ])
  })

  it('emits events in non-decreasing time order', () => {
    const score = parsed([
      'SONG: Order',
      'TEMPO: 97',
      'SECTION: Intro [2 bars]',
      '  PIANO: C4(w) | Am(h) G(h)',
      '  BASS: A2(e) C3(e) E3(dq) | _ | F2(s)',
      '  DRUMS: kick(1,3) hat(8ths) | snare(2,4)',
      'SECTION: Verse [1 bars]',
      '  LEAD: E5(s) D5(s) C5(h) | B4(w)',
      '  DRUMS: hh(16ths)'
    ].join('\n'))
    const events = compileEvents(score)

    expect(events.length).toBeGreaterThan(0)
    for (let i = 1; i < events.length; i++) {
      expect(events[i].seconds).toBeGreaterThanOrEqual(events[i - 1].seconds)
    }
  })

  it('reports duration and tempo', () => {
    const compiled = compileScore(parsed('TEMPO: 90\nSECTION: A [3 bars]\n  PIANO: C4(q)'))
    expect(compiled.tempo).toBe(90)
    expect(compiled.durationSeconds).toBeCloseTo(8, 9)
  })

  it('returns frozen results and leaves the score untouched', () => {
    const score = parsed('SECTION: A [1 bars]\n  PIANO: C4(q)')
    const before = JSON.stringify(score)
    const compiled = compileScore(score)

    expect(Object.isFrozen(compiled)).toBe(true)
    expect(Object.isFrozen(compiled.events)).toBe(true)
    expect(Object.isFrozen(compiled.events[0])).toBe(true)
    expect(JSON.stringify(score)).toBe(before)
  })
})

describe('Channel assignment', () => {
  it('numbers tracks in first-seen order', () => {
    const score = createScore({
      sections: [
        createSection('A', 1, { tracks: [createInstrumentTrack('Bass', 'bass'), createInstrumentTrack('Piano', 'piano')] }),
        createSection('B', 1, { tracks: [createInstrumentTrack('Lead', 'lead'), createInstrumentTrack('Bass', 'bass')] })
      ]
    })

    expect(assignChannels(score).map(a => [a.track, a.channel, a.program])).toEqual([
      ['Bass', 0, 33],
      ['Piano', 1, 0],
      ['Lead', 2, 80]
    ])
  })

  it('steps over the drum channel', () => {
    const tracks = Array.from({ length: 11 }, (_, i) => createInstrumentTrack(`T${i}`, 'piano'))
    const score = createScore({ sections: [createSection('A', 1, { tracks })] })

    expect(assignChannels(score).map(a => a.channel)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 10, 11])
  })

  it('shares the last channel once they run out', () => {
    expect(melodicChannel(8)).toBe(8)
    expect(melodicChannel(9)).toBe(10)
    expect(melodicChannel(14)).toBe(15)
    expect(melodicChannel(20)).toBe(15)
  })

  it('adds a percussion entry when any section has hits', () => {
    const score = createScore({
      sections: [
        createSection('A', 1, { tracks: [createInstrumentTrack('Piano', 'piano')], drums: createDrumTrack({ volume: 0.6 }) }),
        createSection('B', 1, { drums: createDrumTrack({ hits: [{ drum: 'kick', start: 0, velocity: 0.8 }] }) })
      ]
    })

    expect(assignChannels(score)[1]).toEqual({
      track: 'Drums',
      instrument: 'drums',
      channel: 9,
      program: 0,
      percussion: true,
      volume: 0.6,
      pan: 0.5
    })
  })

  it('leaves the drum channel out without hits', () => {
    const score = createScore({
      sections: [createSection('A', 1, { tracks: [createInstrumentTrack('Piano', 'piano')], drums: createDrumTrack() })]
    })
    expect(assignChannels(score).map(a => a.track)).toEqual(['Piano'])
  })
})
