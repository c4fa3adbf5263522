import { isCompatible, parseVersion } from '../schema/version'
import { MigrationRegistry, migrations } from '../schema/migrations'
import { SchemaVersionError, validateSchema } from '../schema/validate'

describe('Schema versions', () => {
  it('parses version strings leniently', () => {
    expect(parseVersion('1.2.3')).toEqual({ major: 1, minor: 2, patch: 3 })
    expect(parseVersion('1.2')).toEqual({ major: 1, minor: 2, patch: 0 })
    expect(parseVersion('x.1')).toEqual({ major: 0, minor: 1, patch: 0 })
  })

  it('accepts the same major with an older or equal minor', () => {
    expect(isCompatible('1.0.0')).toEqual({ compatible: true })
    expect(isCompatible('1.0.9')).toEqual({ compatible: true })
    expect(isCompatible('1.2.0', '1.3.0')).toEqual({ compatible: true })
  })

  it('explains incompatible versions', () => {
    expect(isCompatible('2.0.0')).toEqual({
      compatible: false,
      reason: 'Document version 2.0.0 is newer than library 1.0.0'
    })
    expect(isCompatible('1.1.0').compatible).toBe(false)
    expect(isCompatible('0.0.0').reason).toBe('Document version 0.0.0 requires migration to 1.0.0')
  })
})

describe('MigrationRegistry', () => {
  function registry(): MigrationRegistry {
    const r = new MigrationRegistry()
    r.register('1.0.0', '1.1.0', data => ({ ...data, steps: 1, _version: '1.1.0' }))
    r.register('1.1.0', '2.0.0', data => ({ ...data, steps: 2, _version: '2.0.0' }))
    r.register('1.0.0', '1.0.1', data => ({ ...data, _version: '1.0.1' }))
    return r
  }

  it('chains migrations along the shortest path', () => {
    expect(registry().findPath('1.0.0', '2.0.0')).toHaveLength(2)
    expect(registry().migrate({ _version: '1.0.0' }, '2.0.0')).toEqual({ _version: '2.0.0', steps: 2 })
  })

  it('returns the document itself when already current', () => {
    const doc = { _version: '2.0.0' }
    expect(registry().migrate(doc, '2.0.0')).toBe(doc)
  })

  it('reports missing paths', () => {
    expect(registry().hasPath('2.0.0', '1.0.0')).toBe(false)
    expect(registry().hasPath('1.0.0', '1.0.1')).toBe(true)
    expect(() => registry().findPath('2.0.0', '1.0.0')).toThrow('No migration path from 2.0.0 to 1.0.0')
  })

  it('treats a missing version as the legacy version', () => {
    expect(migrations.migrate({ sections: [{ name: 'A', key: null, bars: 1 }] }, '1.0.0')).toEqual({
      _version: '1.0.0',
      sections: [{ name: 'A', bars: 1 }]
    })
  })
})

describe('validateSchema', () => {
  it('passes current documents through', () => {
    const doc = { _version: '1.0.0', title: 'Now' }
    expect(validateSchema(doc, { migrate: true })).toBe(doc)
  })

  it('carries the versions on a strict failure', () => {
    let caught: unknown
    try {
      validateSchema({ _version: '3.1.0' }, { strict: true })
    } catch (e) {
      caught = e
    }

    expect(caught).toBeInstanceOf(SchemaVersionError)
    if (caught instanceof SchemaVersionError) {
      expect(caught.dataVersion).toBe('3.1.0')
      expect(caught.libraryVersion).toBe('1.0.0')
      expect(caught.message).toBe('Document version 3.1.0 is newer than library 1.0.0')
    }
  })

  it('warns and loads as is without strict or migrate', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {})
    try {
      const doc = { _version: '2.0.0' }
      expect(validateSchema(doc)).toBe(doc)
      expect(warn).toHaveBeenCalledTimes(1)
    } finally {
      warn.mockRestore()
    }
  })
})
