// =============================================================================
// @songsketch/core - Public API
// Song DSL parser, score model, timed-event compiler, serialization, MIDI export
// =============================================================================

// --- Score Model ---
export * from './score/index'

// --- Lookup Tables ---
export {
  createTables,
  DEFAULT_TABLES,
  PERCUSSION,
  lookupProgram,
  melodicProgram,
  lookupDrumPitch
} from './tables/index'
export type { MusicTables, MusicTableOverrides, InstrumentProgram } from './tables/index'

// --- Music Theory ---
export * from './theory/index'

// --- Parser ---
export * from './parser/index'

// --- Compiler ---
export * from './compiler/index'

// --- Serialization ---
export * from './serialize/index'
export { SCHEMA_VERSION, isCompatible, migrations, validateSchema, SchemaVersionError } from './schema/index'
export type { VersionedDocument, ValidateSchemaOptions } from './schema/index'

// --- MIDI Export ---
export * from './export/index'

// --- Prompts ---
export * from './prompts/index'
