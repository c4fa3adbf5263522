export { SCHEMA_VERSION, LEGACY_VERSION, parseVersion, isCompatible, type SchemaVersion, type VersionParts, type Compatibility } from './version'
export { migrations, MigrationRegistry, type VersionedDocument } from './migrations'
export { validateSchema, SchemaVersionError, type ValidateSchemaOptions } from './validate'
