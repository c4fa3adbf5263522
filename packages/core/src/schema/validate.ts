import { LEGACY_VERSION, SCHEMA_VERSION, isCompatible } from './version'
import { migrations, type VersionedDocument } from './migrations'

export class SchemaVersionError extends Error {
    constructor(
        public readonly dataVersion: string,
        public readonly libraryVersion: string,
        message: string
    ) {
        super(message)
        this.name = 'SchemaVersionError'
    }
}

export interface ValidateSchemaOptions {
    /** Reject version mismatches instead of warning */
    strict?: boolean
    /** Migrate older documents to the current version */
    migrate?: boolean
}

/**
 * Check a document's version and optionally migrate it.
 *
 * A major-version mismatch throws in strict mode, migrates when `migrate` is set
 * and a path exists, and otherwise loads as is with a console warning.
 */
export function validateSchema(
    data: VersionedDocument,
    options: ValidateSchemaOptions = {}
): VersionedDocument {
    const dataVersion = data._version ?? LEGACY_VERSION
    const { compatible, reason } = isCompatible(dataVersion)

    if (!compatible) {
        if (options.strict) {
            throw new SchemaVersionError(
                dataVersion,
                SCHEMA_VERSION,
                reason ?? 'Version incompatible'
            )
        }

        if (options.migrate) {
            return migrateToLatest(data)
        }

        console.warn(
            `[SongSketch] Loading document with version ${dataVersion}, ` +
            `library is ${SCHEMA_VERSION}. ${reason ?? ''}`
        )
    } else if (options.migrate && dataVersion !== SCHEMA_VERSION && migrations.hasPath(dataVersion, SCHEMA_VERSION)) {
        // Compatible patch and minor releases without a registered step load unchanged
        return migrateToLatest(data)
    }

    return data
}

function migrateToLatest(data: VersionedDocument): VersionedDocument {
    try {
        return migrations.migrate(data, SCHEMA_VERSION)
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e)
        throw new Error(`Migration failed: ${message}`)
    }
}
