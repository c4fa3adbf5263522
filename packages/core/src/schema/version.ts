// =============================================================================
// SongSketch - Score Document Versions
// =============================================================================

/** Version written into every saved score document */
export const SCHEMA_VERSION = '1.0.0' as const
export type SchemaVersion = typeof SCHEMA_VERSION

/** Version assumed for documents saved without a `_version` field */
export const LEGACY_VERSION = '0.0.0'

export interface VersionParts {
    major: number
    minor: number
    patch: number
}

export interface Compatibility {
    compatible: boolean
    reason?: string
}

/**
 * Split a dotted version. Missing or non-numeric parts read as 0.
 */
export function parseVersion(version: string): VersionParts {
    const parts = version.split('.').map(Number)
    const part = (index: number): number => Number.isFinite(parts[index]) ? parts[index] : 0
    return { major: part(0), minor: part(1), patch: part(2) }
}

/**
 * Whether a score document at `documentVersion` loads as is.
 *
 * A lower major needs a migration first; a higher major or a higher minor
 * under the same major was written by a newer SongSketch. Patch never matters.
 */
export function isCompatible(
    documentVersion: string,
    supportedVersion: string = SCHEMA_VERSION
): Compatibility {
    const doc = parseVersion(documentVersion)
    const supported = parseVersion(supportedVersion)

    if (doc.major > supported.major || (doc.major === supported.major && doc.minor > supported.minor)) {
        return {
            compatible: false,
            reason: `Document version ${documentVersion} is newer than library ${supportedVersion}`
        }
    }
    if (doc.major < supported.major) {
        return {
            compatible: false,
            reason: `Document version ${documentVersion} requires migration to ${supportedVersion}`
        }
    }
    return { compatible: true }
}
