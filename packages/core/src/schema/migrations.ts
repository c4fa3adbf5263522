import { LEGACY_VERSION } from './version'

/**
 * Any JSON object carrying an optional schema version.
 */
export interface VersionedDocument {
    _version?: string
    [field: string]: unknown
}

type MigrationFn = (data: VersionedDocument) => VersionedDocument

interface Migration {
    from: string
    to: string
    migrate: MigrationFn
}

export class MigrationRegistry {
    private migrations: Migration[] = []

    register(from: string, to: string, migrate: MigrationFn): void {
        this.migrations.push({ from, to, migrate })
    }

    /**
     * Find the shortest migration path from source to target version.
     */
    findPath(from: string, to: string): MigrationFn[] {
        const queue: { version: string; path: MigrationFn[] }[] = [
            { version: from, path: [] }
        ]
        const visited = new Set<string>([from])

        for (let head = queue.shift(); head !== undefined; head = queue.shift()) {
            const { version, path } = head
            if (version === to) {
                return path
            }

            for (const m of this.migrations) {
                if (m.from === version && !visited.has(m.to)) {
                    visited.add(m.to)
                    queue.push({
                        version: m.to,
                        path: [...path, m.migrate]
                    })
                }
            }
        }

        throw new Error(
            `No migration path from ${from} to ${to}. ` +
            `Available migrations: ${this.migrations.map(m => `${m.from}->${m.to}`).join(', ')}`
        )
    }

    hasPath(from: string, to: string): boolean {
        if (from === to) return true
        try {
            this.findPath(from, to)
            return true
        } catch {
            return false
        }
    }

    migrate(data: VersionedDocument, targetVersion: string): VersionedDocument {
        const sourceVersion = data._version ?? LEGACY_VERSION

        if (sourceVersion === targetVersion) {
            return data
        }

        const path = this.findPath(sourceVersion, targetVersion)
        return path.reduce((acc, fn) => fn(acc), data)
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Unversioned project files write `null` for a section without its own key,
 * tempo or drums. Version 1 leaves such fields out.
 */
function dropNullSectionFields(section: unknown): unknown {
    if (!isRecord(section)) return section
    const out: Record<string, unknown> = {}
    for (const [field, value] of Object.entries(section)) {
        if (value === null && (field === 'key' || field === 'tempo' || field === 'drums')) continue
        out[field] = value
    }
    return out
}

export const migrations = new MigrationRegistry()

// 0.0.0 (unversioned) -> 1.0.0
migrations.register(LEGACY_VERSION, '1.0.0', data => ({
    ...data,
    sections: Array.isArray(data.sections) ? data.sections.map(dropNullSectionFields) : data.sections,
    _version: '1.0.0'
}))
