import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'

import { getRuntimeConfig } from '@/config/runtime'

export interface StorageAdapter {
  getItem(key: string): string | null
  setItem(key: string, value: string): void
  removeItem(key: string): void
}

export type StorageAuditType = 'memory' | 'file'

export interface StorageAuditSnapshot {
  type: StorageAuditType
  available: boolean
  reason?: string
}

export const createMemoryStorage = (): StorageAdapter => {
  const store = new Map<string, string>()
  return {
    getItem: (key) => store.get(key) ?? null,
    setItem: (key, value) => {
      store.set(key, value)
    },
    removeItem: (key) => {
      store.delete(key)
    },
  }
}

const fileNameFor = (key: string) => `${key.replace(/[^a-zA-Z0-9._-]/g, '_')}.json`

const isMissingFile = (err: unknown) =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT'

/**
 * One JSON file per key. Writes go to a temp file first and are renamed over
 * the target, so a reader never observes a half-written document.
 */
export const createFileStorage = (dataDir: string): StorageAdapter => {
  mkdirSync(dataDir, { recursive: true })

  return {
    getItem: (key) => {
      try {
        return readFileSync(join(dataDir, fileNameFor(key)), 'utf8')
      } catch (err) {
        if (isMissingFile(err)) {
          return null
        }
        throw err
      }
    },
    setItem: (key, value) => {
      const target = join(dataDir, fileNameFor(key))
      const temp = `${target}.${process.pid}.tmp`
      writeFileSync(temp, value, 'utf8')
      renameSync(temp, target)
    },
    removeItem: (key) => {
      rmSync(join(dataDir, fileNameFor(key)), { force: true })
    },
  }
}

interface StorageResolution {
  adapter: StorageAdapter
  snapshot: StorageAuditSnapshot
}

const resolveStorage = (): StorageResolution => {
  const { dataDir } = getRuntimeConfig().storage
  if (!dataDir) {
    return {
      adapter: createMemoryStorage(),
      snapshot: {
        type: 'memory',
        available: false,
        reason: 'No data directory configured (UNICHAT_DATA_DIR)',
      },
    }
  }

  try {
    return {
      adapter: createFileStorage(dataDir),
      snapshot: { type: 'file', available: true },
    }
  } catch (err) {
    return {
      adapter: createMemoryStorage(),
      snapshot: {
        type: 'memory',
        available: false,
        reason: err instanceof Error ? err.message : 'Unable to prepare data directory',
      },
    }
  }
}

let cachedResolution: StorageResolution | null = null

export const getStorageResolution = (): StorageResolution => {
  if (!cachedResolution) {
    cachedResolution = resolveStorage()
  }
  return cachedResolution
}

export const getStorage = (): StorageAdapter => getStorageResolution().adapter

/** Swaps the process-wide adapter; `null` re-resolves from configuration. */
export const setStorageAdapter = (adapter: StorageAdapter | null) => {
  cachedResolution = adapter
    ? { adapter, snapshot: { type: 'memory', available: true, reason: 'Injected adapter' } }
    : null
}

export interface VersionedRecord {
  schemaVersion: number
  [field: string]: unknown
}

/**
 * Reads a JSON document carrying a `schemaVersion`. Documents written by a
 * newer schema are still returned; callers only pick the fields they know.
 */
export const readVersioned = (key: string): VersionedRecord | null => {
  const raw = getStorage().getItem(key)
  if (!raw) {
    return null
  }

  try {
    const parsed: unknown = JSON.parse(raw)
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      return null
    }
    const record = parsed as Record<string, unknown>
    const schemaVersion = typeof record.schemaVersion === 'number' ? record.schemaVersion : 0
    return { ...record, schemaVersion }
  } catch (err) {
    console.warn(`Discarding unreadable stored document "${key}"`, err)
    return null
  }
}

/** Unknown fields of `previous` survive the rewrite. */
export const writeVersioned = (
  key: string,
  schemaVersion: number,
  fields: Record<string, unknown>,
  previous: VersionedRecord | null = null,
) => {
  const document = {
    ...(previous ?? {}),
    ...fields,
    schemaVersion: Math.max(schemaVersion, previous?.schemaVersion ?? 0),
  }
  getStorage().setItem(key, JSON.stringify(document))
}
