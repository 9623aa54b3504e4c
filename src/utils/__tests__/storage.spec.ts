import { mkdtempSync, readdirSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import {
  createFileStorage,
  createMemoryStorage,
  readVersioned,
  setStorageAdapter,
  writeVersioned,
  type StorageAdapter,
} from '../storage'

describe('storage', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'unichat-storage-'))
    vi.restoreAllMocks()
  })

  afterEach(() => {
    setStorageAdapter(null)
    rmSync(dir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  it('keeps one file per key and leaves no temp files behind', () => {
    const storage = createFileStorage(join(dir, 'nested'))

    expect(storage.getItem('unichat.cursor.matrix:@me:test')).toBeNull()
    storage.setItem('unichat.cursor.matrix:@me:test', 's1')
    storage.setItem('unichat.cursor.matrix:@me:test', 's2')

    expect(storage.getItem('unichat.cursor.matrix:@me:test')).toBe('s2')
    expect(readdirSync(join(dir, 'nested'))).toEqual(['unichat.cursor.matrix__me_test.json'])
    expect(createFileStorage(join(dir, 'nested')).getItem('unichat.cursor.matrix:@me:test')).toBe('s2')

    storage.removeItem('unichat.cursor.matrix:@me:test')
    storage.removeItem('unichat.cursor.matrix:@me:test')
    expect(storage.getItem('unichat.cursor.matrix:@me:test')).toBeNull()
  })

  describe('versioned documents', () => {
    let storage: StorageAdapter

    beforeEach(() => {
      storage = createMemoryStorage()
      setStorageAdapter(storage)
    })

    it('keeps unknown fields and the newest schema version', () => {
      storage.setItem('doc', JSON.stringify({ schemaVersion: 3, future: { enabled: true }, value: 1 }))

      const previous = readVersioned('doc')
      writeVersioned('doc', 1, { value: 2 }, previous)

      expect(JSON.parse(storage.getItem('doc') ?? '{}')).toEqual({
        schemaVersion: 3,
        future: { enabled: true },
        value: 2,
      })
    })

    it('treats a document without a version as version zero', () => {
      storage.setItem('doc', JSON.stringify({ value: 1 }))

      expect(readVersioned('doc')).toEqual({ value: 1, schemaVersion: 0 })
    })

    it('discards unreadable documents', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
      storage.setItem('doc', '{not json')
      storage.setItem('list', '[1, 2]')

      expect(readVersioned('doc')).toBeNull()
      expect(readVersioned('list')).toBeNull()
      expect(readVersioned('missing')).toBeNull()
      expect(warn).toHaveBeenCalledTimes(1)
    })
  })
})
