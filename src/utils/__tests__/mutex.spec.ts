import { describe, expect, it } from 'vitest'

import { KeyedMutex } from '../mutex'

const deferred = () => {
  let resolve = () => {}
  const promise = new Promise<void>((done) => {
    resolve = done
  })
  return { promise, resolve }
}

describe('KeyedMutex', () => {
  it('runs tasks under one key in submission order', async () => {
    const mutex = new KeyedMutex()
    const gate = deferred()
    const order: string[] = []

    const first = mutex.run('room', async () => {
      await gate.promise
      order.push('first')
    })
    const second = mutex.run('room', () => {
      order.push('second')
    })
    const other = mutex.run('other', () => {
      order.push('other')
    })

    await other
    expect(order).toEqual(['other'])
    expect(mutex.isLocked('room')).toBe(true)

    gate.resolve()
    await Promise.all([first, second])

    expect(order).toEqual(['other', 'first', 'second'])
    expect(mutex.isLocked('room')).toBe(false)
  })

  it('releases the key when a task throws', async () => {
    const mutex = new KeyedMutex()

    await expect(
      mutex.run('room', () => {
        throw new Error('boom')
      }),
    ).rejects.toThrow('boom')

    expect(await mutex.run('room', () => 'next')).toBe('next')
    expect(mutex.isLocked('room')).toBe(false)
  })
})
