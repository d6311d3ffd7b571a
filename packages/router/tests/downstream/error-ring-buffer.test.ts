import { describe, it, expect } from 'vitest'
import { ErrorRingBuffer } from '../../src/downstream/index.js'

describe('ErrorRingBuffer', () => {
  it('drops the oldest entries past capacity', () => {
    const buffer = new ErrorRingBuffer(3)
    for (const message of ['one', 'two', 'three', 'four']) {
      buffer.push(message)
    }

    expect(buffer.getRecent(10).map(entry => entry.message)).toEqual(['two', 'three', 'four'])
  })

  it('returns the most recent entries', () => {
    const buffer = new ErrorRingBuffer()
    buffer.push('bad frame', 'warn', 'protocol')
    buffer.push('starting', 'info', 'stderr')

    expect(buffer.getRecent(1)).toEqual([
      { timestamp: expect.any(String), source: 'stderr', message: 'starting', level: 'info' },
    ])
    expect(buffer.getRecent(0)).toEqual([])
    expect(buffer.getRecent(10)).toHaveLength(2)
  })
})
