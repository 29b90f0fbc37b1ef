import { describe, expect, test } from 'vitest'
import { keyRangeSafeName, keyRangeString, parseKeyRange } from './key-range'

describe('key ranges', () => {
  test('formats shard names', () => {
    expect(keyRangeString({ start: '', end: '' })).toBe('-')
    expect(keyRangeString({ start: '40', end: '80' })).toBe('40-80')
  })

  test('replaces open bounds in safe names', () => {
    expect(keyRangeSafeName({ start: '', end: '80' })).toBe('x-80')
    expect(keyRangeSafeName({ start: '80', end: '' })).toBe('80-x')
    expect(keyRangeSafeName({ start: '', end: '' })).toBe('x-x')
  })

  test('parses shard names', () => {
    expect(parseKeyRange('-80')).toEqual({ start: '', end: '80' })
    expect(parseKeyRange('-')).toEqual({ start: '', end: '' })
    expect(parseKeyRange('0')).toBeNull()
    expect(parseKeyRange('-8G')).toBeNull()
  })
})
