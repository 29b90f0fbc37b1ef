import { DrainFinishedAnnotation, DrainStartedAnnotation } from '@shardwarden/core'
import type { V1Pod } from '@kubernetes/client-node'
import { describe, expect, test } from 'vitest'
import { drainFinished, drainStarted, startDrain } from './index'

describe('drain annotations', () => {
  test('startDrain records the reason once', () => {
    const pod: V1Pod = { metadata: { name: 'p', annotations: { keep: 'me' } } }

    expect(startDrain(pod, 'first reason')).toBe(true)
    expect(startDrain(pod, 'second reason')).toBe(false)
    expect(pod.metadata?.annotations).toEqual({ keep: 'me', [DrainStartedAnnotation]: 'first reason' })
    expect(drainStarted(pod)).toBe(true)
  })

  test('startDrain creates missing metadata', () => {
    const pod: V1Pod = {}
    startDrain(pod, 'scale down')
    expect(pod.metadata?.annotations).toEqual({ [DrainStartedAnnotation]: 'scale down' })
  })

  test('drainFinished checks for the finished annotation', () => {
    expect(drainFinished({ metadata: { annotations: { [DrainFinishedAnnotation]: '' } } })).toBe(true)
    expect(drainFinished({ metadata: { annotations: { [DrainStartedAnnotation]: 'x' } } })).toBe(false)
    expect(drainFinished({})).toBe(false)
  })
})
