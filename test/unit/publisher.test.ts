/**
 * Tests for the batch hand-off slot.
 */

import { describe, it, expect } from 'vitest'
import { ObjectBlock } from '../../src/lib/block.js'
import { BatchPublisher } from '../../src/lib/publisher.js'

function block (signature: number): ObjectBlock {
  return new ObjectBlock({ sync: 0xaa55, checksum: signature, signature, centerX: 0, centerY: 0, width: 0, height: 0 })
}

describe('BatchPublisher', () => {
  it('should return null before anything is published', () => {
    const publisher = new BatchPublisher()
    expect(publisher.poll()).toBeNull()
    expect(publisher.hasBatch).toBe(false)
  })

  it('should hand a batch out once', () => {
    const publisher = new BatchPublisher()
    publisher.publish([block(1), block(2)])

    expect(publisher.hasBatch).toBe(true)
    expect(publisher.poll()?.map(b => b.signature)).toEqual([1, 2])
    expect(publisher.poll()).toBeNull()
  })

  it('should replace an unpolled batch', () => {
    const publisher = new BatchPublisher()
    publisher.publish([block(1)])
    publisher.publish([block(2), block(3)])

    expect(publisher.poll()?.map(b => b.signature)).toEqual([2, 3])
    expect(publisher.publishedCount).toBe(2)
    expect(publisher.droppedCount).toBe(1)
  })

  it('should not be affected by later changes to the source array', () => {
    const publisher = new BatchPublisher()
    const blocks = [block(1)]
    publisher.publish(blocks)
    blocks.push(block(2))

    const batch = publisher.poll()
    expect(batch).toHaveLength(1)
    expect(Object.isFrozen(batch)).toBe(true)
  })
})
