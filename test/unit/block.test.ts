/**
 * Tests for object blocks and the block assembler.
 */

import { describe, it, expect } from 'vitest'
import { BlockAssembler, BlockField, NORMAL_BLOCK_FIELDS, ObjectBlock, readWord, toWord } from '../../src/lib/block.js'

describe('word helpers', () => {
  it('should combine bytes little-endian', () => {
    expect(toWord(0x55, 0xaa)).toBe(0xaa55)
    expect(toWord(0xf4, 0x01)).toBe(500)
  })

  it('should read a word at an offset', () => {
    const data = Uint8Array.of(0x00, 0x64, 0x00, 0x32)
    expect(readWord(data, 1)).toBe(100)
  })
})

describe('ObjectBlock', () => {
  const block = new ObjectBlock({ sync: 0xaa55, checksum: 0xb5, signature: 1, centerX: 100, centerY: 50, width: 10, height: 20 })

  it('should default the angle to null', () => {
    expect(block.angle).toBeNull()
    expect(block.isColorCode).toBe(false)
  })

  it('should be frozen', () => {
    expect(Object.isFrozen(block)).toBe(true)
  })

  it('should render every field', () => {
    expect(block.toString()).toBe('sync=0xaa55, chksum=0x00b5, sig=1, centerX=100, centerY=50, width=10, height=20, angle=-')
  })

  it('should report color-coded blocks', () => {
    const cc = new ObjectBlock({ sync: 0xaa56, checksum: 0, signature: 3, centerX: 0, centerY: 0, width: 0, height: 0, angle: 0 })
    expect(cc.isColorCode).toBe(true)
    expect(cc.angle).toBe(0)
  })
})

describe('BlockAssembler', () => {
  it('should produce the block when the checksum matches', () => {
    const assembler = new BlockAssembler()
    assembler.begin(0xaa55)
    assembler.setChecksum(181)
    assembler.accumulateBody(Uint8Array.of(1, 0, 100, 0, 50, 0, 10, 0, 20, 0), NORMAL_BLOCK_FIELDS)

    const result = assembler.finalize()
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.block).toMatchObject({ sync: 0xaa55, checksum: 181, signature: 1, centerX: 100, centerY: 50, width: 10, height: 20, angle: null })
    }
  })

  it('should report both checksums on a mismatch', () => {
    const assembler = new BlockAssembler()
    assembler.begin(0xaa55)
    assembler.setChecksum(10)
    assembler.accumulate(BlockField.Signature, 4)
    assembler.accumulate(BlockField.CenterX, 5)

    expect(assembler.finalize()).toEqual({ ok: false, computed: 9, declared: 10 })
  })

  it('should wrap the running checksum at 16 bits', () => {
    const assembler = new BlockAssembler()
    assembler.begin(0xaa55)
    assembler.setChecksum(0x0001)
    assembler.accumulate(BlockField.Width, 0xffff)
    assembler.accumulate(BlockField.Height, 0x0002)

    expect(assembler.finalize().ok).toBe(true)
  })

  it('should clear the pending fields on discard', () => {
    const assembler = new BlockAssembler()
    assembler.begin(0xaa56)
    assembler.accumulate(BlockField.Angle, 45)
    assembler.discard()

    expect(assembler.field(BlockField.Angle)).toBe(0)
    expect(assembler.currentSync).toBe(0xaa56)
  })
})
