/**
 * Tests for command encoders.
 */

import { describe, it, expect } from 'vitest'
import { encodeSetBrightness, encodeSetLed, encodeSetPanTilt } from '../../src/lib/command.js'
import { InvalidArgumentError } from '../../src/lib/error.js'

describe('encodeSetLed', () => {
  it('should encode the color after the command bytes', () => {
    expect([...encodeSetLed(255, 128, 0)]).toEqual([0x00, 0xfd, 0xff, 0x80, 0x00])
  })

  it('should reject a channel above 255', () => {
    expect(() => encodeSetLed(0, 256, 0)).toThrow(InvalidArgumentError)
  })
})

describe('encodeSetBrightness', () => {
  it('should encode the value', () => {
    expect([...encodeSetBrightness(80)]).toEqual([0x00, 0xfe, 0x50])
  })

  it('should reject a fractional value', () => {
    expect(() => encodeSetBrightness(1.5)).toThrow(InvalidArgumentError)
  })
})

describe('encodeSetPanTilt', () => {
  it('should encode positions little-endian', () => {
    expect([...encodeSetPanTilt(500, 250)]).toEqual([0x00, 0xff, 0xf4, 0x01, 0xfa, 0x00])
  })

  it('should accept both ends of the range', () => {
    expect([...encodeSetPanTilt(0, 1000)]).toEqual([0x00, 0xff, 0x00, 0x00, 0xe8, 0x03])
  })

  it('should reject a negative pan', () => {
    expect(() => encodeSetPanTilt(-1, 0)).toThrow(InvalidArgumentError)
  })

  it('should reject a tilt above 1000', () => {
    expect(() => encodeSetPanTilt(0, 1001)).toThrow('Invalid tilt: 1001 (expected an integer in [0, 1000])')
  })
})
