/**
 * Wire-format builders shared by the unit tests.
 */

import { SYNC_WORD, SYNC_WORD_CC } from '../../src/lib/constants.js'

export interface WireBlock {
  signature: number
  centerX: number
  centerY: number
  width: number
  height: number
  /** Present for color-coded blocks */
  angle?: number
  /** Overrides the computed checksum */
  checksum?: number
}

function le (word: number): number[] {
  return [word & 0xff, (word >> 8) & 0xff]
}

export function checksumOf (wire: WireBlock): number {
  const fields = [wire.signature, wire.centerX, wire.centerY, wire.width, wire.height]
  if (wire.angle !== undefined) {
    fields.push(wire.angle)
  }
  return fields.reduce((sum, value) => sum + value, 0) & 0xffff
}

/**
 * Sync, checksum and body of one block.
 */
export function encodeBlock (wire: WireBlock): number[] {
  const sync = wire.angle !== undefined ? SYNC_WORD_CC : SYNC_WORD
  const bytes = [
    ...le(sync),
    ...le(wire.checksum ?? checksumOf(wire)),
    ...le(wire.signature),
    ...le(wire.centerX),
    ...le(wire.centerY),
    ...le(wire.width),
    ...le(wire.height)
  ]
  if (wire.angle !== undefined) {
    bytes.push(...le(wire.angle))
  }
  return bytes
}

/**
 * A sync word followed by a sync word in the checksum slot: ends the current
 * frame and opens the next one.
 */
export const FRAME_BOUNDARY = [0x55, 0xaa, 0x55, 0xaa]

/**
 * Blocks of one frame followed by the boundary that publishes them.
 */
export function encodeFrame (blocks: WireBlock[]): number[] {
  return [...blocks.flatMap(encodeBlock), ...FRAME_BOUNDARY]
}

export const PLAIN_BLOCK: WireBlock = { signature: 1, centerX: 100, centerY: 50, width: 10, height: 20 }

export const COLOR_CODE_BLOCK: WireBlock = { signature: 3, centerX: 200, centerY: 100, width: 30, height: 40, angle: 90 }

/**
 * Lets pending promise callbacks run.
 */
export async function flush (): Promise<void> {
  await new Promise<void>(resolve => setImmediate(resolve))
}
