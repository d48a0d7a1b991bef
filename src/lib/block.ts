/**
 * Object block record and the assembler that builds one from wire fields.
 *
 * @module pixycam-js/block
 */

import { SYNC_WORD_CC } from './constants.js'

/**
 * Fields carried in a block body, in wire order.
 */
export enum BlockField {
  Signature = 'signature',
  CenterX = 'centerX',
  CenterY = 'centerY',
  Width = 'width',
  Height = 'height',
  Angle = 'angle'
}

/**
 * Body fields of a plain block, in wire order.
 */
export const NORMAL_BLOCK_FIELDS: readonly BlockField[] = [
  BlockField.Signature,
  BlockField.CenterX,
  BlockField.CenterY,
  BlockField.Width,
  BlockField.Height
]

/**
 * Body fields of a color-coded block, in wire order.
 */
export const COLOR_CODE_BLOCK_FIELDS: readonly BlockField[] = [...NORMAL_BLOCK_FIELDS, BlockField.Angle]

/**
 * Combines two wire bytes into a little-endian 16-bit word.
 */
export function toWord (low: number, high: number): number {
  return ((high & 0xff) << 8) | (low & 0xff)
}

/**
 * Reads a little-endian 16-bit word.
 * @param data - Source bytes
 * @param offset - Offset of the low byte
 */
export function readWord (data: Uint8Array, offset: number): number {
  return toWord(data[offset], data[offset + 1])
}

/**
 * Values needed to construct an ObjectBlock.
 */
export interface ObjectBlockInit {
  sync: number
  checksum: number
  signature: number
  centerX: number
  centerY: number
  width: number
  height: number
  angle?: number | null
}

/**
 * A decoded detection record.
 */
export class ObjectBlock {
  readonly sync: number
  readonly checksum: number
  readonly signature: number
  readonly centerX: number
  readonly centerY: number
  readonly width: number
  readonly height: number
  /** Rotation in degrees, only present on color-coded blocks */
  readonly angle: number | null

  constructor (init: ObjectBlockInit) {
    this.sync = init.sync
    this.checksum = init.checksum
    this.signature = init.signature
    this.centerX = init.centerX
    this.centerY = init.centerY
    this.width = init.width
    this.height = init.height
    this.angle = init.angle ?? null
    Object.freeze(this)
  }

  get isColorCode (): boolean {
    return this.sync === SYNC_WORD_CC
  }

  toString (): string {
    const hex = (value: number): string => value.toString(16).padStart(4, '0')
    return `sync=0x${hex(this.sync)}, chksum=0x${hex(this.checksum)}, sig=${this.signature}, ` +
      `centerX=${this.centerX}, centerY=${this.centerY}, width=${this.width}, height=${this.height}, ` +
      `angle=${this.angle ?? '-'}`
  }
}

/**
 * Result of finalizing the pending block.
 */
export type FinalizeResult =
  | { ok: true, block: ObjectBlock }
  | { ok: false, computed: number, declared: number }

/**
 * Accumulates the single in-progress block and its running checksum.
 *
 * The decoder owns exactly one assembler; `begin` resets it whenever a sync
 * word is seen, including the sync reused at the end of a frame.
 */
export class BlockAssembler {
  private sync: number = 0
  private declared: number = 0
  private running: number = 0
  private values = new Map<BlockField, number>()

  /**
   * Sync word of the block being assembled.
   */
  get currentSync (): number {
    return this.sync
  }

  /**
   * Starts a new block.
   */
  begin (sync: number): void {
    this.sync = sync
    this.declared = 0
    this.running = 0
    this.values.clear()
  }

  setChecksum (checksum: number): void {
    this.declared = checksum
  }

  /**
   * Stores a body field and adds it to the running checksum.
   */
  accumulate (field: BlockField, value: number): void {
    this.values.set(field, value)
    this.running = (this.running + value) & 0xffff
  }

  /**
   * Decodes a whole block body and accumulates every field in wire order.
   * @param body - Body bytes, 10 for a plain block or 12 for a color-coded one
   * @param fields - Field layout of the body
   */
  accumulateBody (body: Uint8Array, fields: readonly BlockField[]): void {
    fields.forEach((field, i) => {
      this.accumulate(field, readWord(body, i * 2))
    })
  }

  /**
   * Value of an accumulated field, 0 when not yet read.
   */
  field (field: BlockField): number {
    return this.values.get(field) ?? 0
  }

  /**
   * Validates the running checksum and produces the block on a match.
   * The pending state is cleared either way.
   */
  finalize (): FinalizeResult {
    const computed = this.running
    const declared = this.declared
    const result: FinalizeResult = computed === declared
      ? {
          ok: true,
          block: new ObjectBlock({
            sync: this.sync,
            checksum: declared,
            signature: this.field(BlockField.Signature),
            centerX: this.field(BlockField.CenterX),
            centerY: this.field(BlockField.CenterY),
            width: this.field(BlockField.Width),
            height: this.field(BlockField.Height),
            angle: this.values.get(BlockField.Angle) ?? null
          })
        }
      : { ok: false, computed, declared }
    this.discard()
    return result
  }

  /**
   * Drops the pending block; the sync word is kept.
   */
  discard (): void {
    this.declared = 0
    this.running = 0
    this.values.clear()
  }
}
