/**
 * Request tags identifying what a pending read represents.
 *
 * @module pixycam-js/tag
 */

/**
 * Tags used by the word strategy (2-byte reads, whole block bodies).
 */
export enum WordTag {
  /** Sync word, 2 bytes */
  Sync = 'SYNC',
  /** High sync byte after a phase slip, 1 byte */
  Align = 'ALIGN',
  /** Checksum or end-of-frame sync word, 2 bytes */
  Checksum = 'CHECKSUM',
  /** Plain block body, 10 bytes */
  NormalBlock = 'NORMAL_BLOCK',
  /** Color-coded block body, 12 bytes */
  ColorCodeBlock = 'COLOR_CODE_BLOCK'
}

/**
 * Tags used by the byte strategy (one byte per read).
 */
export enum ByteTag {
  SyncLow = 'SYNC_LOW',
  SyncHigh = 'SYNC_HIGH',
  ChecksumLow = 'CHECKSUM_LOW',
  ChecksumHigh = 'CHECKSUM_HIGH',
  SignatureLow = 'SIGNATURE_LOW',
  SignatureHigh = 'SIGNATURE_HIGH',
  CenterXLow = 'CENTERX_LOW',
  CenterXHigh = 'CENTERX_HIGH',
  CenterYLow = 'CENTERY_LOW',
  CenterYHigh = 'CENTERY_HIGH',
  WidthLow = 'WIDTH_LOW',
  WidthHigh = 'WIDTH_HIGH',
  HeightLow = 'HEIGHT_LOW',
  HeightHigh = 'HEIGHT_HIGH',
  AngleLow = 'ANGLE_LOW',
  AngleHigh = 'ANGLE_HIGH'
}

/**
 * Framing granularity of a decoder instance.
 */
export enum FramingStrategy {
  Word = 'word',
  Byte = 'byte'
}

/**
 * A read the decoder wants issued next.
 */
export interface ReadRequest<Tag> {
  tag: Tag
  length: number
}
