/**
 * Frame decoder state machines.
 *
 * A decoder never performs I/O. Each completion handed to `process` yields
 * exactly one next read, which the caller must issue, so the chain of reads
 * cannot stop on its own.
 *
 * @module pixycam-js/decoder
 */

import {
  SYNC_LOW,
  SYNC_LOW_CC,
  SYNC_HIGH,
  SYNC_WORD,
  SYNC_WORD_CC,
  SYNC_WORD_SWAPPED,
  NORMAL_BLOCK_LENGTH,
  COLOR_CODE_BLOCK_LENGTH,
  MIN_SIGNATURE,
  MAX_SIGNATURE
} from './constants.js'
import { BlockAssembler, BlockField, COLOR_CODE_BLOCK_FIELDS, NORMAL_BLOCK_FIELDS, readWord, toWord } from './block.js'
import type { ObjectBlock } from './block.js'
import { ProtocolViolationError } from './error.js'
import { silentLogger } from './logger.js'
import type { Logger } from './logger.js'
import type { BatchPublisher } from './publisher.js'
import { ByteTag, FramingStrategy, WordTag } from './tag.js'
import type { ReadRequest } from './tag.js'

/**
 * Running counters of one decoder.
 */
export interface DecoderStats {
  /** Frames that yielded at least one block */
  framesPublished: number
  /** Blocks that passed the checksum */
  blocksAccepted: number
  /** Blocks dropped on checksum mismatch */
  checksumErrors: number
  /** Resynchronizations caused by device noise */
  resyncs: number
}

export interface FrameDecoderOptions {
  publisher: BatchPublisher
  logger?: Logger
}

/**
 * A state machine turning tagged completions into object blocks.
 */
export interface FrameDecoder<Tag extends string> {
  readonly strategy: FramingStrategy
  readonly stats: Readonly<DecoderStats>
  /** First read of the chain; drops any partial frame. */
  start: () => ReadRequest<Tag>
  /** Interprets one successful completion. */
  process: (tag: Tag, data: Uint8Array) => ReadRequest<Tag>
  /** Handles a failed completion by resynchronizing. */
  recover: (tag: Tag, reason: string) => ReadRequest<Tag>
}

/**
 * Returns true for the two valid sync words.
 */
export function isSyncWord (word: number): boolean {
  return word === SYNC_WORD || word === SYNC_WORD_CC
}

function hex (value: number, digits: number): string {
  return `0x${value.toString(16).padStart(digits, '0')}`
}

/**
 * Frame bookkeeping shared by both strategies.
 */
abstract class BaseFrameDecoder<Tag extends string> implements FrameDecoder<Tag> {
  abstract readonly strategy: FramingStrategy
  protected readonly assembler = new BlockAssembler()
  protected readonly logger: Logger
  private readonly publisher: BatchPublisher
  private frame: ObjectBlock[] = []
  private awaiting: ReadRequest<Tag> | null = null
  private readonly counters: DecoderStats = {
    framesPublished: 0,
    blocksAccepted: 0,
    checksumErrors: 0,
    resyncs: 0
  }

  constructor (options: FrameDecoderOptions) {
    this.publisher = options.publisher
    this.logger = options.logger ?? silentLogger
  }

  get stats (): Readonly<DecoderStats> {
    return { ...this.counters }
  }

  /**
   * Read issued when looking for the next sync.
   */
  protected abstract syncRequest (): ReadRequest<Tag>

  /**
   * Interprets a completion whose tag and length are already checked.
   */
  protected abstract step (tag: Tag, data: Uint8Array): ReadRequest<Tag>

  start (): ReadRequest<Tag> {
    this.frame = []
    this.assembler.discard()
    return this.expect(this.syncRequest())
  }

  process (tag: Tag, data: Uint8Array): ReadRequest<Tag> {
    const awaiting = this.checkTag(tag, data.length)
    if (data.length > awaiting.length) {
      throw new ProtocolViolationError(tag, data.length, `requested ${awaiting.length} bytes`)
    }
    if (data.length < awaiting.length) {
      return this.noise(`short read in ${tag}`, { length: data.length, expected: awaiting.length })
    }
    return this.expect(this.step(tag, data))
  }

  recover (tag: Tag, reason: string): ReadRequest<Tag> {
    this.checkTag(tag, 0)
    return this.noise(`read failed in ${tag}`, { reason })
  }

  private checkTag (tag: Tag, length: number): ReadRequest<Tag> {
    const awaiting = this.awaiting
    if (awaiting === null) {
      throw new ProtocolViolationError(tag, length, 'no read outstanding')
    }
    if (awaiting.tag !== tag) {
      throw new ProtocolViolationError(tag, length, `awaiting ${awaiting.tag}`)
    }
    return awaiting
  }

  private expect (request: ReadRequest<Tag>): ReadRequest<Tag> {
    this.awaiting = request
    return request
  }

  /**
   * Discards the pending block and returns to sync hunting.
   */
  protected noise (message: string, meta?: Record<string, unknown>): ReadRequest<Tag> {
    this.counters.resyncs++
    this.assembler.discard()
    this.logger.warn(message, meta)
    return this.expect(this.syncRequest())
  }

  protected syncFound (sync: number): void {
    this.assembler.begin(sync)
    this.logger.debug('sync found', { sync: hex(sync, 4) })
  }

  /**
   * A sync word arrived in the checksum slot: publish the frame and reuse the
   * word as the next block's sync.
   */
  protected endOfFrame (sync: number): void {
    this.assembler.begin(sync)
    if (this.frame.length === 0) {
      return
    }
    const blocks = this.frame
    this.frame = []
    this.publisher.publish(blocks)
    this.counters.framesPublished++
    this.logger.debug('batch published', { blocks: blocks.length })
  }

  protected finalizeBlock (): void {
    const result = this.assembler.finalize()
    if (result.ok) {
      this.frame.push(result.block)
      this.counters.blocksAccepted++
      this.logger.debug('block accepted', { block: result.block.toString() })
    } else {
      this.counters.checksumErrors++
      this.logger.warn('checksum mismatch', { computed: result.computed, declared: result.declared })
    }
  }
}

/**
 * Reads the stream in 2-byte words and whole block bodies.
 */
export class WordFrameDecoder extends BaseFrameDecoder<WordTag> {
  readonly strategy = FramingStrategy.Word

  protected syncRequest (): ReadRequest<WordTag> {
    return { tag: WordTag.Sync, length: 2 }
  }

  protected step (tag: WordTag, data: Uint8Array): ReadRequest<WordTag> {
    switch (tag) {
      case WordTag.Sync:
        return this.onSync(readWord(data, 0))
      case WordTag.Align:
        return this.onAlign(data[0])
      case WordTag.Checksum:
        return this.onChecksum(readWord(data, 0))
      case WordTag.NormalBlock:
        return this.onBody(data, NORMAL_BLOCK_FIELDS)
      case WordTag.ColorCodeBlock:
        return this.onBody(data, COLOR_CODE_BLOCK_FIELDS)
    }
  }

  private onSync (word: number): ReadRequest<WordTag> {
    if (isSyncWord(word)) {
      this.syncFound(word)
      return { tag: WordTag.Checksum, length: 2 }
    }
    if (word === SYNC_WORD_SWAPPED) {
      // One byte out of phase: keep the low half and fetch the high sync byte.
      this.assembler.begin(SYNC_WORD)
      this.logger.debug('stream misaligned', { word: hex(word, 4) })
      return { tag: WordTag.Align, length: 1 }
    }
    if (word === 0) {
      return this.syncRequest()
    }
    return this.noise(`unexpected word ${hex(word, 4)} in ${WordTag.Sync}`)
  }

  private onAlign (byte: number): ReadRequest<WordTag> {
    if (byte === SYNC_HIGH) {
      return { tag: WordTag.Checksum, length: 2 }
    }
    return this.noise(`unexpected byte ${hex(byte, 2)} in ${WordTag.Align}`)
  }

  private onChecksum (word: number): ReadRequest<WordTag> {
    if (isSyncWord(word)) {
      this.endOfFrame(word)
      return { tag: WordTag.Checksum, length: 2 }
    }
    this.assembler.setChecksum(word)
    const sync = this.assembler.currentSync
    switch (sync) {
      case SYNC_WORD:
        return { tag: WordTag.NormalBlock, length: NORMAL_BLOCK_LENGTH }
      case SYNC_WORD_CC:
        return { tag: WordTag.ColorCodeBlock, length: COLOR_CODE_BLOCK_LENGTH }
      default:
        throw new ProtocolViolationError(WordTag.Checksum, 2, `unexpected sync word ${hex(sync, 4)}`)
    }
  }

  private onBody (data: Uint8Array, fields: readonly BlockField[]): ReadRequest<WordTag> {
    this.assembler.accumulateBody(data, fields)
    this.finalizeBlock()
    return this.syncRequest()
  }
}

/**
 * Reads the stream one byte at a time, for transports that cannot deliver
 * paired reads atomically. Also rejects signatures outside [1, 7].
 */
export class ByteFrameDecoder extends BaseFrameDecoder<ByteTag> {
  readonly strategy = FramingStrategy.Byte
  private low: number = 0

  protected syncRequest (): ReadRequest<ByteTag> {
    return { tag: ByteTag.SyncLow, length: 1 }
  }

  protected step (tag: ByteTag, data: Uint8Array): ReadRequest<ByteTag> {
    const byte = data[0]
    switch (tag) {
      case ByteTag.SyncLow:
        if (byte === SYNC_LOW || byte === SYNC_LOW_CC) {
          return this.lowHalf(byte, ByteTag.SyncHigh)
        }
        if (byte === 0) {
          return this.syncRequest()
        }
        return this.noise(`unexpected byte ${hex(byte, 2)} in ${tag}`)
      case ByteTag.SyncHigh:
        if (byte !== SYNC_HIGH) {
          return this.noise(`unexpected byte ${hex(byte, 2)} in ${tag}`)
        }
        this.syncFound(toWord(this.low, byte))
        return this.next(ByteTag.ChecksumLow)
      case ByteTag.ChecksumLow:
        return this.lowHalf(byte, ByteTag.ChecksumHigh)
      case ByteTag.ChecksumHigh:
        return this.onChecksum(toWord(this.low, byte))
      case ByteTag.SignatureLow:
        return this.lowHalf(byte, ByteTag.SignatureHigh)
      case ByteTag.SignatureHigh:
        return this.onSignature(toWord(this.low, byte))
      case ByteTag.CenterXLow:
        return this.lowHalf(byte, ByteTag.CenterXHigh)
      case ByteTag.CenterXHigh:
        return this.field(BlockField.CenterX, byte, ByteTag.CenterYLow)
      case ByteTag.CenterYLow:
        return this.lowHalf(byte, ByteTag.CenterYHigh)
      case ByteTag.CenterYHigh:
        return this.field(BlockField.CenterY, byte, ByteTag.WidthLow)
      case ByteTag.WidthLow:
        return this.lowHalf(byte, ByteTag.WidthHigh)
      case ByteTag.WidthHigh:
        return this.field(BlockField.Width, byte, ByteTag.HeightLow)
      case ByteTag.HeightLow:
        return this.lowHalf(byte, ByteTag.HeightHigh)
      case ByteTag.HeightHigh:
        this.assembler.accumulate(BlockField.Height, toWord(this.low, byte))
        if (this.assembler.currentSync === SYNC_WORD_CC) {
          return this.next(ByteTag.AngleLow)
        }
        this.finalizeBlock()
        return this.syncRequest()
      case ByteTag.AngleLow:
        return this.lowHalf(byte, ByteTag.AngleHigh)
      case ByteTag.AngleHigh:
        this.assembler.accumulate(BlockField.Angle, toWord(this.low, byte))
        this.finalizeBlock()
        return this.syncRequest()
    }
  }

  private next (tag: ByteTag): ReadRequest<ByteTag> {
    return { tag, length: 1 }
  }

  private lowHalf (byte: number, next: ByteTag): ReadRequest<ByteTag> {
    this.low = byte
    return this.next(next)
  }

  private field (field: BlockField, high: number, next: ByteTag): ReadRequest<ByteTag> {
    this.assembler.accumulate(field, toWord(this.low, high))
    return this.next(next)
  }

  private onChecksum (word: number): ReadRequest<ByteTag> {
    if (isSyncWord(word)) {
      this.endOfFrame(word)
      return this.next(ByteTag.ChecksumLow)
    }
    this.assembler.setChecksum(word)
    return this.next(ByteTag.SignatureLow)
  }

  private onSignature (signature: number): ReadRequest<ByteTag> {
    if (signature < MIN_SIGNATURE || signature > MAX_SIGNATURE) {
      return this.noise(`unexpected signature ${signature} in ${ByteTag.SignatureHigh}`)
    }
    this.assembler.accumulate(BlockField.Signature, signature)
    return this.next(ByteTag.CenterXLow)
  }
}

/**
 * Creates the decoder for a framing strategy.
 */
export function createFrameDecoder (strategy: FramingStrategy.Word, options: FrameDecoderOptions): WordFrameDecoder
export function createFrameDecoder (strategy: FramingStrategy.Byte, options: FrameDecoderOptions): ByteFrameDecoder
export function createFrameDecoder (strategy: FramingStrategy, options: FrameDecoderOptions): WordFrameDecoder | ByteFrameDecoder
export function createFrameDecoder (strategy: FramingStrategy, options: FrameDecoderOptions): WordFrameDecoder | ByteFrameDecoder {
  return strategy === FramingStrategy.Byte ? new ByteFrameDecoder(options) : new WordFrameDecoder(options)
}
