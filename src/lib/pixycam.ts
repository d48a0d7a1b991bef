/**
 * Pixy camera device: drives the read chain over a transport and exposes the
 * decoded frames to a polling consumer.
 *
 * @module pixycam-js/pixycam
 */

import type { ObjectBlock } from './block.js'
import { encodeSetBrightness, encodeSetLed, encodeSetPanTilt } from './command.js'
import { DEFAULT_NAME } from './constants.js'
import { ByteFrameDecoder, WordFrameDecoder } from './decoder.js'
import type { DecoderStats, FrameDecoder } from './decoder.js'
import { ProtocolViolationError } from './error.js'
import { silentLogger } from './logger.js'
import type { Logger } from './logger.js'
import { BatchPublisher } from './publisher.js'
import { FramingStrategy } from './tag.js'
import type { ReadRequest } from './tag.js'
import type { ReadCompletion, Transport } from './transport.js'

export interface PixyCamOptions {
  /** Instance name used in logs */
  name?: string
  /** Framing granularity, fixed for the instance's lifetime */
  strategy?: FramingStrategy
  /** Write commands one byte at a time; defaults to true for the byte strategy */
  byteWrites?: boolean
  logger?: Logger
}

/**
 * Object block camera on an I2C or serial transport.
 *
 * ```ts
 * const cam = new PixyCam(await openSerialTransport({ path: '/dev/ttyUSB0' }))
 * cam.start()
 * setInterval(() => {
 *   const blocks = cam.pollBatch()
 *   if (blocks !== null) console.log(blocks.map(String))
 * }, 50)
 * ```
 */
export class PixyCam {
  readonly name: string
  readonly strategy: FramingStrategy
  private readonly transport: Transport
  private readonly logger: Logger
  private readonly byteWrites: boolean
  private readonly publisher = new BatchPublisher()
  private readonly decoder: WordFrameDecoder | ByteFrameDecoder
  private readonly beginReads: () => void
  private started = false
  private enabled = false
  private outstanding = false
  private generation = 0
  private halted: ProtocolViolationError | null = null

  constructor (transport: Transport, options: PixyCamOptions = {}) {
    this.transport = transport
    this.name = options.name ?? DEFAULT_NAME
    this.strategy = options.strategy ?? FramingStrategy.Word
    this.logger = options.logger ?? silentLogger
    this.byteWrites = options.byteWrites ?? this.strategy === FramingStrategy.Byte

    const decoderOptions = { publisher: this.publisher, logger: this.logger }
    if (this.strategy === FramingStrategy.Byte) {
      const decoder = new ByteFrameDecoder(decoderOptions)
      this.decoder = decoder
      this.beginReads = () => this.chain(decoder)
    } else {
      const decoder = new WordFrameDecoder(decoderOptions)
      this.decoder = decoder
      this.beginReads = () => this.chain(decoder)
    }
  }

  toString (): string {
    return this.name
  }

  /**
   * True once the camera has been started, even if it is disabled now.
   */
  get isStarted (): boolean {
    return this.started
  }

  /**
   * True while the read chain is running.
   */
  get isEnabled (): boolean {
    return this.enabled
  }

  /**
   * Protocol violation that halted this instance, if any.
   */
  get fault (): ProtocolViolationError | null {
    return this.halted
  }

  get stats (): Readonly<DecoderStats> {
    return this.decoder.stats
  }

  /**
   * Issues the first read. Later calls do nothing; use `setEnabled` to resume
   * a disabled camera.
   */
  start (): void {
    if (this.started) {
      return
    }
    this.setEnabled(true)
  }

  /**
   * Pauses or resumes the read chain.
   *
   * Disabling issues no further reads: the outstanding read still completes
   * but its data is discarded. Enabling restarts decoding from the sync read,
   * dropping any partial frame.
   * @throws ProtocolViolationError when enabling a halted instance
   */
  setEnabled (enabled: boolean): void {
    if (enabled === this.enabled) {
      return
    }
    if (!enabled) {
      this.enabled = false
      this.logger.info('stopping', { name: this.name })
      return
    }
    if (this.halted !== null) {
      throw this.halted
    }
    this.enabled = true
    this.started = true
    this.logger.info('starting', { name: this.name, strategy: this.strategy })
    if (this.outstanding) {
      // The read from the previous chain restarts the chain when it lands.
      this.generation++
      return
    }
    this.beginReads()
  }

  /**
   * Takes the latest decoded frame.
   * @returns The frame's blocks in arrival order, or null if no new frame
   * @throws ProtocolViolationError once the instance has halted
   */
  pollBatch (): readonly ObjectBlock[] | null {
    if (this.halted !== null) {
      throw this.halted
    }
    return this.publisher.poll()
  }

  /**
   * Sets the LED color.
   * @throws InvalidArgumentError if a channel is outside [0, 255]
   */
  setLED (red: number, green: number, blue: number): void {
    this.write(encodeSetLed(red, green, blue))
  }

  /**
   * Sets the camera brightness.
   * @throws InvalidArgumentError if the value is outside [0, 255]
   */
  setBrightness (brightness: number): void {
    this.write(encodeSetBrightness(brightness))
  }

  /**
   * Moves the pan/tilt servos.
   * @param pan - Position in [0, 1000]
   * @param tilt - Position in [0, 1000]
   * @throws InvalidArgumentError if a position is out of range
   */
  setPanTilt (pan: number, tilt: number): void {
    this.write(encodeSetPanTilt(pan, tilt))
  }

  private write (command: Uint8Array): void {
    if (!this.byteWrites) {
      this.transport.asyncWrite(command)
      return
    }
    for (const byte of command) {
      this.transport.asyncWrite(Uint8Array.of(byte))
    }
  }

  private chain<Tag extends string> (decoder: FrameDecoder<Tag>): void {
    const generation = ++this.generation
    const issue = (request: ReadRequest<Tag>): void => {
      this.outstanding = true
      this.transport.asyncRead(request.tag, request.length, onComplete)
    }
    const onComplete = (completion: ReadCompletion<Tag>): void => {
      this.outstanding = false
      if (this.halted !== null || !this.enabled) {
        return
      }
      if (generation !== this.generation) {
        this.beginReads()
        return
      }
      issue(this.advance(decoder, completion))
    }
    issue(decoder.start())
  }

  /**
   * Feeds one completion to the decoder. A protocol violation halts the
   * instance and is re-thrown to the transport.
   */
  private advance<Tag extends string> (decoder: FrameDecoder<Tag>, completion: ReadCompletion<Tag>): ReadRequest<Tag> {
    try {
      return completion.error !== null
        ? decoder.recover(completion.tag, completion.error.message)
        : decoder.process(completion.tag, completion.data)
    } catch (err) {
      if (err instanceof ProtocolViolationError) {
        this.halted = err
        this.enabled = false
        this.logger.error('protocol violation, decoder halted', { name: this.name, error: err.message })
      }
      throw err
    }
  }
}
