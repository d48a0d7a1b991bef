/**
 * Transport capability consumed by the device, and the byte-stream base that
 * serial and in-memory transports share.
 *
 * @module pixycam-js/transport
 */

import { EventEmitter } from 'events'
import { DEFAULT_RX_BUFFER_LIMIT } from './constants.js'
import { ReadError, ReadInProgressError } from './error.js'
import { silentLogger } from './logger.js'
import type { Logger } from './logger.js'

/**
 * Result of one tagged read.
 */
export interface ReadCompletion<Tag> {
  /** Tag the read was issued with, preserved exactly */
  tag: Tag
  /** Bytes read; shorter than requested on a short read, empty on error */
  data: Uint8Array
  /** Set when the read failed */
  error: Error | null
}

export type CompletionHandler<Tag> = (completion: ReadCompletion<Tag>) => void

/**
 * Asynchronous byte source and sink.
 *
 * Completions for one transport are delivered one at a time.
 */
export interface Transport {
  /**
   * Issues a read of `length` bytes; `onComplete` runs once when it finishes.
   */
  asyncRead: <Tag>(tag: Tag, length: number, onComplete: CompletionHandler<Tag>) => void
  /**
   * Fire-and-forget write.
   */
  asyncWrite: (data: Uint8Array) => void
}

/**
 * Normalizes a thrown value into an Error.
 */
export function toError (value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}

interface PendingRead {
  length: number
  complete: (data: Uint8Array, error: Error | null) => void
}

export interface StreamTransportOptions {
  /** Most bytes held for the outstanding read, 4096 by default */
  bufferLimit?: number
  logger?: Logger
}

/**
 * Transport over a continuous byte stream.
 *
 * Emits `'error'` when a completion handler throws; the read chain has
 * stopped at that point.
 *
 * Received bytes are held only while a read is outstanding. Bytes arriving
 * with no read outstanding, or left over when a completion issues no further
 * read, are dropped. Past `bufferLimit` the oldest bytes are dropped and the
 * outstanding read fails, so the decoder resynchronizes.
 *
 * A read issued from inside a completion is picked up by the running delivery
 * loop instead of recursing.
 */
export abstract class StreamTransport extends EventEmitter implements Transport {
  protected readonly logger: Logger
  private readonly bufferLimit: number
  private rx: Buffer = Buffer.alloc(0)
  private pending: PendingRead | null = null
  private delivering = false
  private dropped = 0
  protected closed = false

  constructor (options: StreamTransportOptions = {}) {
    super()
    this.bufferLimit = options.bufferLimit ?? DEFAULT_RX_BUFFER_LIMIT
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Number of received bytes not yet consumed by a read.
   */
  get buffered (): number {
    return this.rx.length
  }

  /**
   * Number of received bytes dropped so far.
   */
  get droppedBytes (): number {
    return this.dropped
  }

  asyncRead<Tag> (tag: Tag, length: number, onComplete: CompletionHandler<Tag>): void {
    if (this.pending !== null) {
      throw new ReadInProgressError()
    }
    if (this.closed) {
      return
    }
    this.pending = {
      length,
      complete: (data, error) => onComplete({ tag, data, error })
    }
    this.deliver()
  }

  abstract asyncWrite (data: Uint8Array): void

  /**
   * Appends bytes from the underlying stream.
   */
  protected receive (chunk: Uint8Array): void {
    if (this.pending === null) {
      this.drop(chunk.length)
      return
    }
    this.rx = this.rx.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.rx, chunk])
    const excess = this.rx.length - this.bufferLimit
    if (excess > 0) {
      this.rx = this.rx.subarray(excess)
      this.dropped += excess
      this.logger.warn('receive buffer overflow', { dropped: excess })
      this.failRead(new ReadError('receive buffer overflow'))
      return
    }
    this.deliver()
  }

  /**
   * Completes the outstanding read, if any, with an error.
   */
  protected failRead (error: Error): void {
    const pending = this.pending
    if (pending === null) {
      return
    }
    this.pending = null
    if (this.run(() => pending.complete(new Uint8Array(0), error))) {
      this.deliver()
    }
  }

  /**
   * Stops delivering; the outstanding read fails with a ReadError and later
   * reads stay pending forever.
   */
  close (): void {
    this.closed = true
    this.rx = Buffer.alloc(0)
    this.failRead(new ReadError('transport closed'))
  }

  private deliver (): void {
    if (this.delivering) {
      return
    }
    this.delivering = true
    try {
      let pending = this.pending
      while (pending !== null && this.rx.length >= pending.length) {
        const data = Uint8Array.from(this.rx.subarray(0, pending.length))
        this.rx = this.rx.subarray(pending.length)
        this.pending = null
        const current = pending
        if (!this.run(() => current.complete(data, null))) {
          break
        }
        pending = this.pending
      }
      if (this.pending === null && this.rx.length > 0) {
        this.drop(this.rx.length)
      }
    } finally {
      this.delivering = false
    }
  }

  private drop (count: number): void {
    this.rx = Buffer.alloc(0)
    this.dropped += count
    this.logger.debug('bytes dropped, no read outstanding', { dropped: count })
  }

  /**
   * Runs a completion; a throwing handler is reported as `'error'`.
   * @returns false when the handler threw
   */
  private run (complete: () => void): boolean {
    try {
      complete()
      return true
    } catch (err) {
      this.emit('error', toError(err))
      return false
    }
  }
}

/**
 * In-process stream transport. Bytes are fed by hand and writes are recorded.
 * Feed bytes after a read is issued; bytes fed with none outstanding are
 * dropped like any other stream's.
 */
export class MemoryTransport extends StreamTransport {
  readonly writes: Uint8Array[] = []

  /**
   * Delivers bytes as if they arrived from the device.
   */
  feed (bytes: Uint8Array | readonly number[]): void {
    this.receive(Uint8Array.from(bytes))
  }

  /**
   * Fails the outstanding read.
   */
  fail (error: Error): void {
    this.failRead(error)
  }

  asyncWrite (data: Uint8Array): void {
    this.writes.push(Uint8Array.from(data))
  }

  /**
   * All written bytes, concatenated.
   */
  get written (): Uint8Array {
    return Uint8Array.from(this.writes.flatMap(chunk => [...chunk]))
  }
}
