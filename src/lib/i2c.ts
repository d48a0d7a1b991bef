/**
 * I2C transport over an `i2c-bus` promisified bus.
 *
 * @module pixycam-js/i2c
 */

import { EventEmitter } from 'events'
import type { PromisifiedBus } from 'i2c-bus'
import { DEFAULT_I2C_ADDRESS, DEFAULT_I2C_BUS } from './constants.js'
import { ReadError, ReadInProgressError, WriteError } from './error.js'
import { silentLogger } from './logger.js'
import type { Logger } from './logger.js'
import { toError } from './transport.js'
import type { CompletionHandler, Transport } from './transport.js'

/**
 * The part of an `i2c-bus` bus the transport uses.
 */
export type I2cBusHandle = Pick<PromisifiedBus, 'i2cRead' | 'i2cWrite' | 'close'>

export interface I2cTransportOptions {
  /** Device address, 0x54 by default */
  address?: number
  logger?: Logger
}

export interface OpenI2cTransportOptions extends I2cTransportOptions {
  /** Bus number, 1 by default */
  bus?: number
}

/**
 * Transport issuing plain I2C reads and writes to the camera.
 *
 * Each read is one bus transaction, so a completion may carry fewer bytes
 * than requested. Writes run one after another in issue order.
 * A failed write (as a WriteError) and a completion handler that throws are
 * emitted as `'error'` when a listener is attached and logged otherwise.
 */
export class I2cTransport extends EventEmitter implements Transport {
  readonly address: number
  private readonly bus: I2cBusHandle
  private readonly logger: Logger
  private reading = false
  private closed = false
  private writes: Promise<void> = Promise.resolve()

  constructor (bus: I2cBusHandle, options: I2cTransportOptions = {}) {
    super()
    this.bus = bus
    this.address = options.address ?? DEFAULT_I2C_ADDRESS
    this.logger = options.logger ?? silentLogger
  }

  asyncRead<Tag> (tag: Tag, length: number, onComplete: CompletionHandler<Tag>): void {
    if (this.reading) {
      throw new ReadInProgressError()
    }
    if (this.closed) {
      return
    }
    this.reading = true
    this.bus.i2cRead(this.address, length, Buffer.alloc(length))
      .then(
        ({ bytesRead, buffer }) => {
          this.complete(() => onComplete({ tag, data: Uint8Array.from(buffer.subarray(0, bytesRead)), error: null }))
        },
        (err: unknown) => {
          this.complete(() => onComplete({ tag, data: new Uint8Array(0), error: new ReadError(toError(err).message) }))
        }
      )
      .catch((err: unknown) => {
        this.logger.error('read completion failed', { error: toError(err).message })
      })
  }

  asyncWrite (data: Uint8Array): void {
    const buffer = Buffer.from(data)
    this.writes = this.writes
      .then(async () => {
        await this.bus.i2cWrite(this.address, buffer.length, buffer)
      })
      .catch((err: unknown) => {
        const error = new WriteError(toError(err).message)
        if (this.listenerCount('error') > 0) {
          this.emit('error', error)
        } else {
          this.logger.warn('write failed', { address: this.address, error: error.message })
        }
      })
  }

  /**
   * Stops issuing reads and closes the bus.
   */
  async close (): Promise<void> {
    this.closed = true
    await this.writes
    await this.bus.close()
  }

  private complete (deliver: () => void): void {
    this.reading = false
    if (this.closed) {
      return
    }
    try {
      deliver()
    } catch (err) {
      const error = toError(err)
      if (this.listenerCount('error') > 0) {
        this.emit('error', error)
      } else {
        this.logger.error('completion handler failed', { error: error.message })
      }
    }
  }
}

/**
 * Opens an I2C bus through `i2c-bus` and wraps it.
 */
export async function openI2cTransport (options: OpenI2cTransportOptions = {}): Promise<I2cTransport> {
  const { default: i2c } = await import('i2c-bus')
  const bus = await i2c.openPromisified(options.bus ?? DEFAULT_I2C_BUS)
  return new I2cTransport(bus, options)
}
