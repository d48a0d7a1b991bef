/**
 * Serial transport over the `serialport` package.
 *
 * @module pixycam-js/serial
 */

import { SerialPort } from 'serialport'
import {
  DEFAULT_BAUD_RATE,
  DEFAULT_DATA_BITS,
  DEFAULT_PARITY,
  DEFAULT_STOP_BITS
} from './constants.js'
import { PixyError, ReadError } from './error.js'
import type { Logger } from './logger.js'
import { StreamTransport } from './transport.js'
import type { StreamTransportOptions } from './transport.js'

/**
 * The part of a `serialport` port the transport uses.
 * Write failures surface through the port's `'error'` event.
 */
export interface SerialPortHandle {
  readonly path: string
  readonly isOpen: boolean
  write (chunk: Buffer): boolean
  on (event: 'data', listener: (chunk: Buffer) => void): unknown
  on (event: 'error', listener: (err: Error) => void): unknown
  on (event: 'close', listener: () => void): unknown
  close (callback?: (err: Error | null) => void): void
}

export interface SerialTransportOptions {
  /** OS serial port path, e.g. "/dev/ttyUSB0" */
  path: string
  baudRate?: number
  dataBits?: 5 | 6 | 7 | 8
  stopBits?: 1 | 1.5 | 2
  parity?: 'none' | 'even' | 'odd' | 'mark' | 'space'
  /** Most received bytes held for the outstanding read */
  bufferLimit?: number
  logger?: Logger
}

/**
 * Byte-stream transport reading from an open serial port.
 */
export class SerialTransport extends StreamTransport {
  private readonly port: SerialPortHandle

  constructor (port: SerialPortHandle, options: StreamTransportOptions = {}) {
    super(options)
    this.port = port

    port.on('data', (chunk: Buffer) => {
      if (!this.closed) {
        this.receive(chunk)
      }
    })
    port.on('error', (err: Error) => {
      this.logger.warn('serial port error', { path: port.path, error: err.message })
      this.failRead(new ReadError(err.message))
    })
    port.on('close', () => {
      this.close()
    })
  }

  asyncWrite (data: Uint8Array): void {
    this.port.write(Buffer.from(data))
  }

  close (): void {
    if (this.closed) {
      return
    }
    super.close()
    if (this.port.isOpen) {
      this.port.close((err) => {
        if (err !== null) {
          this.logger.warn('close failed', { path: this.port.path, error: err.message })
        }
      })
    }
  }
}

/**
 * Opens a serial port with the camera's defaults (19200 8N1).
 * @throws PixyError if the port cannot be opened
 */
export async function openSerialTransport (options: SerialTransportOptions): Promise<SerialTransport> {
  const port = new SerialPort({
    path: options.path,
    baudRate: options.baudRate ?? DEFAULT_BAUD_RATE,
    dataBits: options.dataBits ?? DEFAULT_DATA_BITS,
    stopBits: options.stopBits ?? DEFAULT_STOP_BITS,
    parity: options.parity ?? DEFAULT_PARITY,
    autoOpen: false
  })

  await new Promise<void>((resolve, reject) => {
    port.open((err) => {
      if (err != null) {
        reject(new PixyError(`Failed to open ${options.path}: ${err.message}`))
        return
      }
      resolve()
    })
  })

  return new SerialTransport(port, { bufferLimit: options.bufferLimit, logger: options.logger })
}
