/**
 * Tests for the serial transport against an in-process port.
 */

import { EventEmitter } from 'events'
import { describe, it, expect, vi } from 'vitest'
import type { Logger } from '../../src/lib/logger.js'
import { PixyCam } from '../../src/lib/pixycam.js'
import { SerialTransport } from '../../src/lib/serial.js'
import { FramingStrategy } from '../../src/lib/tag.js'
import type { SerialPortHandle } from '../../src/lib/serial.js'
import { PLAIN_BLOCK, encodeFrame } from './helpers.js'

class FakePort extends EventEmitter implements SerialPortHandle {
  readonly path = '/dev/ttyTEST0'
  isOpen = true
  readonly written: Buffer[] = []
  closeCalls = 0

  write (chunk: Buffer): boolean {
    this.written.push(chunk)
    return true
  }

  close (callback?: (err: Error | null) => void): void {
    this.closeCalls++
    this.isOpen = false
    callback?.(null)
    this.emit('close')
  }
}

function mockLogger (): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

describe('SerialTransport', () => {
  it('should feed port data to the read chain', () => {
    const port = new FakePort()
    const cam = new PixyCam(new SerialTransport(port))
    cam.start()

    const bytes = Buffer.from(encodeFrame([PLAIN_BLOCK]))
    port.emit('data', bytes.subarray(0, 5))
    port.emit('data', bytes.subarray(5))

    expect(cam.pollBatch()?.map(block => block.centerX)).toEqual([100])
  })

  it('should drop data that arrives before the camera starts', () => {
    const port = new FakePort()
    const transport = new SerialTransport(port)
    const cam = new PixyCam(transport, { strategy: FramingStrategy.Byte })
    const backlog = Buffer.from(Array.from({ length: 1000 }, () => encodeFrame([PLAIN_BLOCK])).flat())
    for (let i = 0; i < 20; i++) {
      port.emit('data', backlog)
    }

    expect(transport.buffered).toBe(0)
    expect(transport.droppedBytes).toBe(360000)

    cam.start()
    expect(cam.pollBatch()).toBeNull()
    expect(cam.stats.blocksAccepted).toBe(0)

    port.emit('data', Buffer.from(encodeFrame([PLAIN_BLOCK])))
    expect(cam.pollBatch()?.map(block => block.signature)).toEqual([1])
    expect(cam.stats.framesPublished).toBe(1)
  })

  it('should write commands to the port', () => {
    const port = new FakePort()
    const transport = new SerialTransport(port)
    transport.asyncWrite(Uint8Array.of(0x00, 0xfe, 0x10))

    expect(port.written).toHaveLength(1)
    expect([...port.written[0]]).toEqual([0x00, 0xfe, 0x10])
  })

  it('should fail the pending read on a port error', () => {
    const port = new FakePort()
    const logger = mockLogger()
    const transport = new SerialTransport(port, { logger })
    const onComplete = vi.fn()
    transport.asyncRead('SYNC', 2, onComplete)

    port.emit('error', new Error('device reports readiness to read but returned no data'))

    expect(logger.warn).toHaveBeenCalledWith('serial port error', {
      path: '/dev/ttyTEST0',
      error: 'device reports readiness to read but returned no data'
    })
    expect(onComplete).toHaveBeenCalledTimes(1)
    const completion: unknown = onComplete.mock.calls[0][0]
    expect(completion).toMatchObject({
      tag: 'SYNC',
      error: { message: 'Read: device reports readiness to read but returned no data' }
    })
  })

  it('should close the port once', () => {
    const port = new FakePort()
    const transport = new SerialTransport(port)
    transport.close()
    transport.close()

    expect(port.closeCalls).toBe(1)
    expect(port.isOpen).toBe(false)
  })

  it('should stop delivering after the port closes', () => {
    const port = new FakePort()
    const transport = new SerialTransport(port)
    const onComplete = vi.fn()
    transport.asyncRead('SYNC', 2, onComplete)

    port.close()
    port.emit('data', Buffer.from([0x55, 0xaa]))

    expect(onComplete).toHaveBeenCalledTimes(1)
    expect(transport.buffered).toBe(0)
  })
})
