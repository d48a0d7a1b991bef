/**
 * Pixy error types.
 *
 * Device noise (bad checksums, stray bytes, short reads) is never thrown: the
 * decoder logs it and resynchronizes. Only the errors below reach a caller.
 *
 * @module pixycam-js/error
 */

/**
 * Top-level error type for Pixy operations.
 */
export class PixyError extends Error {
  constructor (message: string) {
    super(message)
    this.name = 'PixyError'
  }
}

/**
 * A completion the decoder's own read chain can never produce.
 * Signals a logic defect; the instance halts.
 */
export class ProtocolViolationError extends PixyError {
  public readonly tag: string
  public readonly length: number

  constructor (tag: string, length: number, detail: string) {
    super(`Protocol violation in ${tag} (length ${length}): ${detail}`)
    this.name = 'ProtocolViolationError'
    this.tag = tag
    this.length = length
  }
}

/**
 * Command argument out of range. Thrown before any I/O.
 */
export class InvalidArgumentError extends PixyError {
  public readonly argument: string
  public readonly value: unknown

  constructor (argument: string, value: unknown, expected: string) {
    super(`Invalid ${argument}: ${String(value)} (expected ${expected})`)
    this.name = 'InvalidArgumentError'
    this.argument = argument
    this.value = value
  }
}

/**
 * A read was issued while another one is still outstanding.
 */
export class ReadInProgressError extends PixyError {
  constructor () {
    super('Read already in progress')
    this.name = 'ReadInProgressError'
  }
}

/**
 * Read error.
 */
export class ReadError extends PixyError {
  public readonly reason?: string

  constructor (reason?: string) {
    super(`Read: ${reason ?? 'unknown'}`)
    this.name = 'ReadError'
    this.reason = reason
  }
}

/**
 * Write error.
 */
export class WriteError extends PixyError {
  public readonly reason?: string

  constructor (reason?: string) {
    super(`Write: ${reason ?? 'unknown'}`)
    this.name = 'WriteError'
    this.reason = reason
  }
}

/**
 * Union type of all Pixy errors.
 */
export type Error =
  | ProtocolViolationError
  | InvalidArgumentError
  | ReadInProgressError
  | ReadError
  | WriteError
