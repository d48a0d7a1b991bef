/**
 * Pixy object block camera library for Node.js.
 *
 * Decodes the camera's object block stream over I2C or serial without ever
 * blocking: every read completion is interpreted by a framing state machine
 * that immediately issues the next read.
 *
 * ## Usage
 *
 * 1. Open a transport (`openSerialTransport()` or `openI2cTransport()`), or
 *    call `openPixyCam()` to pick one from `PIXY_*` environment variables.
 * 2. Create a `PixyCam` and call `start()`; `setEnabled()` pauses and resumes
 *    decoding.
 * 3. Call `pollBatch()` whenever convenient; it returns the latest frame's
 *    blocks once and `null` until the next frame completes.
 * 4. Drive the LED, brightness and pan/tilt servos with `setLED()`,
 *    `setBrightness()` and `setPanTilt()`.
 *
 * @module pixycam-js
 */

// Constants
export {
  SYNC_WORD,
  SYNC_WORD_CC,
  SYNC_WORD_SWAPPED,
  NORMAL_BLOCK_LENGTH,
  COLOR_CODE_BLOCK_LENGTH,
  DEFAULT_I2C_ADDRESS,
  DEFAULT_BAUD_RATE,
  DEFAULT_RX_BUFFER_LIMIT
} from './constants.js'

// Errors
export {
  PixyError,
  ProtocolViolationError,
  InvalidArgumentError,
  ReadInProgressError,
  ReadError,
  WriteError,
  type Error as PixyErrorType
} from './error.js'

// Blocks
export {
  BlockField,
  ObjectBlock,
  type ObjectBlockInit,
  BlockAssembler,
  type FinalizeResult,
  toWord,
  readWord
} from './block.js'

// Tags
export { WordTag, ByteTag, FramingStrategy, type ReadRequest } from './tag.js'

// Decoding
export {
  type DecoderStats,
  type FrameDecoder,
  type FrameDecoderOptions,
  WordFrameDecoder,
  ByteFrameDecoder,
  createFrameDecoder,
  isSyncWord
} from './decoder.js'
export { BatchPublisher } from './publisher.js'

// Commands
export { encodeSetLed, encodeSetBrightness, encodeSetPanTilt } from './command.js'

// Transports
export {
  type Transport,
  type ReadCompletion,
  type CompletionHandler,
  type StreamTransportOptions,
  StreamTransport,
  MemoryTransport
} from './transport.js'
export { SerialTransport, openSerialTransport, type SerialPortHandle, type SerialTransportOptions } from './serial.js'
export { I2cTransport, openI2cTransport, type I2cBusHandle, type I2cTransportOptions } from './i2c.js'

// Logging and configuration
export { LogLevel, type Logger, createConsoleLogger, silentLogger } from './logger.js'
export { loadConfig, type PixyConfig } from './config.js'

// Device
export { PixyCam, type PixyCamOptions } from './pixycam.js'
export { openPixyCam } from './open.js'
