/**
 * Pixy object block protocol constants.
 *
 * @module pixycam-js/constants
 */

/**
 * Low byte of the plain block sync word
 */
export const SYNC_LOW = 0x55

/**
 * Low byte of the color-coded block sync word
 */
export const SYNC_LOW_CC = 0x56

/**
 * High byte shared by both sync words
 */
export const SYNC_HIGH = 0xaa

/**
 * Sync word announcing a plain block (wire bytes `55 AA`)
 */
export const SYNC_WORD = 0xaa55

/**
 * Sync word announcing a color-coded block (wire bytes `56 AA`)
 */
export const SYNC_WORD_CC = 0xaa56

/**
 * Sync word read one byte out of phase (wire bytes `AA 55`)
 */
export const SYNC_WORD_SWAPPED = 0x55aa

/**
 * Body length of a plain block: signature, x, y, width, height
 */
export const NORMAL_BLOCK_LENGTH = 10

/**
 * Body length of a color-coded block: plain body plus angle
 */
export const COLOR_CODE_BLOCK_LENGTH = 12

/**
 * Valid signature range checked by the byte strategy
 */
export const MIN_SIGNATURE = 1
export const MAX_SIGNATURE = 7

/**
 * Command prefix byte
 */
export const CMD_PREFIX = 0x00
export const CMD_SET_LED = 0xfd
export const CMD_SET_BRIGHTNESS = 0xfe
export const CMD_SET_PAN_TILT = 0xff

/**
 * Servo position limits for pan/tilt
 */
export const MIN_SERVO_POSITION = 0
export const MAX_SERVO_POSITION = 1000

/**
 * Default I2C device address of the camera
 */
export const DEFAULT_I2C_ADDRESS = 0x54

/**
 * Default I2C bus number
 */
export const DEFAULT_I2C_BUS = 1

/**
 * Default serial link settings (19200 8N1)
 */
export const DEFAULT_BAUD_RATE = 19200
export const DEFAULT_DATA_BITS = 8
export const DEFAULT_STOP_BITS = 1
export const DEFAULT_PARITY = 'none'

/**
 * Default instance name
 */
export const DEFAULT_NAME = 'pixy'

/**
 * Most received bytes a stream transport holds for the outstanding read.
 * Older bytes are dropped past this point.
 */
export const DEFAULT_RX_BUFFER_LIMIT = 4096
