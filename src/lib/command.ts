/**
 * Camera command encoders.
 *
 * Each encoder validates its arguments and returns the fixed-layout command
 * buffer; nothing is written here.
 *
 * @module pixycam-js/command
 */

import {
  CMD_PREFIX,
  CMD_SET_BRIGHTNESS,
  CMD_SET_LED,
  CMD_SET_PAN_TILT,
  MAX_SERVO_POSITION,
  MIN_SERVO_POSITION
} from './constants.js'
import { InvalidArgumentError } from './error.js'

function checkRange (name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InvalidArgumentError(name, value, `an integer in [${min}, ${max}]`)
  }
}

/**
 * Encodes a set-LED command: `00 FD R G B`.
 * @throws InvalidArgumentError if a channel is outside [0, 255]
 */
export function encodeSetLed (red: number, green: number, blue: number): Uint8Array {
  checkRange('red', red, 0, 0xff)
  checkRange('green', green, 0, 0xff)
  checkRange('blue', blue, 0, 0xff)
  return new Uint8Array([CMD_PREFIX, CMD_SET_LED, red, green, blue])
}

/**
 * Encodes a set-brightness command: `00 FE V`.
 * @throws InvalidArgumentError if the value is outside [0, 255]
 */
export function encodeSetBrightness (brightness: number): Uint8Array {
  checkRange('brightness', brightness, 0, 0xff)
  return new Uint8Array([CMD_PREFIX, CMD_SET_BRIGHTNESS, brightness])
}

/**
 * Encodes a pan/tilt command with little-endian positions:
 * `00 FF panLo panHi tiltLo tiltHi`.
 * @param pan - Pan servo position in [0, 1000]
 * @param tilt - Tilt servo position in [0, 1000]
 * @throws InvalidArgumentError if a position is out of range
 */
export function encodeSetPanTilt (pan: number, tilt: number): Uint8Array {
  checkRange('pan', pan, MIN_SERVO_POSITION, MAX_SERVO_POSITION)
  checkRange('tilt', tilt, MIN_SERVO_POSITION, MAX_SERVO_POSITION)
  return new Uint8Array([
    CMD_PREFIX,
    CMD_SET_PAN_TILT,
    pan & 0xff,
    (pan >> 8) & 0xff,
    tilt & 0xff,
    (tilt >> 8) & 0xff
  ])
}
