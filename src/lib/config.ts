/**
 * Environment configuration.
 *
 * @module pixycam-js/config
 */

import { DEFAULT_BAUD_RATE, DEFAULT_I2C_ADDRESS, DEFAULT_I2C_BUS, DEFAULT_NAME } from './constants.js'
import { InvalidArgumentError } from './error.js'
import { FramingStrategy } from './tag.js'

/**
 * Settings resolved from `PIXY_*` variables.
 */
export interface PixyConfig {
  name: string
  debug: boolean
  strategy: FramingStrategy
  /** Serial port path; the I2C bus is used when unset */
  serialPath: string | null
  baudRate: number
  i2cBus: number
  i2cAddress: number
}

type Env = Record<string, string | undefined>

function parseInteger (name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') {
    return fallback
  }
  const value = /^0x[0-9a-f]+$/i.test(raw) ? parseInt(raw.slice(2), 16) : Number(raw)
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(name, raw, 'a non-negative integer')
  }
  return value
}

function parseStrategy (raw: string | undefined): FramingStrategy {
  switch (raw) {
    case undefined:
    case '':
    case FramingStrategy.Word:
      return FramingStrategy.Word
    case FramingStrategy.Byte:
      return FramingStrategy.Byte
    default:
      throw new InvalidArgumentError('PIXY_STRATEGY', raw, '"word" or "byte"')
  }
}

/**
 * Reads the configuration from the environment.
 * @param env - Variables to read, `process.env` by default
 */
export function loadConfig (env: Env = process.env): PixyConfig {
  return {
    name: env.PIXY_NAME ?? DEFAULT_NAME,
    debug: env.PIXY_DEBUG === '1',
    strategy: parseStrategy(env.PIXY_STRATEGY),
    serialPath: env.PIXY_SERIAL_PATH !== undefined && env.PIXY_SERIAL_PATH !== '' ? env.PIXY_SERIAL_PATH : null,
    baudRate: parseInteger('PIXY_BAUD_RATE', env.PIXY_BAUD_RATE, DEFAULT_BAUD_RATE),
    i2cBus: parseInteger('PIXY_I2C_BUS', env.PIXY_I2C_BUS, DEFAULT_I2C_BUS),
    i2cAddress: parseInteger('PIXY_I2C_ADDRESS', env.PIXY_I2C_ADDRESS, DEFAULT_I2C_ADDRESS)
  }
}
