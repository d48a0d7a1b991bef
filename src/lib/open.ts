/**
 * Opens a camera from resolved configuration.
 *
 * @module pixycam-js/open
 */

import { loadConfig } from './config.js'
import type { PixyConfig } from './config.js'
import { openI2cTransport } from './i2c.js'
import { createConsoleLogger } from './logger.js'
import { PixyCam } from './pixycam.js'
import { openSerialTransport } from './serial.js'
import type { Transport } from './transport.js'

/**
 * Opens the serial port when `serialPath` is set, the I2C bus otherwise, and
 * returns an unstarted camera logging to the console.
 */
export async function openPixyCam (config: PixyConfig = loadConfig()): Promise<PixyCam> {
  const logger = createConsoleLogger({ name: config.name, debug: config.debug })
  const transport: Transport = config.serialPath !== null
    ? await openSerialTransport({ path: config.serialPath, baudRate: config.baudRate, logger })
    : await openI2cTransport({ bus: config.i2cBus, address: config.i2cAddress, logger })
  return new PixyCam(transport, { name: config.name, strategy: config.strategy, logger })
}
