/**
 * Application logger singleton backed by Winston.
 *
 * - Writes daily rotated log files to `<logsDir>/application-<DATE>.log`.
 * - Outside production, logs are also written to the console with colorized
 *   output.
 * - Under `NODE_ENV=test` nothing is written: a silent console transport
 *   keeps Winston from complaining about a logger without transports.
 *
 * Level comes from `LOG_LEVEL`, then `logging.level` in `config.json`, then
 * `info`.
 */
import fs from 'fs'
import { createLogger, format, transports } from 'winston'
import type Transport from 'winston-transport'
import DailyRotateFile from 'winston-daily-rotate-file'
import { loadRuntimeConfigSync } from './runtimeConfig'

const { combine, timestamp, printf, colorize } = format

const logFormat = printf(({ level, message, timestamp }) => {
  return `${timestamp} [${level}]: ${message}`
})

const { config, warning } = loadRuntimeConfigSync()
const isTest = process.env.NODE_ENV === 'test'
const level = process.env.LOG_LEVEL || config.logging.level || 'info'
const logsDir = config.paths.logsDir
const consoleEnabled = config.logging.console ?? process.env.NODE_ENV !== 'production'

const transportsList: Transport[] = []
if (isTest) {
  transportsList.push(new transports.Console({ silent: true }))
} else {
  if (!fs.existsSync(logsDir)) fs.mkdirSync(logsDir, { recursive: true })
  if (config.logging.dailyRotate) {
    transportsList.push(
      new DailyRotateFile({
        filename: `${logsDir}/application-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: config.logging.maxSize,
        maxFiles: config.logging.maxFiles,
        level,
      }),
    )
  } else {
    transportsList.push(new transports.File({ filename: `${logsDir}/application.log`, level }))
  }
  if (consoleEnabled) {
    transportsList.push(new transports.Console({ format: combine(colorize(), timestamp(), logFormat) }))
  }
}

const logger = createLogger({
  level,
  format: combine(timestamp(), logFormat),
  transports: transportsList,
})

if (warning) logger.warn(warning)

export default logger
