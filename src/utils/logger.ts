import winston from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'
import path from 'path'

export type Logger = winston.Logger

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const
export type LogLevel = typeof LOG_LEVELS[number]

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack }) => {
    const msg = stack || message
    return `${timestamp} [${level.toUpperCase()}] ${msg}`
  })
)

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ level, message, timestamp }) => {
    return `${timestamp} ${level}: ${message}`
  })
)

/**
 * Create the scanner logger. Console output goes to stderr so stdout only
 * carries scan results; a rotating file log is added when `logDir` is set.
 */
export function createLogger(level: LogLevel = 'warn', logDir?: string): Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: [...LOG_LEVELS],
    }),
  ]

  if (logDir) {
    transports.push(new DailyRotateFile({
      dirname: getLogDirectory(logDir),
      filename: 'eyes-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '10m',
      maxFiles: '7d',
      format: logFormat,
      zippedArchive: true,
    }))
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    exitOnError: false,
  })
}

/**
 * Resolve a log directory relative to the working directory
 */
export function getLogDirectory(dir: string): string {
  return path.resolve(dir)
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(l => l === value)
}
