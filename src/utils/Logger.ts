/**
 * Logger utility
 */

import winston from 'winston'

export interface LoggerOptions {
  level?: string
  // Extra file that receives every entry, e.g. the operator alert log
  file?: string
  console?: boolean
}

export class Logger {
  private winston: winston.Logger

  constructor(service: string = 'CrmMessageRelay', options: LoggerOptions = {}) {
    const transports: winston.transport[] = []
    if (options.console ?? true) {
      transports.push(
        new winston.transports.Console({
          format: winston.format.combine(winston.format.colorize(), winston.format.simple())
        })
      )
    }
    transports.push(new winston.transports.File({ filename: 'logs/error.log', level: 'error' }))
    if (options.file) {
      transports.push(new winston.transports.File({ filename: options.file }))
    }

    this.winston = winston.createLogger({
      level: options.level || process.env.LOG_LEVEL || 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      defaultMeta: { service },
      transports
    })
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.winston.info(message, meta)
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.winston.error(message, meta)
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.winston.warn(message, meta)
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.winston.debug(message, meta)
  }
}
