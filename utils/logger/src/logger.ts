import type { DestinationStream } from 'pino'
import type { Logger as PinoLogger } from 'pino'

import pino                          from 'pino'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export class Logger {
  private static root: PinoLogger = pino({ level: 'info' })

  static setLevel(level: LogLevel): void {
    Logger.root.level = level
  }

  static getLevel(): string {
    return Logger.root.level
  }

  static setDestination(destination: DestinationStream): void {
    Logger.root = pino({ level: Logger.root.level }, destination)
  }

  constructor(private readonly scope: string) {}

  debug(message: string): void {
    Logger.root.debug({ scope: this.scope }, message)
  }

  info(message: string): void {
    Logger.root.info({ scope: this.scope }, message)
  }

  warn(message: string): void {
    Logger.root.warn({ scope: this.scope }, message)
  }

  error(message: string): void {
    Logger.root.error({ scope: this.scope }, message)
  }
}
