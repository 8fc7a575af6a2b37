/**
 * Event Logger
 *
 * One line per event on stderr (stdout carries the MCP protocol):
 *
 *   2026-01-01T12:00:00.000Z | Command | alpha:white | rollDice 5-3
 */

export type LogEventType = 'CreateMatch' | 'Command' | 'Move' | 'Error' | 'System'

export interface LogEvent {
  readonly type: LogEventType
  /** Actor (match and side); '-' when empty */
  readonly who: string
  readonly msg: string
}

export interface Logger {
  write(event: LogEvent): void
  info(type: LogEventType, who: string, msg: string): void
  error(who: string, msg: string): void
}

export function formatLogLine(event: LogEvent, at: Date = new Date()): string {
  return `${at.toISOString()} | ${event.type} | ${event.who === '' ? '-' : event.who} | ${event.msg}`
}

/**
 * Create a logger. The sink defaults to console.error.
 */
export function createLogger(
  sink: (line: string) => void = line => {
    console.error(line)
  },
  clock: () => Date = () => new Date()
): Logger {
  const write = (event: LogEvent): void => {
    sink(formatLogLine(event, clock()))
  }
  return {
    write,
    info: (type, who, msg) => {
      write({ type, who, msg })
    },
    error: (who, msg) => {
      write({ type: 'Error', who, msg })
    },
  }
}
