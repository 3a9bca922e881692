import type { Logger } from '../types.js'

export type LogLevel = keyof Logger

const TAGS: Record<LogLevel, string> = {
  info: '[INFO]',
  verbose: '[VERBOSE]',
  success: '[OK]',
  warn: '[WARN]',
  error: '[ERROR]',
}

export function formatTagged(level: LogLevel, msg: string): string {
  return `${TAGS[level].padEnd(10)}${msg}`
}

export interface ConsoleStreams {
  stdout: Pick<NodeJS.WritableStream, 'write'>
  stderr: Pick<NodeJS.WritableStream, 'write'>
}

export function createConsoleLogger(streams: ConsoleStreams = { stdout: process.stdout, stderr: process.stderr }): Logger {
  const out = (level: LogLevel) => (msg: string) => {
    const stream = level === 'error' ? streams.stderr : streams.stdout
    stream.write(formatTagged(level, msg) + '\n')
  }
  return {
    info: out('info'),
    verbose: out('verbose'),
    success: out('success'),
    warn: out('warn'),
    error: out('error'),
  }
}

export function silentLogger(): Logger {
  return {
    info: () => {},
    verbose: () => {},
    success: () => {},
    warn: () => {},
    error: () => {},
  }
}

export function fanOut(...loggers: Logger[]): Logger {
  const each = (level: LogLevel) => (msg: string) => {
    for (const l of loggers) l[level](msg)
  }
  return {
    info: each('info'),
    verbose: each('verbose'),
    success: each('success'),
    warn: each('warn'),
    error: each('error'),
  }
}
