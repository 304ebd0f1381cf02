/**
 * Structured logger.
 *
 * One JSON object per line: `{ ts, level, event, ...fields }`. Debug and
 * info go to stdout, warn and error to stderr, so log aggregators that read
 * JSON from the process streams pick them up unchanged.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export type LogFields = Record<string, unknown>

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export interface LogSink {
  stdout(line: string): void
  stderr(line: string): void
}

export const processSink: LogSink = {
  stdout: (line) => { process.stdout.write(line) },
  stderr: (line) => { process.stderr.write(line) },
}

export interface Logger {
  readonly level: LogLevel
  debug(event: string, fields?: LogFields): void
  info(event: string, fields?: LogFields): void
  warn(event: string, fields?: LogFields): void
  error(event: string, fields?: LogFields): void
}

export function createLogger(level: LogLevel, sink: LogSink = processSink): Logger {
  const threshold = SEVERITY[level]

  function write(lineLevel: LogLevel, event: string, fields: LogFields = {}): void {
    if (SEVERITY[lineLevel] < threshold) return
    const line = JSON.stringify({ ts: new Date().toISOString(), level: lineLevel, event, ...fields }) + '\n'
    if (lineLevel === 'warn' || lineLevel === 'error') sink.stderr(line)
    else sink.stdout(line)
  }

  return {
    level,
    debug: (event, fields) => write('debug', event, fields),
    info: (event, fields) => write('info', event, fields),
    warn: (event, fields) => write('warn', event, fields),
    error: (event, fields) => write('error', event, fields),
  }
}
