import process from 'node:process'
import * as core from '@actions/core'

export interface LogContext {
  readonly [key: string]: unknown
}

export interface Logger {
  readonly debug: (message: string, context?: LogContext) => void
  readonly info: (message: string, context?: LogContext) => void
  readonly success: (message: string, context?: LogContext) => void
  readonly warning: (message: string, context?: LogContext) => void
  readonly error: (message: string, context?: LogContext) => void
}

export interface LoggerOptions {
  /** Emit debug lines. Also enabled when the runner reports debug mode. */
  readonly debug?: boolean
  readonly color?: boolean
  /** Destination for error lines. Defaults to stderr. */
  readonly errorSink?: (line: string) => void
}

type LogLevel = 'debug' | 'error' | 'info' | 'success' | 'warning'

/**
 * Default patterns for sensitive field names (case-insensitive, partial match)
 */
export const DEFAULT_SENSITIVE_FIELDS: readonly string[] = [
  'token',
  'password',
  'passphrase',
  'secret',
  'key',
  'auth',
  'credential',
  'bearer',
  'private',
] as const

const REDACTED = '[REDACTED]'

const ANSI_RESET = '\u001B[0m'

const LEVEL_STYLES: Record<LogLevel, {readonly label: string; readonly color: string}> = {
  debug: {label: 'DEBUG', color: '\u001B[2m'},
  info: {label: 'INFO', color: '\u001B[0;34m'},
  success: {label: 'SUCCESS', color: '\u001B[0;32m'},
  warning: {label: 'WARN', color: '\u001B[0;33m'},
  error: {label: 'ERROR', color: '\u001B[0;31m'},
}

/**
 * Check if a field name matches any sensitive pattern (case-insensitive, partial match)
 */
function isSensitiveField(fieldName: string, sensitivePatterns: readonly string[]): boolean {
  const lowerFieldName = fieldName.toLowerCase()
  return sensitivePatterns.some(pattern => lowerFieldName.includes(pattern.toLowerCase()))
}

/**
 * Recursively redact sensitive fields from an object
 * Returns a new object with sensitive string values replaced by [REDACTED]
 */
export function redactSensitiveFields<T>(value: T, sensitivePatterns: readonly string[] = DEFAULT_SENSITIVE_FIELDS): T {
  if (value == null) {
    return value
  }

  if (typeof value !== 'object' || value instanceof Error) {
    return value
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactSensitiveFields(item, sensitivePatterns)) as T
  }

  const result: Record<string, unknown> = {}
  for (const [fieldName, fieldValue] of Object.entries(value)) {
    if (isSensitiveField(fieldName, sensitivePatterns) && typeof fieldValue === 'string') {
      result[fieldName] = REDACTED
    } else if (fieldValue != null && typeof fieldValue === 'object') {
      result[fieldName] = redactSensitiveFields(fieldValue, sensitivePatterns)
    } else {
      result[fieldName] = fieldValue
    }
  }

  return result as T
}

function formatValue(value: unknown): string {
  if (value instanceof Error) {
    return value.message
  }
  if (typeof value === 'string') {
    return /\s/.test(value) ? JSON.stringify(value) : value
  }
  if (value != null && typeof value === 'object') {
    return JSON.stringify(value)
  }
  return String(value)
}

/**
 * Render context as space-separated `key=value` pairs, after redaction.
 */
export function formatContext(context: LogContext): string {
  const redacted = redactSensitiveFields({...context})
  return Object.entries(redacted)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(' ')
}

export function formatLogLine(level: LogLevel, message: string, context: LogContext, color: boolean): string {
  const {label, color: levelColor} = LEVEL_STYLES[level]
  const prefix = color ? `${levelColor}[${label}]${ANSI_RESET}` : `[${label}]`
  const details = formatContext(context)
  return details.length > 0 ? `${prefix} ${message} ${details}` : `${prefix} ${message}`
}

function writeStderr(line: string): void {
  process.stderr.write(`${line}\n`)
}

export function createLogger(baseContext: LogContext, options: LoggerOptions = {}): Logger {
  const color = options.color ?? process.env.NO_COLOR == null
  const debugEnabled = options.debug === true || core.isDebug()
  const errorSink = options.errorSink ?? writeStderr

  return {
    debug: (message: string, context?: LogContext): void => {
      if (debugEnabled) {
        core.info(formatLogLine('debug', message, {...baseContext, ...context}, color))
      }
    },
    info: (message: string, context?: LogContext): void => {
      core.info(formatLogLine('info', message, context ?? {}, color))
    },
    success: (message: string, context?: LogContext): void => {
      core.info(formatLogLine('success', message, context ?? {}, color))
    },
    warning: (message: string, context?: LogContext): void => {
      core.info(formatLogLine('warning', message, context ?? {}, color))
    },
    error: (message: string, context?: LogContext): void => {
      errorSink(formatLogLine('error', message, context ?? {}, color))
    },
  }
}
