import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { config } from 'dotenv'
import type { FastifyBaseLogger, FastifyRequest } from 'fastify'
import type { LevelWithSilent, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'

export const validLogLevels: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

export type LogDestination = 'terminal' | 'file' | 'both'

interface FileLoggerOptions extends LoggerOptions {
  stream: rfs.RotatingFileStream | NodeJS.WriteStream
}

interface MultiStreamLoggerOptions extends LoggerOptions {
  stream: pino.MultiStreamRes
}

type AppLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const projectRoot = resolve(__dirname, '..', '..')

// Load .env file early for logger configuration
config({ path: resolve(projectRoot, '.env') })

const SENSITIVE_QUERY_PARAMS = ['access_token', 'accessToken', 'token']

// Credentials can show up in logged objects (integration rows, request bodies)
const REDACT_PATHS = [
  'accessToken',
  'access_token',
  '*.accessToken',
  '*.access_token',
  'req.headers.authorization',
]

/**
 * Serializes errors, keeping the HTTP status, the error class and the cause chain.
 *
 * Stack traces are left out for 4xx errors.
 */
export function serializeError(err: unknown): unknown {
  if (err == null) {
    return err
  }

  if (typeof err !== 'object') {
    const primitiveType =
      typeof err === 'string'
        ? 'StringError'
        : typeof err === 'number'
          ? 'NumberError'
          : 'BooleanError'
    return { message: String(err), type: primitiveType }
  }

  const serialized: Record<string, unknown> = {}

  if ('message' in err && err.message) serialized.message = err.message
  if ('name' in err && err.name) serialized.name = err.name
  if ('status' in err && err.status !== undefined)
    serialized.status = err.status
  if ('statusCode' in err && err.statusCode !== undefined)
    serialized.statusCode = err.statusCode

  if (err instanceof TypeError) {
    serialized.type = 'TypeError'
  } else if (err instanceof RangeError) {
    serialized.type = 'RangeError'
  } else if (err instanceof SyntaxError) {
    serialized.type = 'SyntaxError'
  } else if (err instanceof Error) {
    serialized.type = err.constructor.name || 'Error'
  } else if ('name' in err && typeof err.name === 'string' && err.name) {
    serialized.type = err.name
  } else {
    serialized.type = 'UnknownError'
  }

  const statusCode =
    'statusCode' in err && typeof err.statusCode === 'number'
      ? err.statusCode
      : 'status' in err && typeof err.status === 'number'
        ? err.status
        : undefined
  const shouldIncludeStack = !statusCode || statusCode >= 500
  if ('stack' in err && err.stack && shouldIncludeStack) {
    serialized.stack = err.stack
  }

  // cause is non-enumerable on Error, so it is copied explicitly
  if ('cause' in err && err.cause) {
    serialized.cause = serializeError(err.cause)
  }

  for (const [key, value] of Object.entries(err)) {
    if (
      !['message', 'stack', 'name', 'status', 'statusCode', 'type'].includes(
        key,
      )
    ) {
      serialized[key] = value
    }
  }

  return serialized
}

/**
 * Returns a request serializer that redacts token query parameters from the URL.
 */
function createRequestSerializer() {
  return (req: FastifyRequest) => {
    const serialized = {
      method: req.method,
      url: req.url,
      host: req.headers.host,
      remoteAddress: req.ip,
      remotePort: req.socket.remotePort,
    }

    if (serialized.url) {
      for (const param of SENSITIVE_QUERY_PARAMS) {
        serialized.url = serialized.url.replace(
          new RegExp(`([?&])${param}=([^&]+)`, 'gi'),
          `$1${param}=[REDACTED]`,
        )
      }
    }

    return serialized
  }
}

/**
 * Generates a log filename for the rotating stream.
 *
 * Without a date this is the live file, 'playlist-router-current.log'.
 */
function filename(time: number | Date, index?: number): string {
  if (!time) return 'playlist-router-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `playlist-router-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates a rotating file stream under data/logs.
 *
 * Falls back to stdout when the directory cannot be created.
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolve(projectRoot, 'data', 'logs')
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(filename, {
      size: '10M',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return process.stdout
  }
}

const prettyOptions = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

function getLevel(): LevelWithSilent {
  const level = validLogLevels.find((value) => value === process.env.logLevel)
  return level ?? 'info'
}

function getTerminalOptions(): LoggerOptions {
  return {
    level: getLevel(),
    redact: REDACT_PATHS,
    transport: {
      target: 'pino-pretty',
      options: prettyOptions,
    },
    serializers: {
      req: createRequestSerializer(),
      error: serializeError,
    },
  }
}

function getFileOptions(): FileLoggerOptions {
  return {
    level: getLevel(),
    redact: REDACT_PATHS,
    stream: getFileStream(),
    serializers: {
      req: createRequestSerializer(),
      error: serializeError,
    },
  }
}

/**
 * Generates logger configuration options from environment variables.
 *
 * Environment variables:
 * - logDestination: 'terminal', 'file' or 'both' (default: both)
 * - logLevel: initial level (default: info)
 */
export function createLoggerConfig(): AppLoggerOptions {
  const requested = process.env.logDestination
  const destination: LogDestination =
    requested === 'terminal' || requested === 'file' ? requested : 'both'

  if (destination === 'terminal') {
    return getTerminalOptions()
  }

  if (destination === 'file') {
    return getFileOptions()
  }

  const fileStream = getFileStream()

  // Avoid double-logging if the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return getTerminalOptions()
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: prettyOptions,
  })

  const multistream = pino.multistream([
    { stream: prettyStream },
    { stream: fileStream },
  ])

  return {
    level: getLevel(),
    redact: REDACT_PATHS,
    stream: multistream,
    serializers: {
      req: createRequestSerializer(),
      error: serializeError,
    },
  }
}

/**
 * Creates a child logger whose messages are prefixed with the service name,
 * e.g. `[PLAYLIST_SYNC] Sync completed`.
 */
export function createServiceLogger(
  log: FastifyBaseLogger,
  service: string,
): FastifyBaseLogger {
  return log.child({}, { msgPrefix: `[${service.toUpperCase()}] ` })
}
