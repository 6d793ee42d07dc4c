import type { FastifyRequest } from 'fastify'
import { describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

// Mock dependencies before importing the module
vi.mock('dotenv', () => ({
  config: vi.fn(),
}))

vi.mock('rotating-file-stream', () => ({
  createStream: vi.fn(() => ({
    write: vi.fn(),
    end: vi.fn(),
  })),
}))

vi.stubEnv('logDestination', 'terminal')
vi.stubEnv('logLevel', 'silent')

const { createLoggerConfig, createServiceLogger, serializeError, validLogLevels } =
  await import('@utils/logger.js')

function createRequest(url: string): FastifyRequest {
  return {
    method: 'GET',
    url,
    headers: { host: 'localhost:3003' },
    ip: '127.0.0.1',
    socket: { remotePort: 54321 },
  } as unknown as FastifyRequest
}

describe('logger', () => {
  describe('validLogLevels', () => {
    it('should export all valid pino log levels', () => {
      expect(validLogLevels).toEqual([
        'fatal',
        'error',
        'warn',
        'info',
        'debug',
        'trace',
        'silent',
      ])
    })
  })

  describe('createServiceLogger', () => {
    it('should create a child logger with uppercased service prefix', () => {
      const mockParentLogger = createMockLogger()
      createServiceLogger(mockParentLogger, 'playlist_sync')

      expect(mockParentLogger.child).toHaveBeenCalledWith(
        {},
        { msgPrefix: '[PLAYLIST_SYNC] ' },
      )
    })

    it('should keep uppercase service names as they are', () => {
      const mockParentLogger = createMockLogger()
      createServiceLogger(mockParentLogger, 'SPOTIFY')

      expect(mockParentLogger.child).toHaveBeenCalledWith(
        {},
        { msgPrefix: '[SPOTIFY] ' },
      )
    })
  })

  describe('serializeError', () => {
    it('should pass null and undefined through', () => {
      expect(serializeError(null)).toBeNull()
      expect(serializeError(undefined)).toBeUndefined()
    })

    it('should wrap primitive values with their type', () => {
      expect(serializeError('boom')).toEqual({
        message: 'boom',
        type: 'StringError',
      })
      expect(serializeError(42)).toEqual({ message: '42', type: 'NumberError' })
      expect(serializeError(false)).toEqual({
        message: 'false',
        type: 'BooleanError',
      })
    })

    it('should name the error class of subclasses', () => {
      class SpotifyTimeoutError extends Error {}

      expect(serializeError(new SpotifyTimeoutError('slow'))).toMatchObject({
        message: 'slow',
        type: 'SpotifyTimeoutError',
      })
      expect(serializeError(new RangeError('too many'))).toMatchObject({
        type: 'RangeError',
      })
    })

    it('should drop the stack of client errors only', () => {
      const clientError = Object.assign(new Error('missing'), { statusCode: 404 })
      const serverError = Object.assign(new Error('broken'), { statusCode: 502 })

      expect(serializeError(clientError)).not.toHaveProperty('stack')
      expect(serializeError(serverError)).toHaveProperty('stack')
      expect(serializeError(new Error('plain'))).toHaveProperty('stack')
    })

    it('should serialize the cause chain', () => {
      const root = new Error('socket hang up')
      const error = new Error('Failed to fetch tracks', { cause: root })

      expect(serializeError(error)).toMatchObject({
        message: 'Failed to fetch tracks',
        cause: { message: 'socket hang up', type: 'Error' },
      })
    })

    it('should keep custom enumerable properties', () => {
      const error = Object.assign(new Error('Failed'), {
        childPlaylistId: 3,
        step: 'add',
      })

      expect(serializeError(error)).toMatchObject({
        childPlaylistId: 3,
        step: 'add',
      })
    })

    it('should handle plain objects', () => {
      expect(serializeError({ message: 'odd', name: 'Custom' })).toEqual({
        message: 'odd',
        name: 'Custom',
        type: 'Custom',
      })
    })
  })

  describe('request serializer', () => {
    it('should serialize basic request information', () => {
      const serializer = createLoggerConfig().serializers?.req

      expect(serializer?.(createRequest('/v1/health'))).toEqual({
        method: 'GET',
        url: '/v1/health',
        host: 'localhost:3003',
        remoteAddress: '127.0.0.1',
        remotePort: 54321,
      })
    })

    it('should redact token query parameters', () => {
      const serializer = createLoggerConfig().serializers?.req

      const result = serializer?.(
        createRequest('/v1/users/1/spotify?accessToken=test-token&limit=5'),
      )

      expect(result.url).toBe('/v1/users/1/spotify?accessToken=[REDACTED]&limit=5')
    })

    it('should be case-insensitive for sensitive parameters', () => {
      const serializer = createLoggerConfig().serializers?.req

      const result = serializer?.(createRequest('/v1/test?ACCESS_TOKEN=test-token'))

      expect(result.url).toBe('/v1/test?access_token=[REDACTED]')
    })
  })

  describe('createLoggerConfig', () => {
    it('should use pino-pretty when logging to the terminal', () => {
      const config = createLoggerConfig()

      expect(config.transport).toMatchObject({ target: 'pino-pretty' })
      expect(config.level).toBe('silent')
      expect(config.redact).toContain('*.access_token')
    })
  })
})
