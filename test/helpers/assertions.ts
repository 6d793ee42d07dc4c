import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import type { LightMyRequestResponse } from 'fastify'
import { expect } from 'vitest'

/**
 * Helper to assert validation errors in API responses
 *
 * @param statusCode - The HTTP status code from the response
 * @param payload - The response payload as a JSON string
 * @param expectedMessage - The expected error message (or substring)
 */
export function expectValidationError(
  statusCode: number,
  payload: string,
  expectedMessage: string,
) {
  expect(statusCode).toBe(400)
  const body: ErrorResponse = JSON.parse(payload)
  expect(body.error).toBe('Bad Request')
  expect(body.message).toContain(expectedMessage)
}

/**
 * Asserts the shared error payload of a failed request
 */
export function expectErrorResponse(
  response: LightMyRequestResponse,
  statusCode: number,
  message: string,
) {
  expect(response.statusCode).toBe(statusCode)
  expect(response.json<ErrorResponse>()).toMatchObject({ statusCode, message })
}
