/**
 * Harvester error types and classification.
 *
 * FetchError is fatal for a run but never discards collected records.
 * ConfigError is raised before any network traffic.
 */

import { ZodError } from 'zod'
import type { FetchResultStatus } from '../scraper/types.js'

export const ERROR_CODES = {
  FETCH_FAILED: 'FETCH_FAILED',
  FETCH_TIMEOUT: 'FETCH_TIMEOUT',
  FETCH_TOO_LARGE: 'FETCH_TOO_LARGE',
  INVALID_CONFIG: 'INVALID_CONFIG',
  EXPORT_FAILED: 'EXPORT_FAILED',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export class HarvestError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'HarvestError'
    this.code = code
  }
}

export class FetchError extends HarvestError {
  readonly url: string
  readonly status: Exclude<FetchResultStatus, 'ok'>
  readonly statusCode?: number

  constructor(
    url: string,
    status: Exclude<FetchResultStatus, 'ok'>,
    message: string,
    statusCode?: number
  ) {
    super(fetchStatusToCode(status), message)
    this.name = 'FetchError'
    this.url = url
    this.status = status
    this.statusCode = statusCode
  }
}

export class ConfigError extends HarvestError {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(ERROR_CODES.INVALID_CONFIG, message)
    this.name = 'ConfigError'
    this.issues = issues
  }

  static fromZod(error: ZodError): ConfigError {
    const issues = error.issues.map(issue => {
      const path = issue.path.join('.')
      return path ? `${path}: ${issue.message}` : issue.message
    })
    return new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues)
  }
}

function fetchStatusToCode(status: Exclude<FetchResultStatus, 'ok'>): ErrorCode {
  switch (status) {
    case 'timeout':
      return ERROR_CODES.FETCH_TIMEOUT
    case 'too_large':
      return ERROR_CODES.FETCH_TOO_LARGE
    case 'error':
      return ERROR_CODES.FETCH_FAILED
  }
}

export interface ClassifiedError {
  code: ErrorCode
  message: string
  /** Whether running again later could plausibly succeed */
  retryable: boolean
}

/**
 * Classify an error into a structured format for logging.
 */
export function classifyHarvestError(error: unknown): ClassifiedError {
  if (error instanceof FetchError) {
    return {
      code: error.code,
      message: error.message,
      retryable: error.status === 'timeout' || error.statusCode === undefined || error.statusCode >= 500 || error.statusCode === 429,
    }
  }

  if (error instanceof ZodError) {
    return {
      code: ERROR_CODES.INVALID_CONFIG,
      message: ConfigError.fromZod(error).message,
      retryable: false,
    }
  }

  if (error instanceof HarvestError) {
    return { code: error.code, message: error.message, retryable: false }
  }

  return {
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: error instanceof Error ? error.message : String(error),
    retryable: false,
  }
}
