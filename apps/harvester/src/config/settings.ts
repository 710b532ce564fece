/**
 * Run settings.
 *
 * Precedence: CLI flag, then HARVEST_* environment variable, then default.
 * Validated with zod; any problem surfaces as a ConfigError before the
 * first request is made.
 */

import { z } from 'zod'
import { ConfigError } from '../lib/errors.js'
import { DEFAULT_PAGE_SIZE } from '../scraper/paginate/planner.js'

export const DEFAULT_DOI = '10.1021/jacsau.4c01276'
export const DEFAULT_BASE_URL = 'https://kmt.vander-lingen.nl'

export const DEFAULT_SETTINGS = {
  doi: DEFAULT_DOI,
  baseUrl: DEFAULT_BASE_URL,
  maxPages: 20,
  delayMinSeconds: 0.5,
  delayMaxSeconds: 1.5,
  pageSize: DEFAULT_PAGE_SIZE,
  output: 'kmt_reactions.json',
  timeoutMs: 30000,
} as const

const settingsSchema = z
  .object({
    doi: z.string().trim().min(1, 'DOI must not be empty'),
    baseUrl: z.string().url(),
    maxPages: z.coerce.number().int().positive(),
    delayMinSeconds: z.coerce.number().nonnegative(),
    delayMaxSeconds: z.coerce.number().nonnegative(),
    pageSize: z.coerce.number().int().positive(),
    output: z.string().trim().min(1),
    csvOutput: z.string().trim().min(1).optional(),
    timeoutMs: z.coerce.number().int().positive(),
    recordProvenance: z.boolean(),
    productPolicy: z.enum(['reject-empty-products', 'accept-any']),
  })
  .refine(settings => settings.delayMinSeconds <= settings.delayMaxSeconds, {
    message: 'must not exceed delayMaxSeconds',
    path: ['delayMinSeconds'],
  })

export type HarvestSettings = z.infer<typeof settingsSchema>

/**
 * Values supplied on the command line. Strings are coerced and validated
 * the same way as environment values.
 */
export interface SettingsOverrides {
  doi?: string
  baseUrl?: string
  maxPages?: string | number
  delayMinSeconds?: string | number
  delayMaxSeconds?: string | number
  pageSize?: string | number
  output?: string
  csvOutput?: string
  timeoutMs?: string | number
  recordProvenance?: boolean
  acceptEmptyProducts?: boolean
}

type Env = Record<string, string | undefined>

function fromEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim()
  return value ? value : undefined
}

function isTruthy(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true'
}

export function loadSettings(overrides: SettingsOverrides = {}, env: Env = process.env): HarvestSettings {
  const acceptEmptyProducts =
    overrides.acceptEmptyProducts ?? isTruthy(fromEnv(env, 'HARVEST_ACCEPT_EMPTY_PRODUCTS'))

  const raw = {
    doi: overrides.doi ?? fromEnv(env, 'HARVEST_DOI') ?? DEFAULT_SETTINGS.doi,
    baseUrl: overrides.baseUrl ?? fromEnv(env, 'HARVEST_BASE_URL') ?? DEFAULT_SETTINGS.baseUrl,
    maxPages: overrides.maxPages ?? fromEnv(env, 'HARVEST_MAX_PAGES') ?? DEFAULT_SETTINGS.maxPages,
    delayMinSeconds:
      overrides.delayMinSeconds ??
      fromEnv(env, 'HARVEST_DELAY_MIN_SECONDS') ??
      DEFAULT_SETTINGS.delayMinSeconds,
    delayMaxSeconds:
      overrides.delayMaxSeconds ??
      fromEnv(env, 'HARVEST_DELAY_MAX_SECONDS') ??
      DEFAULT_SETTINGS.delayMaxSeconds,
    pageSize: overrides.pageSize ?? fromEnv(env, 'HARVEST_PAGE_SIZE') ?? DEFAULT_SETTINGS.pageSize,
    output: overrides.output ?? fromEnv(env, 'HARVEST_OUTPUT') ?? DEFAULT_SETTINGS.output,
    csvOutput: overrides.csvOutput ?? fromEnv(env, 'HARVEST_CSV_OUTPUT'),
    timeoutMs: overrides.timeoutMs ?? fromEnv(env, 'HARVEST_TIMEOUT_MS') ?? DEFAULT_SETTINGS.timeoutMs,
    recordProvenance:
      overrides.recordProvenance ?? isTruthy(fromEnv(env, 'HARVEST_RECORD_PROVENANCE')),
    productPolicy: acceptEmptyProducts ? 'accept-any' : 'reject-empty-products',
  }

  const parsed = settingsSchema.safeParse(raw)
  if (!parsed.success) {
    throw ConfigError.fromZod(parsed.error)
  }
  return parsed.data
}
