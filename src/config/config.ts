/**
 * Engine configuration and environment loading
 * @module config/config
 */

import { ConfigurationError } from '../utils/errors.js'
import { LOG_LEVELS, type LogLevel } from '../utils/logger.js'

/**
 * What happens to a TeacherProgress row whose teacher is absent from a newly
 * imported roster.
 */
export type RosterRemovalPolicy = 'soft-delete' | 'hard-remove' | 'flag-only'

export const ROSTER_REMOVAL_POLICIES: readonly RosterRemovalPolicy[] = [
  'soft-delete',
  'hard-remove',
  'flag-only',
]

/**
 * ZIP prefix lists used by local-volunteer status derivation
 */
export interface LocalityConfig {
  /** Prefixes counted as the metro area (`local`) */
  metroZipPrefixes: readonly string[]
  /** Prefixes counted as the wider region (`partial`) */
  regionalZipPrefixes: readonly string[]
}

export interface EngineConfig {
  /** Directory holding SQLite store files */
  dataDir: string
  /** Minimum similarity (0-1) for fuzzy roster name matches */
  fuzzyThreshold: number
  rosterRemovalPolicy: RosterRemovalPolicy
  /** When set, Pathful rows whose partner column differs are skipped */
  pathfulPartnerFilter?: string
  /** Minutes subtracted from a delta sync watermark */
  deltaSyncBufferMinutes: number
  logLevel: LogLevel
  locality: LocalityConfig
  /** Report cache bounds */
  cache: {
    maxSize: number
    ttlSeconds: number
  }
}

export const DEFAULT_LOCALITY: LocalityConfig = {
  metroZipPrefixes: ['640', '641', '660', '661', '664', '665', '666'],
  regionalZipPrefixes: ['644', '645', '646', '670', '671', '672', '673', '674'],
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  dataDir: './data',
  fuzzyThreshold: 0.85,
  rosterRemovalPolicy: 'soft-delete',
  deltaSyncBufferMinutes: 60,
  logLevel: 'info',
  locality: DEFAULT_LOCALITY,
  cache: {
    maxSize: 1000,
    ttlSeconds: 3600,
  },
}

export type EnvSource = Record<string, string | undefined>

function parseThreshold(raw: string): number {
  const value = Number(raw)
  if (raw.trim() === '' || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigurationError(
      `POLARIS_FUZZY_THRESHOLD must be a number between 0 and 1, got '${raw}'`,
      'fuzzyThreshold',
      { value: raw }
    )
  }
  return value
}

function parseMinutes(raw: string): number {
  const value = Number(raw)
  if (raw.trim() === '' || !Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(
      `POLARIS_DELTA_SYNC_BUFFER_MINUTES must be a whole number of minutes, got '${raw}'`,
      'deltaSyncBufferMinutes',
      { value: raw }
    )
  }
  return value
}

function parseChoice<T extends string>(
  raw: string,
  choices: readonly T[],
  variable: string,
  field: string
): T {
  const match = choices.find((choice) => choice === raw.trim().toLowerCase())
  if (!match) {
    throw new ConfigurationError(
      `${variable} must be one of ${choices.join(', ')}, got '${raw}'`,
      field,
      { value: raw }
    )
  }
  return match
}

/**
 * Builds an {@link EngineConfig} from `POLARIS_*` environment variables,
 * falling back to {@link DEFAULT_ENGINE_CONFIG} for anything unset.
 *
 * @throws {ConfigurationError} when a variable is present but invalid
 */
export function loadConfig(
  env: EnvSource = process.env,
  overrides: Partial<EngineConfig> = {}
): EngineConfig {
  const config: EngineConfig = {
    ...DEFAULT_ENGINE_CONFIG,
    locality: { ...DEFAULT_LOCALITY },
    cache: { ...DEFAULT_ENGINE_CONFIG.cache },
  }

  const dataDir = env.POLARIS_DATA_DIR
  if (dataDir !== undefined) {
    if (dataDir.trim() === '') {
      throw new ConfigurationError('POLARIS_DATA_DIR must not be empty', 'dataDir')
    }
    config.dataDir = dataDir
  }

  const threshold = env.POLARIS_FUZZY_THRESHOLD
  if (threshold !== undefined) {
    config.fuzzyThreshold = parseThreshold(threshold)
  }

  const policy = env.POLARIS_ROSTER_REMOVAL_POLICY
  if (policy !== undefined) {
    config.rosterRemovalPolicy = parseChoice(
      policy,
      ROSTER_REMOVAL_POLICIES,
      'POLARIS_ROSTER_REMOVAL_POLICY',
      'rosterRemovalPolicy'
    )
  }

  const partner = env.POLARIS_PATHFUL_PARTNER_FILTER
  if (partner !== undefined && partner.trim() !== '') {
    config.pathfulPartnerFilter = partner.trim()
  }

  const buffer = env.POLARIS_DELTA_SYNC_BUFFER_MINUTES
  if (buffer !== undefined) {
    config.deltaSyncBufferMinutes = parseMinutes(buffer)
  }

  const level = env.POLARIS_LOG_LEVEL
  if (level !== undefined) {
    config.logLevel = parseChoice(level, LOG_LEVELS, 'POLARIS_LOG_LEVEL', 'logLevel')
  }

  return { ...config, ...overrides }
}
