import { describe, it, expect } from 'vitest'
import { DEFAULT_ENGINE_CONFIG, DEFAULT_LOCALITY, loadConfig } from '../../../src/config/config.js'
import { ConfigurationError } from '../../../src/utils/errors.js'

describe('loadConfig', () => {
  it('returns the defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_ENGINE_CONFIG)
  })

  it('does not share the default locality and cache objects', () => {
    const config = loadConfig({})
    expect(config.locality).not.toBe(DEFAULT_LOCALITY)
    expect(config.cache).not.toBe(DEFAULT_ENGINE_CONFIG.cache)
  })

  it('reads every variable', () => {
    const config = loadConfig({
      POLARIS_DATA_DIR: '/var/lib/polaris',
      POLARIS_FUZZY_THRESHOLD: '0.9',
      POLARIS_ROSTER_REMOVAL_POLICY: ' Flag-Only ',
      POLARIS_PATHFUL_PARTNER_FILTER: '  Prep KC ',
      POLARIS_DELTA_SYNC_BUFFER_MINUTES: '15',
      POLARIS_LOG_LEVEL: 'DEBUG',
    })

    expect(config).toMatchObject({
      dataDir: '/var/lib/polaris',
      fuzzyThreshold: 0.9,
      rosterRemovalPolicy: 'flag-only',
      pathfulPartnerFilter: 'Prep KC',
      deltaSyncBufferMinutes: 15,
      logLevel: 'debug',
    })
  })

  it('rejects a negative or fractional delta sync buffer', () => {
    expect(loadConfig({}).deltaSyncBufferMinutes).toBe(60)
    expect(() => loadConfig({ POLARIS_DELTA_SYNC_BUFFER_MINUTES: '-5' })).toThrow(
      "POLARIS_DELTA_SYNC_BUFFER_MINUTES must be a whole number of minutes, got '-5'"
    )
    expect(() => loadConfig({ POLARIS_DELTA_SYNC_BUFFER_MINUTES: '1.5' })).toThrow(
      ConfigurationError
    )
  })

  it('ignores a blank partner filter', () => {
    expect(loadConfig({ POLARIS_PATHFUL_PARTNER_FILTER: '  ' }).pathfulPartnerFilter).toBeUndefined()
  })

  it('rejects a threshold outside 0 to 1', () => {
    expect(() => loadConfig({ POLARIS_FUZZY_THRESHOLD: '1.5' })).toThrow(
      "POLARIS_FUZZY_THRESHOLD must be a number between 0 and 1, got '1.5'"
    )
    expect(() => loadConfig({ POLARIS_FUZZY_THRESHOLD: '' })).toThrow(ConfigurationError)
    expect(() => loadConfig({ POLARIS_FUZZY_THRESHOLD: 'high' })).toThrow(ConfigurationError)
  })

  it('rejects an unknown removal policy', () => {
    expect(() => loadConfig({ POLARIS_ROSTER_REMOVAL_POLICY: 'delete' })).toThrow(
      "POLARIS_ROSTER_REMOVAL_POLICY must be one of soft-delete, hard-remove, flag-only, got 'delete'"
    )
  })

  it('rejects an unknown log level and names the field', () => {
    try {
      loadConfig({ POLARIS_LOG_LEVEL: 'verbose' })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      if (error instanceof ConfigurationError) {
        expect(error.message).toBe(
          "POLARIS_LOG_LEVEL must be one of debug, info, warn, error, silent, got 'verbose'"
        )
        expect(error.field).toBe('logLevel')
      }
    }
  })

  it('rejects an empty data directory', () => {
    expect(() => loadConfig({ POLARIS_DATA_DIR: ' ' })).toThrow('POLARIS_DATA_DIR must not be empty')
  })

  it('applies overrides last', () => {
    const config = loadConfig({ POLARIS_FUZZY_THRESHOLD: '0.7' }, { fuzzyThreshold: 0.95 })
    expect(config.fuzzyThreshold).toBe(0.95)
  })
})
