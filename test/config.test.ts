import { join } from 'path'
import { ConfigError, defaultConfig, loadConfig, validateConfig } from '../src/library/config'
import { optionsToConfig } from '../src/library/main'

const fixture = join(__dirname, 'fixtures/wikiscan.json')

test('Config file is merged over the defaults', async () => {
    const { config, filepath } = await loadConfig({ configPath: fixture })
    expect(filepath).toBe(fixture)
    expect(config).toEqual({
        ...defaultConfig,
        perPage: 50,
        wiki: { firstPageMarker: 'Create the first page', testPagePath: 'missing-page' },
        rateLimit: { maxRetries: 3, maxWaitSeconds: null },
    })
})

test('Options take precedence over the config file', async () => {
    const { config } = await loadConfig({ configPath: fixture, overrides: optionsToConfig({ perPage: 20, maxRateLimitWait: 600, timeout: 5000 }) })
    expect(config.perPage).toBe(20)
    expect(config.requestTimeout).toBe(5000)
    expect(config.rateLimit).toEqual({ maxRetries: 3, maxWaitSeconds: 600 })
    expect(config.wiki.testPagePath).toBe('missing-page')
})

test('Defaults are not mutated', async () => {
    await loadConfig({ configPath: fixture, overrides: { perPage: 10 } })
    expect(defaultConfig.perPage).toBe(100)
    expect(defaultConfig.rateLimit.maxRetries).toBeNull()
})

test('Invalid values are rejected', () => {
    expect(() => validateConfig({ ...defaultConfig, perPage: 101 })).toThrow(new ConfigError('perPage must be an integer from 1 to 100, got 101'))
    expect(() => validateConfig({ ...defaultConfig, requestTimeout: 0 })).toThrow('requestTimeout must be a positive integer, got 0')
    expect(() => validateConfig({ ...defaultConfig, wiki: { ...defaultConfig.wiki, testPagePath: '' } })).toThrow('wiki.testPagePath must be a non-empty string')
    expect(() => validateConfig({ ...defaultConfig, rateLimit: { maxRetries: -1, maxWaitSeconds: null } })).toThrow(
        'rateLimit.maxRetries must be a non-negative integer or null, got -1',
    )
    expect(validateConfig({ ...defaultConfig, rateLimit: { maxRetries: 0, maxWaitSeconds: 0 } }).rateLimit).toEqual({ maxRetries: 0, maxWaitSeconds: 0 })
})
