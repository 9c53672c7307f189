import { cosmiconfig } from 'cosmiconfig'
import { defaultsDeep } from 'lodash'
import type { PartialDeep } from 'type-fest'

export interface Config {
    /** Repositories per listing page. GitHub caps it at 100 */
    perPage: number
    /** Per-request timeout in ms, applies to both the API and the wiki probes */
    requestTimeout: number
    /** Wiki responses are read up to this many bytes */
    maxResponseSize: number
    userAgent: string
    wiki: {
        /** Shown to anyone who can create the first page of an empty wiki */
        firstPageMarker: string
        /** Page that is not expected to exist, relative to the wiki url */
        testPagePath: string
    }
    rateLimit: {
        /** How many times a listing may wait for the rate limit reset. `null` - no limit */
        maxRetries: number | null
        /** Total seconds a listing may spend waiting. `null` - no limit */
        maxWaitSeconds: number | null
    }
}

export type UserConfig = PartialDeep<Config>

export const defaultConfig: Config = {
    perPage: 100,
    requestTimeout: 30_000,
    maxResponseSize: 10 * 1024 * 1024,
    userAgent: 'open-wiki-scan',
    wiki: {
        firstPageMarker: 'Create the first page',
        testPagePath: 'notrealpage',
    },
    rateLimit: {
        maxRetries: null,
        maxWaitSeconds: null,
    },
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'ConfigError'
    }
}

const isPositiveInteger = (value: unknown): value is number => typeof value === 'number' && Number.isInteger(value) && value > 0

export const validateConfig = (config: Config) => {
    if (!isPositiveInteger(config.perPage) || config.perPage > 100) throw new ConfigError(`perPage must be an integer from 1 to 100, got ${String(config.perPage)}`)
    if (!isPositiveInteger(config.requestTimeout)) throw new ConfigError(`requestTimeout must be a positive integer, got ${String(config.requestTimeout)}`)
    if (!isPositiveInteger(config.maxResponseSize)) throw new ConfigError(`maxResponseSize must be a positive integer, got ${String(config.maxResponseSize)}`)
    if (typeof config.userAgent !== 'string' || !config.userAgent) throw new ConfigError('userAgent must be a non-empty string')
    if (typeof config.wiki.firstPageMarker !== 'string' || !config.wiki.firstPageMarker) throw new ConfigError('wiki.firstPageMarker must be a non-empty string')
    if (typeof config.wiki.testPagePath !== 'string' || !config.wiki.testPagePath) throw new ConfigError('wiki.testPagePath must be a non-empty string')
    const { maxRetries, maxWaitSeconds } = config.rateLimit
    if (maxRetries !== null && !(typeof maxRetries === 'number' && Number.isInteger(maxRetries) && maxRetries >= 0))
        throw new ConfigError(`rateLimit.maxRetries must be a non-negative integer or null, got ${String(maxRetries)}`)
    if (maxWaitSeconds !== null && !(typeof maxWaitSeconds === 'number' && maxWaitSeconds >= 0))
        throw new ConfigError(`rateLimit.maxWaitSeconds must be a non-negative number or null, got ${String(maxWaitSeconds)}`)
    return config
}

export interface LoadConfigOptions {
    /** Explicit config file, otherwise searched from `searchFrom` up */
    configPath?: string
    searchFrom?: string
    /** Take precedence over the config file */
    overrides?: UserConfig
}

export const loadConfig = async ({ configPath, searchFrom, overrides = {} }: LoadConfigOptions = {}) => {
    const explorer = cosmiconfig('wikiscan')
    const userConfig = configPath ? await explorer.load(configPath) : await explorer.search(searchFrom)
    const config: Config = defaultsDeep({}, overrides, userConfig?.config ?? {}, defaultConfig)
    return { config: validateConfig(config), filepath: userConfig?.filepath }
}
