import { Command, InvalidArgumentError } from 'commander'
import { loadConfig, type UserConfig } from './config'
import { createLogger, getErrorMessage } from './logger'
import { createScanDependencies, readLines, scanInputs } from './scan'

export const program = new Command()

type Options = Partial<{
    timeout: number
    maxResponseSize: number
    perPage: number
    maxRateLimitRetries: number
    maxRateLimitWait: number
    config: string
    verbose: boolean
}>

const parseNonNegativeInt = (value: string) => {
    if (!/^\d+$/.test(value)) throw new InvalidArgumentError('Not a non-negative integer.')
    return Number(value)
}

export const optionsToConfig = (options: Options): UserConfig => ({
    requestTimeout: options.timeout,
    maxResponseSize: options.maxResponseSize,
    perPage: options.perPage,
    rateLimit: {
        maxRetries: options.maxRateLimitRetries,
        maxWaitSeconds: options.maxRateLimitWait,
    },
})

program
    .name('open-wiki-scan')
    .description('Find public GitHub repositories whose wiki anyone can edit. Reads accounts from stdin, one per line, when none is given')
    .argument('[account]', 'Account to scan. Prefix with org: or user: to skip the account type detection')
    .option('--timeout <ms>', 'Per-request timeout', parseNonNegativeInt)
    .option('--max-response-size <bytes>', 'Read at most this many bytes of a wiki page', parseNonNegativeInt)
    .option('--per-page <n>', 'Repositories per listing request (max 100)', parseNonNegativeInt)
    .option('--max-rate-limit-retries <n>', 'Give up on an account after waiting for the rate limit this many times', parseNonNegativeInt)
    .option('--max-rate-limit-wait <seconds>', 'Give up on an account after waiting for the rate limit this long in total', parseNonNegativeInt)
    .option('--config <path>', 'Config file. By default wikiscan config is searched from the current directory')
    .option('--verbose', 'Log requests and progress to stderr')
    .action(async (account: string | undefined, options: Options) => {
        const logger = createLogger({ verbose: options.verbose })
        try {
            const { config, filepath } = await loadConfig({ configPath: options.config, overrides: optionsToConfig(options) })
            logger.debug('Using config', filepath ?? '(defaults)', config)
            if (!process.env.GITHUB_TOKEN) logger.debug('GITHUB_TOKEN is not set, using unauthenticated rate limits')
            const dependencies = createScanDependencies(config, logger, { token: process.env.GITHUB_TOKEN })
            const summaries = await scanInputs(account === undefined ? readLines(process.stdin) : [account], dependencies)
            for (const { account: { kind, name }, repositories, findings } of summaries)
                logger.debug(`${kind} ${name}: ${repositories} repositories checked, ${findings} findings`)
        } catch (error_) {
            logger.error(`Error: ${getErrorMessage(error_)}`)
            process.exit(1)
        }
    })
