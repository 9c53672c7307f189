import type { Clock } from './clock'
import type { Config } from './config'
import { type GitHubAccountsApi, GitHubApiError, type RepositoryPage } from './githubApi'
import type { Logger } from './logger'
import type { RateLimit, Repository, ResolvedAccount } from './types'

export class RateLimitExceededError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'RateLimitExceededError'
    }
}

type RateLimitPolicy = Config['rateLimit']

/** Sleeps until the window resets, counting waits against the policy caps */
export const createRateLimitWaiter = (clock: Clock, logger: Logger, { maxRetries, maxWaitSeconds }: RateLimitPolicy) => {
    let waits = 0
    let waitedMs = 0
    return {
        async waitForReset({ reset }: RateLimit) {
            if (maxRetries !== null && waits >= maxRetries) throw new RateLimitExceededError(`Rate limit reached and ${maxRetries} waits are already used`)
            waits++
            const waitMs = reset * 1000 - clock.now()
            if (waitMs <= 0) return
            if (maxWaitSeconds !== null && waitedMs + waitMs > maxWaitSeconds * 1000)
                throw new RateLimitExceededError(`Rate limit reached, waiting ${Math.ceil(waitMs / 1000)} more seconds would exceed ${maxWaitSeconds} seconds`)
            waitedMs += waitMs
            logger.warn(`Rate limit reached. Waiting ${Math.ceil(waitMs / 1000)} seconds...`)
            await clock.sleep(waitMs)
        },
    }
}

export interface ListRepositoriesOptions {
    api: GitHubAccountsApi
    clock: Clock
    logger: Logger
    perPage?: number
    rateLimit?: RateLimitPolicy
}

const isRateLimited = (rateLimit: RateLimit | undefined): rateLimit is RateLimit => rateLimit?.remaining === 0

/** All public repositories of the account, in the order GitHub lists them */
export const listPublicRepositories = async (
    account: ResolvedAccount,
    { api, clock, logger, perPage = 100, rateLimit = { maxRetries: null, maxWaitSeconds: null } }: ListRepositoriesOptions,
) => {
    const waiter = createRateLimitWaiter(clock, logger, rateLimit)
    const repositories: Repository[] = []
    let page = 1
    // eslint-disable-next-line no-constant-condition
    while (true) {
        let result: RepositoryPage
        try {
            result = await api.listRepositories(account, page, perPage)
        } catch (error) {
            // same page is requested again after the reset
            if (error instanceof GitHubApiError && isRateLimited(error.rateLimit)) {
                await waiter.waitForReset(error.rateLimit)
                continue
            }

            throw error
        }

        logger.debug(`Fetched page ${page} of ${account.kind} ${account.name}: ${result.repositories.length} repositories`)
        repositories.push(...result.repositories.filter(({ isPublic }) => isPublic))
        if (isRateLimited(result.rateLimit)) await waiter.waitForReset(result.rateLimit)
        if (result.nextPage === undefined) break
        page = result.nextPage
    }

    return repositories
}
