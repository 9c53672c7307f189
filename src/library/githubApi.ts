import { Octokit } from '@octokit/rest'
import { getErrorMessage, type Logger } from './logger'
import type { AccountKind, RateLimit, Repository, ResolvedAccount } from './types'

type Headers = Record<string, string | number | undefined>

export interface RepositoryPage {
    repositories: Repository[]
    /** undefined - this was the last page */
    nextPage: number | undefined
    rateLimit: RateLimit | undefined
}

/** What the scanner needs from GitHub */
export interface GitHubAccountsApi {
    /** Resolves `false` only when GitHub answers 404, any other failure rejects */
    accountExists(kind: AccountKind, name: string): Promise<boolean>
    /** Rejects with `GitHubApiError` */
    listRepositories(account: ResolvedAccount, page: number, perPage: number): Promise<RepositoryPage>
}

export class GitHubApiError extends Error {
    constructor(
        message: string,
        readonly status: number | undefined,
        readonly rateLimit: RateLimit | undefined,
        options?: { cause?: unknown },
    ) {
        super(message, options)
        this.name = 'GitHubApiError'
    }
}

export const readRateLimit = (headers: Headers): RateLimit | undefined => {
    const rawRemaining = headers['x-ratelimit-remaining']
    const rawReset = headers['x-ratelimit-reset']
    if (rawRemaining === undefined || rawReset === undefined) return undefined
    const remaining = Number(rawRemaining)
    const reset = Number(rawReset)
    if (Number.isNaN(remaining) || Number.isNaN(reset)) return undefined
    return { remaining, reset }
}

/** Page number from the `rel="next"` entry of a `link` header */
export const parseNextPage = (link: string | number | undefined) => {
    if (typeof link !== 'string') return undefined
    for (const entry of link.split(',')) {
        const match = /<([^>]+)>\s*;\s*rel="next"/.exec(entry)
        if (!match) continue
        const page = new URL(match[1], 'https://api.github.com').searchParams.get('page')
        return page && /^\d+$/.test(page) ? Number(page) : undefined
    }

    return undefined
}

// octokit's RequestError is checked structurally so a duplicated @octokit/request-error doesn't break instanceof
export const getRequestErrorStatus = (error: unknown) => (error instanceof Error && 'status' in error && typeof error.status === 'number' ? error.status : undefined)

const getRequestErrorHeaders = (error: unknown): Headers => {
    if (!(error instanceof Error) || !('response' in error)) return {}
    const { response } = error
    if (typeof response !== 'object' || response === null || !('headers' in response)) return {}
    const { headers } = response
    if (typeof headers !== 'object' || headers === null) return {}
    return Object.fromEntries(Object.entries(headers))
}

const toApiError = (error: unknown, context: string) => {
    const status = getRequestErrorStatus(error)
    return new GitHubApiError(`${context}: ${getErrorMessage(error)}`, status, readRateLimit(getRequestErrorHeaders(error)), { cause: error })
}

type RepositoryListItem = {
    name: string
    html_url: string
    has_wiki?: boolean
    private: boolean
}

const toRepository = (item: RepositoryListItem): Repository => ({
    name: item.name,
    url: item.html_url,
    hasWiki: item.has_wiki ?? false,
    isPublic: !item.private,
})

export class OctokitAccountsApi implements GitHubAccountsApi {
    constructor(private readonly octokit: Octokit) {}

    async accountExists(kind: AccountKind, name: string) {
        try {
            if (kind === 'org') await this.octokit.orgs.get({ org: name })
            else await this.octokit.users.getByUsername({ username: name })
            return true
        } catch (error) {
            if (getRequestErrorStatus(error) === 404) return false
            throw toApiError(error, `Failed to look up ${kind} ${name}`)
        }
    }

    async listRepositories({ kind, name }: ResolvedAccount, page: number, perPage: number): Promise<RepositoryPage> {
        try {
            const { data, headers } =
                kind === 'org'
                    ? await this.octokit.repos.listForOrg({ org: name, per_page: perPage, page })
                    : await this.octokit.repos.listForUser({ username: name, per_page: perPage, page })
            const items: RepositoryListItem[] = data
            return {
                repositories: items.map(toRepository),
                nextPage: parseNextPage(headers.link),
                rateLimit: readRateLimit(headers),
            }
        } catch (error) {
            throw toApiError(error, `Failed to list repositories of ${kind} ${name} (page ${page})`)
        }
    }
}

export interface CreateOctokitOptions {
    /** Sent as is, e.g. from GITHUB_TOKEN */
    token?: string
    userAgent?: string
    /** ms */
    requestTimeout?: number
    logger: Logger
}

export const createOctokit = ({ token, userAgent, requestTimeout, logger }: CreateOctokitOptions) =>
    new Octokit({
        auth: token || undefined,
        userAgent,
        request: {
            timeout: requestTimeout,
        },
        log: {
            debug: logger.debug,
            info: logger.info,
            warn: logger.warn,
            error: logger.error,
        },
    })
