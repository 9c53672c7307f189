import { parseAccountInput, resolveAccount } from './account'
import { type Clock, systemClock } from './clock'
import type { Config } from './config'
import { createOctokit, type GitHubAccountsApi, OctokitAccountsApi } from './githubApi'
import { createHttpClient, type HttpClient } from './httpClient'
import { getErrorMessage, type Logger } from './logger'
import { listPublicRepositories } from './repositories'
import type { Repository, ResolvedAccount, WikiFinding } from './types'
import { checkWiki, formatFinding } from './wikiProbe'

export interface ScanDependencies {
    api: GitHubAccountsApi
    http: HttpClient
    clock: Clock
    logger: Logger
    config: Config
    report: (finding: WikiFinding) => void
}

export interface ScanSummary {
    account: ResolvedAccount
    repositories: number
    findings: number
}

/** Skipped accounts are logged and resolve `undefined`, they never reject */
export const scanAccount = async (input: string, dependencies: ScanDependencies): Promise<ScanSummary | undefined> => {
    const { api, http, clock, logger, config } = dependencies
    const reference = parseAccountInput(input)
    if (!reference.name) {
        logger.error('Account name cannot be empty')
        return undefined
    }

    let account: ResolvedAccount
    try {
        account = await resolveAccount(reference, api)
    } catch (error) {
        logger.error(`Error detecting account type: ${getErrorMessage(error)}`)
        return undefined
    }

    let repositories: Repository[]
    try {
        repositories = await listPublicRepositories(account, { api, clock, logger, perPage: config.perPage, rateLimit: config.rateLimit })
    } catch (error) {
        logger.error(`Error fetching repositories: ${getErrorMessage(error)}`)
        return undefined
    }

    logger.debug(`Checking ${repositories.length} public repositories of ${account.kind} ${account.name}`)
    let findings = 0
    const report = (finding: WikiFinding) => {
        findings++
        dependencies.report(finding)
    }

    for (const repository of repositories) await checkWiki(repository, { http, logger, report, wiki: config.wiki })

    return { account, repositories: repositories.length, findings }
}

/** One account at a time, in input order */
export const scanInputs = async (inputs: Iterable<string> | AsyncIterable<string>, dependencies: ScanDependencies) => {
    const summaries: ScanSummary[] = []
    for await (const input of inputs) {
        const summary = await scanAccount(input.trim(), dependencies)
        if (summary) summaries.push(summary)
    }

    return summaries
}

/** Lines of a text stream, `\n` or `\r\n` separated. Stream errors reject */
export async function* readLines(input: NodeJS.ReadableStream): AsyncGenerator<string> {
    input.setEncoding('utf8')
    let buffered = ''
    for await (const chunk of input) {
        buffered += String(chunk)
        const lines = buffered.split(/\r?\n/)
        buffered = lines.pop() ?? ''
        yield* lines
    }

    if (buffered) yield buffered
}

export const printFinding = (finding: WikiFinding) => console.log(formatFinding(finding))

export const createScanDependencies = (config: Config, logger: Logger, { token }: { token?: string } = {}): ScanDependencies => ({
    api: new OctokitAccountsApi(createOctokit({ token, userAgent: config.userAgent, requestTimeout: config.requestTimeout, logger })),
    http: createHttpClient({
        redirects: 'stop',
        timeout: config.requestTimeout,
        maxResponseSize: config.maxResponseSize,
        userAgent: config.userAgent,
    }),
    clock: systemClock,
    logger,
    config,
    report: printFinding,
})
