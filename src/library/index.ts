export type * from './types'
export { AccountNotFoundError, parseAccountInput, resolveAccount } from './account'
export type { Clock } from './clock'
export { systemClock } from './clock'
export type { Config, UserConfig } from './config'
export { ConfigError, defaultConfig, loadConfig } from './config'
export type { GitHubAccountsApi, RepositoryPage } from './githubApi'
export { createOctokit, GitHubApiError, OctokitAccountsApi } from './githubApi'
export type { HttpClient, HttpClientOptions, HttpResponse } from './httpClient'
export { createHttpClient } from './httpClient'
export type { Logger } from './logger'
export { createLogger } from './logger'
export { listPublicRepositories, RateLimitExceededError } from './repositories'
export type { ScanDependencies, ScanSummary } from './scan'
export { createScanDependencies, readLines, scanAccount, scanInputs } from './scan'
export { checkWiki, formatFinding } from './wikiProbe'
