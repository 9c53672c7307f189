export type AccountKind = 'org' | 'user'
export type AccountInputKind = AccountKind | 'unknown'

export type AccountReference<K extends AccountInputKind = AccountInputKind> = {
    kind: K
    name: string
}
export type ResolvedAccount = AccountReference<AccountKind>

export interface Repository {
    name: string
    /** html url, e.g. https://github.com/owner/repo */
    url: string
    hasWiki: boolean
    isPublic: boolean
}

export interface RateLimit {
    remaining: number
    /** unix time in seconds */
    reset: number
}

export type WikiFindingKind = 'firstpage' | 'writeable'

export interface WikiFinding {
    kind: WikiFindingKind
    repository: string
    url: string
}
