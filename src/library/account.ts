import type { GitHubAccountsApi } from './githubApi'
import type { AccountKind, AccountReference, ResolvedAccount } from './types'

const accountPrefixes: AccountKind[] = ['org', 'user']

export class AccountNotFoundError extends Error {
    constructor(readonly accountName: string) {
        super(`account '${accountName}' not found`)
        this.name = 'AccountNotFoundError'
    }
}

/** `org:name`, `user:name` or just `name`. Only the first prefix is stripped: `org:a:b` is org `a:b` */
export const parseAccountInput = (input: string): AccountReference => {
    for (const kind of accountPrefixes) {
        const prefix = `${kind}:`
        if (input.startsWith(prefix)) return { kind, name: input.slice(prefix.length) }
    }

    return { kind: 'unknown', name: input }
}

export const isResolved = (reference: AccountReference): reference is ResolvedAccount => reference.kind !== 'unknown'

/** Organizations are tried first. Only a 404 falls through to users, other errors are rethrown */
export const resolveAccount = async (reference: AccountReference, api: GitHubAccountsApi): Promise<ResolvedAccount> => {
    if (isResolved(reference)) return reference
    const { name } = reference
    for (const kind of accountPrefixes) if (await api.accountExists(kind, name)) return { kind, name }

    throw new AccountNotFoundError(name)
}
