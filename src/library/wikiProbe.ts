import urlJoin from 'url-join'
import { type Config, defaultConfig } from './config'
import type { HttpClient, HttpResponse } from './httpClient'
import { getErrorMessage, type Logger } from './logger'
import type { Repository, WikiFinding } from './types'

export interface WikiProbeContext {
    /** Must not follow redirects: the login redirect is the negative answer */
    http: HttpClient
    logger: Logger
    report: (finding: WikiFinding) => void
    wiki?: Config['wiki']
}

export const formatFinding = ({ kind, repository, url }: WikiFinding) => `Vulnerable [${kind}]: ${repository} - ${url}`

const isValidUrl = (url: string) => {
    try {
        new URL(url)
        return true
    } catch {
        return false
    }
}

/**
 * Reports the wiki as writable when either
 * - it has no pages yet and anyone is offered to create the first one, or
 * - a page that doesn't exist answers 200 instead of redirecting to login
 */
export const checkWiki = async (repository: Repository, { http, logger, report, wiki = defaultConfig.wiki }: WikiProbeContext): Promise<void> => {
    if (!repository.hasWiki) return
    if (!isValidUrl(repository.url)) {
        logger.error(`Invalid repository URL ${repository.url}`)
        return
    }

    const wikiUrl = urlJoin(repository.url, 'wiki')
    let wikiPage: HttpResponse
    try {
        wikiPage = await http.get(wikiUrl)
    } catch (error) {
        logger.error(`Error accessing wiki for ${repository.name}: ${getErrorMessage(error)}`)
        return
    }

    logger.debug(`${wikiUrl} - ${wikiPage.statusCode}`)
    if (wikiPage.statusCode !== 200) return
    if (wikiPage.body.includes(wiki.firstPageMarker)) {
        report({ kind: 'firstpage', repository: repository.name, url: wikiUrl })
        return
    }

    const testUrl = urlJoin(wikiUrl, wiki.testPagePath)
    let testPage: HttpResponse
    try {
        testPage = await http.get(testUrl)
    } catch (error) {
        logger.error(`Error testing wiki writeability for ${repository.name}: ${getErrorMessage(error)}`)
        return
    }

    logger.debug(`${testUrl} - ${testPage.statusCode}`)
    if (testPage.statusCode === 200) report({ kind: 'writeable', repository: repository.name, url: testUrl })
}
