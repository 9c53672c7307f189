import type { Clock } from '../src/library/clock'
import type { HttpClient, HttpResponse } from '../src/library/httpClient'
import type { Logger } from '../src/library/logger'
import type { Repository } from '../src/library/types'

export const getMockedLogger = () =>
    ({
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    } satisfies Logger)

/** sleeping just moves the time forward */
export const getFakeClock = (startMs = 0) => {
    let now = startMs
    const sleeps: number[] = []
    const clock: Clock = {
        now: () => now,
        async sleep(ms) {
            sleeps.push(ms)
            now += ms
        },
    }
    return { clock, sleeps }
}

export const ok = (body = ''): HttpResponse => ({ statusCode: 200, body, truncated: false })
export const status = (statusCode: number): HttpResponse => ({ statusCode, body: '', truncated: false })

/** Unknown urls reject, so unexpected requests fail the test */
export const getFakeHttp = (responses: Record<string, HttpResponse | Error>) => {
    const requests: string[] = []
    const http: HttpClient = {
        async get(url) {
            requests.push(url)
            const response = responses[url]
            if (response === undefined) throw new Error(`Unexpected request to ${url}`)
            if (response instanceof Error) throw response
            return response
        },
    }
    return { http, requests }
}

export const makeRepositories = (count: number, { prefix = 'repo', isPublic = true, hasWiki = true } = {}): Repository[] =>
    Array.from({ length: count }, (_, i) => ({
        name: `${prefix}-${i}`,
        url: `https://github.com/acme/${prefix}-${i}`,
        hasWiki,
        isPublic,
    }))
