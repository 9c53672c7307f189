import { PassThrough } from 'stream'
import { createHttpClient } from '../src/library/httpClient'

const { stream } = vi.hoisted(() => ({ stream: vi.fn() }))

vi.mock('got', () => ({
    default: { stream },
}))

/** got stream stand-in: emits `response`, then the body */
const respondOnce = (statusCode: number, chunks: string[]) => {
    const request = new PassThrough()
    stream.mockReturnValueOnce(request)
    setImmediate(() => {
        request.emit('response', { statusCode })
        for (const chunk of chunks) request.write(chunk)
        request.end()
    })
    return request
}

const client = createHttpClient({ redirects: 'stop', timeout: 1000, maxResponseSize: 5, userAgent: 'test-agent' })

test('Does not follow redirects or retry', async () => {
    respondOnce(302, [])
    expect(await client.get('https://github.com/acme/docs/wiki/notrealpage')).toEqual({ statusCode: 302, body: '', truncated: false })
    expect(stream).toHaveBeenLastCalledWith('https://github.com/acme/docs/wiki/notrealpage', {
        followRedirect: false,
        throwHttpErrors: false,
        retry: 0,
        timeout: { request: 1000 },
        headers: { 'user-agent': 'test-agent' },
    })
})

test('Reads the whole body under the limit', async () => {
    respondOnce(200, ['ab', 'c'])
    expect(await client.get('https://github.com/acme/docs/wiki')).toEqual({ statusCode: 200, body: 'abc', truncated: false })
})

test('Cuts the body at the limit', async () => {
    const request = respondOnce(200, ['abc', 'defg'])
    expect(await client.get('https://github.com/acme/docs/wiki')).toEqual({ statusCode: 200, body: 'abcde', truncated: true })
    expect(request.destroyed).toBe(true)
})

test('Rejects on errors before the response', async () => {
    const request = new PassThrough()
    stream.mockReturnValueOnce(request)
    setImmediate(() => request.destroy(new Error('getaddrinfo ENOTFOUND github.com')))
    await expect(client.get('https://github.com/acme/docs/wiki')).rejects.toThrow('getaddrinfo ENOTFOUND github.com')
})

test('Follows redirects when asked to', async () => {
    respondOnce(200, [])
    await createHttpClient({ redirects: 'follow', timeout: 1000, maxResponseSize: 5 }).get('https://github.com/acme')
    expect(stream).toHaveBeenLastCalledWith('https://github.com/acme', expect.objectContaining({ followRedirect: true, headers: {} }))
})
