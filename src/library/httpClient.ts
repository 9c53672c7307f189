import got, { type Response } from 'got'

export interface HttpResponse {
    statusCode: number
    body: string
    /** body was cut at `maxResponseSize` */
    truncated: boolean
}

export interface HttpClient {
    get(url: string): Promise<HttpResponse>
}

export interface HttpClientOptions {
    /** `stop` returns the first 3xx response as is, without following `location` */
    redirects: 'follow' | 'stop'
    /** ms */
    timeout: number
    /** bytes */
    maxResponseSize: number
    userAgent?: string
}

/** Single-attempt client: no retries and a bounded body */
export const createHttpClient = ({ redirects, timeout, maxResponseSize, userAgent }: HttpClientOptions): HttpClient => ({
    async get(url) {
        const request = got.stream(url, {
            followRedirect: redirects === 'follow',
            throwHttpErrors: false,
            retry: 0,
            timeout: { request: timeout },
            headers: userAgent ? { 'user-agent': userAgent } : {},
        })
        const response = await new Promise<Response>((resolve, reject) => {
            request.once('response', resolve)
            request.once('error', reject)
        })
        const chunks: Buffer[] = []
        let size = 0
        let truncated = false
        for await (const chunk of request) {
            const data: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))
            if (size + data.length > maxResponseSize) {
                chunks.push(data.subarray(0, maxResponseSize - size))
                truncated = true
                break
            }

            chunks.push(data)
            size += data.length
        }

        if (truncated) request.destroy()
        return {
            statusCode: response.statusCode,
            body: Buffer.concat(chunks).toString('utf8'),
            truncated,
        }
    },
})
