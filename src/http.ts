import { gotScraping } from 'crawlee';

import { TransportError } from './errors.js';

export interface HttpRequest {
    headers?: Record<string, string>;
    timeoutMs: number;
}

export interface HttpResponse {
    statusCode: number;
    body: string;
}

export type HttpClient = (url: string, request: HttpRequest) => Promise<HttpResponse>;

/**
 * Plain GET through got-scraping. Retries are switched off here: callers wrap requests in `withRetry`
 * so that every call site follows the same backoff policy.
 */
export const gotHttpClient: HttpClient = async (url, { headers, timeoutMs }) => {
    const { statusCode, body } = (await gotScraping({
        url,
        headers,
        responseType: 'text',
        throwHttpErrors: false,
        followRedirect: true,
        timeout: { request: timeoutMs },
        retry: { limit: 0 },
    })) as { statusCode: number; body: string };

    return { statusCode, body };
};

export const assertOk = (response: HttpResponse, url: string): HttpResponse => {
    if (response.statusCode < 200 || response.statusCode >= 300) {
        throw new TransportError(`HTTP ${response.statusCode} for ${url}`, url, response.statusCode);
    }
    return response;
};

export const parseJson = (body: string, url: string): unknown => {
    try {
        return JSON.parse(body) as unknown;
    } catch {
        throw new TransportError(`Response from ${url} is not valid JSON`, url);
    }
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);
