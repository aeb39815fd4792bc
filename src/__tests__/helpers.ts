import { log } from 'apify';

import { createRunContext, type RunContext } from '../context.js';
import type { HttpClient, HttpResponse } from '../http.js';
import type { StorageOpeners, TableIndex } from '../sink.js';
import type { Row, SearchListing } from '../types.js';

log.setLevel(log.LEVELS.OFF);

export const FIXED_NOW = new Date(2026, 9, 19, 9, 30); // Monday 2026-10-19

export const TEST_POLICY = { baseDelayMs: 1_000, multiplier: 2, maxDelayMs: 8_000, maxAttempts: 3 };

export const ok = (body: string): HttpResponse => ({ statusCode: 200, body });

export type Route = HttpResponse | Error | ((url: string) => HttpResponse);

/**
 * Answers requests by URL prefix. A route given as an array is consumed one entry per request,
 * the last entry repeating.
 */
export const routedHttp = (routes: Record<string, Route | Route[]>): HttpClient & { calls: string[] } => {
    const calls: string[] = [];
    const served = new Map<string, number>();

    const client = async (url: string): Promise<HttpResponse> => {
        calls.push(url);
        const prefix = Object.keys(routes).find((candidate) => url.startsWith(candidate));
        if (prefix === undefined) throw new Error(`No route for ${url}`);

        const route = routes[prefix];
        const entries = Array.isArray(route) ? route : [route];
        const count = served.get(prefix) ?? 0;
        served.set(prefix, count + 1);

        const entry = entries[Math.min(count, entries.length - 1)];
        if (entry instanceof Error) throw entry;
        return typeof entry === 'function' ? entry(url) : entry;
    };

    return Object.assign(client, { calls });
};

export const createTestContext = (http: HttpClient, overrides: Partial<RunContext> = {}) => {
    const sleeps: number[] = [];
    const context = createRunContext({
        http,
        log,
        retryPolicy: TEST_POLICY,
        sleep: async (ms) => {
            sleeps.push(ms);
        },
        now: () => FIXED_NOW,
        ...overrides,
    });
    return { context, sleeps };
};

export const searchListing = (overrides: Partial<SearchListing> = {}): SearchListing => ({
    instantBookDisplayed: true,
    location: { latitude: 37.77, longitude: -122.41 },
    owner: { allStarHost: false },
    rate: { averageDailyPrice: 89.5 },
    rating: 4.9,
    reviewCount: 31,
    renterTripsTaken: 40,
    vehicle: {
        url: '/us/en/car-rental/united-states/san-francisco-ca/tesla/model-3/101',
        trim: 'Long Range',
        year: 2021,
    },
    ...overrides,
});

export const searchBody = (list: unknown[]): string => JSON.stringify({ list });

export const detailPage = ({
    labels = ['Long Range AWD'],
    descriptions = ['Clean car, great range.'],
    reservation = 'Distance includedDay200 miWeek1,000 miMonthUnlimited',
}: {
    labels?: string[];
    descriptions?: string[];
    reservation?: string | null;
} = {}): string => `<html><body>
${labels.map((label) => `<div class="vehicleLabel">${label}</div>`).join('\n')}
${descriptions.map((text) => `<div class="vehicleDetails-descriptionText">${text}</div>`).join('\n')}
${reservation === null ? '' : `<div class="reservationBox">${reservation}</div>`}
</body></html>`;

/** Apify storages kept in maps, shaped like the ones `ApifyTableSink` opens. */
export const memoryStorage = () => {
    const tables = new Map<string, Row[]>();
    const indexes = new Map<string, Map<string, TableIndex>>();

    const openers: StorageOpeners = {
        openTable: async (name) => ({
            pushData: async (rows) => {
                tables.set(name, [...(tables.get(name) ?? []), ...rows]);
            },
            drop: async () => {
                tables.delete(name);
            },
        }),
        openIndex: async (name) => {
            const store = indexes.get(name) ?? new Map<string, TableIndex>();
            indexes.set(name, store);
            return {
                getValue: async (key) => store.get(key) ?? null,
                setValue: async (key, value) => {
                    store.set(key, value);
                },
            };
        },
    };

    return { openers, tables, indexes };
};
