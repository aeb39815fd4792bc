import type { RetryPolicy } from './retry.js';

export const SITE_ROOT = 'https://turo.com';
export const SEARCH_API = `${SITE_ROOT}/api/search`;
export const GEOCODE_API = 'https://api.zippopotam.us/us';

export const ITEMS_PER_PAGE = 200;
export const PICKUP_TIME = '10:00';
export const RETURN_TIME = '10:00';

export const REQUEST_TIMEOUT_MS = 15_000;
export const PROGRESS_EVERY = 5;

export const RETRY_POLICY: RetryPolicy = {
    baseDelayMs: 1_000,
    multiplier: 2,
    maxDelayMs: 8_000,
    maxAttempts: 5,
};

export const INPUT_DEFAULTS = {
    maxMiles: 20,
    make: 'Tesla',
    model: 'Model 3',
    maxConcurrency: 1,
    verbose: false,
};

export const DATASET_PREFIX = 'rentals';
export const TABLE_INDEX_KEY = 'TABLES';

export const SEARCH_HEADERS = {
    Pragma: 'no-cache',
    'Accept-Language': 'en-US,es-US;q=0.8,es;',
    Accept: '*/*',
    Referer: `${SITE_ROOT}/search?`,
    'Cache-Control': 'no-cache',
};

export const DETAIL_HEADERS = {
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5',
};

export const SELECTORS = {
    trimLabel: 'div.vehicleLabel',
    description: 'div.vehicleDetails-descriptionText',
    reservationBox: 'div.reservationBox',
};
