import * as cheerio from 'cheerio';

import { DETAIL_HEADERS, SELECTORS } from '../constants.js';
import { retryOptions, type RunContext } from '../context.js';
import { EnrichmentError } from '../errors.js';
import { assertOk } from '../http.js';
import { withRetry } from '../retry.js';
import type { ListingDetail, Log, Mileage, Trim } from '../types.js';
import { printable } from '../utils.js';

const LOG_PREFIX = '[detail]';

const TRIM_KEYWORD = /performance|standard|long/;
const TRIM_BY_KEYWORD: Record<string, Trim> = {
    performance: 'performance',
    standard: 'standard',
    long: 'long-range',
};

const MILEAGE_VALUE = String.raw`(\d[\d,]*\s*mi|Unlimited)`;
const MILEAGE_PATTERN = new RegExp(
    String.raw`Distance included\s*Day\s*${MILEAGE_VALUE}\s*Week\s*${MILEAGE_VALUE}\s*Month\s*${MILEAGE_VALUE}`,
    'i',
);

export interface MileageAllowances {
    dayMiles: Mileage | null;
    weekMiles: Mileage | null;
    monthMiles: Mileage | null;
}

const UNKNOWN_MILEAGE: MileageAllowances = { dayMiles: null, weekMiles: null, monthMiles: null };

/** "1,000 mi" → 1000, "Unlimited" → 'unlimited' */
export const parseMileage = (value: string): Mileage | null => {
    if (/unlimited/i.test(value)) return 'unlimited';
    const miles = Number.parseInt(value.replace(/[^\d]/g, ''), 10);
    return miles > 0 ? miles : null;
};

/** First trim keyword across the labels, in document order. */
export const extractTrim = (labels: string[], log?: Log): Trim | null => {
    const found = labels
        .map((label) => TRIM_KEYWORD.exec(label.toLowerCase())?.[0])
        .filter((keyword): keyword is string => keyword !== undefined)
        .map((keyword) => TRIM_BY_KEYWORD[keyword]);

    if (new Set(found).size > 1) {
        log?.debug(`${LOG_PREFIX} Labels name several trims (${found.join(', ')}), keeping ${found[0]}`);
    }
    return found[0] ?? null;
};

export const extractMileage = (fragments: string[]): MileageAllowances => {
    for (const fragment of fragments) {
        const match = MILEAGE_PATTERN.exec(fragment);
        if (match) {
            return {
                dayMiles: parseMileage(match[1]),
                weekMiles: parseMileage(match[2]),
                monthMiles: parseMileage(match[3]),
            };
        }
    }
    return UNKNOWN_MILEAGE;
};

/**
 * Parses a vehicle detail page. Missing trim labels or mileage box give `null` fields; a page without
 * a non-blank description is not a listing page and throws.
 */
export const parseDetail = (html: string, url: string, log?: Log): ListingDetail => {
    const $ = cheerio.load(html);
    const texts = (selector: string): string[] =>
        $(selector)
            .toArray()
            .map((element) => $(element).text());

    const description = texts(SELECTORS.description)
        .map((text) => printable(text).trim())
        .find((text) => text !== '');
    if (description === undefined) throw new EnrichmentError(url, 'missing-description');

    const trim = extractTrim(texts(SELECTORS.trimLabel), log);
    const performanceTrim = trim === 'performance';
    const performanceDescription = /performance/i.test(description);

    return {
        trim,
        performanceTrim,
        description,
        performanceDescription,
        performanceScore: Number(performanceTrim) + Number(performanceDescription),
        ...extractMileage(texts(SELECTORS.reservationBox)),
    };
};

/** Fetches and parses one detail page. Every failure surfaces as `EnrichmentError`. */
export const enrichListing = async (url: string, context: RunContext): Promise<ListingDetail> => {
    let html: string;
    try {
        html = await withRetry(
            async () => {
                const response = await context.http(url, { headers: DETAIL_HEADERS, timeoutMs: context.timeoutMs });
                return assertOk(response, url).body;
            },
            context.retryPolicy,
            retryOptions(context, LOG_PREFIX, `Detail page ${url}`),
        );
    } catch (error) {
        throw new EnrichmentError(url, 'transport', error);
    }

    return parseDetail(html, url, context.log);
};
