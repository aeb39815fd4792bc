import { ITEMS_PER_PAGE, PICKUP_TIME, RETURN_TIME, SEARCH_API, SEARCH_HEADERS, SITE_ROOT } from '../constants.js';
import { retryOptions, type RunContext } from '../context.js';
import { InvalidListingError, TransportError } from '../errors.js';
import { assertOk, isRecord, parseJson } from '../http.js';
import { withRetry } from '../retry.js';
import type { ListingSummary, Location, SearchListing, SearchResponse, Window } from '../types.js';
import { formatUsDate } from '../utils.js';

const LOG_PREFIX = '[search]';

export interface SearchOptions {
    maxMiles: number;
    make: string;
    model: string;
}

export const buildSearchUrl = (window: Window, location: Location, options: SearchOptions): string => {
    const params = new URLSearchParams({
        country: 'US',
        endDate: formatUsDate(window.end),
        endTime: RETURN_TIME,
        itemsPerPage: String(ITEMS_PER_PAGE),
        location: location.postalCode,
        locationType: 'ZIP',
        maximumDistanceInMiles: String(options.maxMiles),
        Latitude: String(location.latitude),
        Longitude: String(location.longitude),
        sortType: 'RELEVANCE',
        startDate: formatUsDate(window.start),
        startTime: PICKUP_TIME,
        makes: options.make,
        models: options.model,
    });
    return `${SEARCH_API}?${params.toString()}`;
};

export const parseSearchResponse = (body: string, url: string): SearchResponse => {
    const data = parseJson(body, url);
    if (!isRecord(data) || !Array.isArray(data.list)) {
        throw new TransportError(`Search response from ${url} has no "list" array`, url);
    }
    return { list: data.list };
};

/**
 * Candidate listings for one weekend, in the order the search returns them. An empty array means the
 * search succeeded and found nothing; transport failures throw once the retry budget is spent.
 */
export const fetchListings = async (
    window: Window,
    location: Location,
    options: SearchOptions,
    context: RunContext,
): Promise<unknown[]> => {
    const url = buildSearchUrl(window, location, options);
    context.log.info(`${LOG_PREFIX} Requesting listings for weekend of ${window.start}`, { url });

    const { list } = await withRetry(
        async () => {
            const response = await context.http(url, { headers: SEARCH_HEADERS, timeoutMs: context.timeoutMs });
            return parseSearchResponse(assertOk(response, url).body, url);
        },
        context.retryPolicy,
        retryOptions(context, LOG_PREFIX, `Search for ${window.start}`),
    );

    context.log.info(`${LOG_PREFIX} Received ${list.length} listings for weekend of ${window.start}`);
    return list;
};

const toNumber = (value: number | string | null | undefined): number | null => {
    if (value == null || value === '') return null;
    const num = Number(value);
    return Number.isFinite(num) ? num : null;
};

const toInteger = (value: number | string | null | undefined): number | null => {
    const num = toNumber(value);
    return num === null ? null : Math.trunc(num);
};

/** Absolute detail-page URL for a listing; relative paths are resolved against the site root. */
export const resolveVehicleUrl = (path: string | null | undefined): string | null => {
    if (!path) return null;
    try {
        return new URL(path, SITE_ROOT).toString();
    } catch {
        return null;
    }
};

/** Resolved detail-page URL of a raw `list` entry, if it carries one. */
export const listingUrl = (entry: unknown): string | null => {
    if (!isRecord(entry) || !isRecord(entry.vehicle) || typeof entry.vehicle.url !== 'string') return null;
    return resolveVehicleUrl(entry.vehicle.url);
};

export const parseSummary = (entry: unknown): ListingSummary => {
    if (!isRecord(entry)) throw new InvalidListingError(`Search entry is not a listing: ${JSON.stringify(entry)}`);
    const listing = entry as SearchListing;
    const { vehicle, location, owner, rate } = listing;

    const vehicleUrl = resolveVehicleUrl(vehicle?.url);
    if (!vehicleUrl) throw new InvalidListingError('Listing has no detail page URL');

    const averageDailyPrice = toNumber(rate?.averageDailyPrice);
    if (averageDailyPrice === null) throw new InvalidListingError(`Listing ${vehicleUrl} has no daily price`);

    return {
        instantBook: Boolean(listing.instantBookDisplayed),
        latitude: toNumber(location?.latitude),
        longitude: toNumber(location?.longitude),
        allStarHost: Boolean(owner?.allStarHost),
        averageDailyPrice,
        // A rating of 0 means "not rated yet", same as a missing one.
        rating: toNumber(listing.rating) || null,
        reviewCount: toInteger(listing.reviewCount),
        renterTripsTaken: toInteger(listing.renterTripsTaken),
        vehicleTrim: vehicle?.trim ? String(vehicle.trim) : null,
        vehicleYear: toInteger(vehicle?.year),
        vehicleUrl,
    };
};
