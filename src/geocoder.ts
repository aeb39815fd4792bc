import { GEOCODE_API } from './constants.js';
import { retryOptions, type RunContext } from './context.js';
import { InputError } from './errors.js';
import { assertOk, isRecord, parseJson } from './http.js';
import { withRetry } from './retry.js';
import type { Location } from './types.js';

const LOG_PREFIX = '[geocoder]';
const US_POSTAL_CODE = /^\d{5}$/;

export const isValidPostalCode = (postalCode: string): boolean => US_POSTAL_CODE.test(postalCode);

const toLocation = (postalCode: string, data: unknown): Location => {
    const place: unknown = isRecord(data) && Array.isArray(data.places) ? data.places[0] : undefined;
    const latitude = isRecord(place) ? Number.parseFloat(String(place.latitude)) : Number.NaN;
    const longitude = isRecord(place) ? Number.parseFloat(String(place.longitude)) : Number.NaN;
    if (Number.isNaN(latitude) || Number.isNaN(longitude)) {
        throw new InputError(`Postal code ${postalCode} has no known coordinates`);
    }
    return { postalCode, latitude, longitude };
};

/** Resolves a US postal code to coordinates. Unknown codes throw `InputError` without retrying. */
export const geocodePostalCode = async (postalCode: string, context: RunContext): Promise<Location> => {
    if (!isValidPostalCode(postalCode)) {
        throw new InputError(`Not a valid US postal code: "${postalCode}"`);
    }

    const url = `${GEOCODE_API}/${postalCode}`;
    const location = await withRetry(
        async () => {
            const response = await context.http(url, { timeoutMs: context.timeoutMs });
            if (response.statusCode === 404) throw new InputError(`Unknown postal code ${postalCode}`);
            return toLocation(postalCode, parseJson(assertOk(response, url).body, url));
        },
        context.retryPolicy,
        {
            ...retryOptions(context, LOG_PREFIX, `Lookup of ${postalCode}`),
            shouldRetry: (error) => !(error instanceof InputError),
        },
    );

    context.log.info(`${LOG_PREFIX} ${postalCode} → ${location.latitude}, ${location.longitude}`);
    return location;
};
