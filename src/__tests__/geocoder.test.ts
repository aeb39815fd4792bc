import { describe, expect, it } from 'vitest';

import { GEOCODE_API } from '../constants.js';
import { InputError, RetryExhaustedError } from '../errors.js';
import { geocodePostalCode, isValidPostalCode } from '../geocoder.js';
import { createTestContext, ok, routedHttp } from './helpers.js';

const place = JSON.stringify({
    'post code': '94103',
    country: 'United States',
    places: [{ 'place name': 'San Francisco', longitude: '-122.4147', latitude: '37.7725', state: 'California' }],
});

describe('isValidPostalCode', () => {
    it('should accept five digits only', () => {
        expect(isValidPostalCode('94103')).toBe(true);
        expect(isValidPostalCode('9410')).toBe(false);
        expect(isValidPostalCode('94103-1234')).toBe(false);
        expect(isValidPostalCode('ABCDE')).toBe(false);
    });
});

describe('geocodePostalCode', () => {
    it('should resolve coordinates', async () => {
        const http = routedHttp({ [`${GEOCODE_API}/94103`]: ok(place) });
        const { context } = createTestContext(http);

        await expect(geocodePostalCode('94103', context)).resolves.toEqual({
            postalCode: '94103',
            latitude: 37.7725,
            longitude: -122.4147,
        });
    });

    it('should reject a malformed code before any request', async () => {
        const http = routedHttp({});
        const { context } = createTestContext(http);

        await expect(geocodePostalCode('941', context)).rejects.toThrow(InputError);
        expect(http.calls).toEqual([]);
    });

    it('should not retry an unknown code', async () => {
        const http = routedHttp({ [`${GEOCODE_API}/00000`]: { statusCode: 404, body: '{}' } });
        const { context, sleeps } = createTestContext(http);

        await expect(geocodePostalCode('00000', context)).rejects.toThrow('Unknown postal code 00000');
        expect(http.calls).toHaveLength(1);
        expect(sleeps).toEqual([]);
    });

    it('should reject a response without places', async () => {
        const http = routedHttp({ [`${GEOCODE_API}/99999`]: ok('{"places":[]}') });
        const { context } = createTestContext(http);

        await expect(geocodePostalCode('99999', context)).rejects.toThrow('Postal code 99999 has no known coordinates');
    });

    it('should retry transport failures', async () => {
        const http = routedHttp({ [`${GEOCODE_API}/94103`]: new Error('ECONNREFUSED') });
        const { context } = createTestContext(http);

        await expect(geocodePostalCode('94103', context)).rejects.toThrow(RetryExhaustedError);
        expect(http.calls).toHaveLength(3);
    });
});
