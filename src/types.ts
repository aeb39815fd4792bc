import type { log } from 'apify';

export type Log = typeof log;

export interface Input {
    weekendsAhead: number;
    postalCode: string;
    maxMiles: number;
    make: string;
    model: string;
    maxConcurrency: number;
    verbose: boolean;
}

/** Friday through Sunday of one week, as ISO calendar dates. */
export interface Window {
    start: string;
    end: string;
}

export interface Location {
    postalCode: string;
    latitude: number;
    longitude: number;
}

/** One entry of the search response `list`, as far as it is read. */
export interface SearchListing {
    instantBookDisplayed?: boolean | null;
    location?: { latitude?: number | null; longitude?: number | null } | null;
    owner?: { allStarHost?: boolean | null } | null;
    rate?: { averageDailyPrice?: number | string | null } | null;
    rating?: number | string | null;
    reviewCount?: number | null;
    renterTripsTaken?: number | null;
    vehicle?: {
        url?: string | null;
        trim?: string | null;
        year?: number | string | null;
    } | null;
}

/** Entries stay unchecked until `parseSummary`, so a malformed one is reported rather than lost. */
export interface SearchResponse {
    list: unknown[];
}

export type ListingSummary = {
    instantBook: boolean;
    latitude: number | null;
    longitude: number | null;
    allStarHost: boolean;
    averageDailyPrice: number;
    rating: number | null; // null = no rating yet
    reviewCount: number | null;
    renterTripsTaken: number | null;
    vehicleTrim: string | null;
    vehicleYear: number | null;
    vehicleUrl: string;
};

export type Trim = 'performance' | 'standard' | 'long-range';

/** Miles included per period; null when the page does not state it. */
export type Mileage = number | 'unlimited';

export type ListingDetail = {
    trim: Trim | null;
    performanceTrim: boolean;
    description: string;
    performanceDescription: boolean;
    performanceScore: number; // 0..2
    dayMiles: Mileage | null;
    weekMiles: Mileage | null;
    monthMiles: Mileage | null;
};

export type EnrichedRecord = ListingSummary &
    ListingDetail & {
        weekend: string; // window start, ISO date
        dateAccessed: string; // ISO date
    };

export type RowValue = string | number | boolean | null;
export type Row = Record<string, RowValue>;

export interface Batch {
    window: Window;
    columns: string[];
    rows: Row[];
}

export interface ExcludedListing {
    url: string | null;
    reason: string;
}
