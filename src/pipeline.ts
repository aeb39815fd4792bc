import { DATASET_PREFIX, PROGRESS_EVERY } from './constants.js';
import { retryOptions, type RunContext } from './context.js';
import { errorMessage } from './errors.js';
import { assembleRecord, BatchBuilder } from './records.js';
import { withRetry } from './retry.js';
import { enrichListing } from './scrapers/detail.js';
import { fetchListings, listingUrl, parseSummary, type SearchOptions } from './scrapers/search.js';
import { formatTableId, type TableId, type TableSink } from './sink.js';
import type { Batch, EnrichedRecord, ExcludedListing, Input, Location, Window } from './types.js';
import { mapInOrder, toIsoDate } from './utils.js';
import { tableNameFor, weekendWindows } from './windows.js';

const LOG_PREFIX = '[pipeline]';

export type WindowCollection =
    | { status: 'collected'; batch: Batch; excluded: ExcludedListing[] }
    | { status: 'empty'; reason: string; excluded: ExcludedListing[] }
    | { status: 'unretrievable'; reason: string };

export interface WindowOutcome {
    window: Window;
    tableId: string | null;
    status: 'uploaded' | WindowCollection['status'] | 'sink-failed';
    rowCount: number;
    excluded: ExcludedListing[];
    error: string | null;
}

export interface RunReport {
    ok: boolean;
    uploadedTables: string[];
    windows: WindowOutcome[];
}

type ListingOutcome = { record: EnrichedRecord } | { excluded: ExcludedListing };

export const tableIdFor = (window: Window, location: Location): TableId => ({
    dataset: `${DATASET_PREFIX}-${location.postalCode}`,
    table: tableNameFor(window),
});

/** Searches one weekend, enriches every listing and assembles the batch. Listings that fail are left out. */
export const collectWindow = async (
    window: Window,
    location: Location,
    input: Pick<Input, 'maxMiles' | 'make' | 'model' | 'maxConcurrency'>,
    context: RunContext,
): Promise<WindowCollection> => {
    const { log } = context;
    const search: SearchOptions = { maxMiles: input.maxMiles, make: input.make, model: input.model };

    let listings: unknown[];
    try {
        listings = await fetchListings(window, location, search, context);
    } catch (error) {
        log.error(`${LOG_PREFIX} Could not retrieve listings for weekend of ${window.start}: ${errorMessage(error)}`);
        return { status: 'unretrievable', reason: errorMessage(error) };
    }

    if (listings.length === 0) {
        log.error(`${LOG_PREFIX} Search returned no listings for weekend of ${window.start}`);
        return { status: 'empty', reason: 'search returned no listings', excluded: [] };
    }

    const capturedOn = toIsoDate(context.now());
    let processed = 0;

    const outcomes = await mapInOrder(listings, input.maxConcurrency, async (listing): Promise<ListingOutcome> => {
        try {
            const summary = parseSummary(listing);
            const detail = await enrichListing(summary.vehicleUrl, context);
            const record = assembleRecord(summary, detail, window, capturedOn);
            return record ? { record } : { excluded: { url: summary.vehicleUrl, reason: 'no detail' } };
        } catch (error) {
            const url = listingUrl(listing);
            log.warning(`${LOG_PREFIX} Leaving out listing ${url ?? '(no url)'}: ${errorMessage(error)}`);
            return { excluded: { url, reason: errorMessage(error) } };
        } finally {
            processed++;
            if (processed % PROGRESS_EVERY === 0) {
                log.info(`${LOG_PREFIX} Processed ${processed} listings of ${listings.length}.`);
            }
        }
    });

    const builder = new BatchBuilder(window, log);
    const excluded: ExcludedListing[] = [];
    for (const outcome of outcomes) {
        if ('record' in outcome) builder.add(outcome.record);
        else excluded.push(outcome.excluded);
    }

    if (builder.size === 0) {
        log.error(`${LOG_PREFIX} None of the ${listings.length} listings for ${window.start} could be enriched`);
        return { status: 'empty', reason: 'no listing could be enriched', excluded };
    }

    const batch = builder.build();
    log.info(`${LOG_PREFIX} Weekend of ${window.start}: ${batch.rows.length} rows, ${excluded.length} left out`);
    log.debug(`${LOG_PREFIX} First rows`, {
        rows: batch.rows.slice(0, 5).map(({ description, vehicleUrl, ...rest }) => rest),
    });

    return { status: 'collected', batch, excluded };
};

const loadBatch = async (sink: TableSink, tableId: TableId, batch: Batch, context: RunContext): Promise<void> => {
    const options = retryOptions(context, LOG_PREFIX, `Upload of ${formatTableId(tableId)}`);
    await withRetry(async () => sink.ensureDataset(tableId.dataset), context.retryPolicy, options);
    await withRetry(async () => sink.replaceTable(tableId, batch), context.retryPolicy, options);
};

/**
 * Runs every requested weekend in turn. A weekend that cannot be searched, comes back empty or fails
 * to upload is reported and the run moves on; the report is `ok` only when all of them were uploaded.
 */
export const scrapeWeekends = async (
    input: Input,
    location: Location,
    context: RunContext,
    sink: TableSink,
): Promise<RunReport> => {
    const { log } = context;
    const windows = weekendWindows(input.weekendsAhead, context.now());
    const outcomes: WindowOutcome[] = [];
    const uploadedTables: string[] = [];

    for (const window of windows) {
        log.info(`${LOG_PREFIX} Getting listings for weekend of ${window.start}.`);
        const collection = await collectWindow(window, location, input, context);

        if (collection.status !== 'collected') {
            outcomes.push({
                window,
                tableId: null,
                status: collection.status,
                rowCount: 0,
                excluded: collection.status === 'empty' ? collection.excluded : [],
                error: collection.reason,
            });
            continue;
        }

        const { batch, excluded } = collection;
        const tableId = tableIdFor(window, location);
        const formatted = formatTableId(tableId);
        try {
            await loadBatch(sink, tableId, batch, context);
            uploadedTables.push(formatted);
            outcomes.push({
                window,
                tableId: formatted,
                status: 'uploaded',
                rowCount: batch.rows.length,
                excluded,
                error: null,
            });
        } catch (error) {
            log.error(`${LOG_PREFIX} Upload of ${formatted} failed: ${errorMessage(error)}`);
            outcomes.push({
                window,
                tableId: formatted,
                status: 'sink-failed',
                rowCount: batch.rows.length,
                excluded,
                error: errorMessage(error),
            });
        }
    }

    return {
        ok: outcomes.every((outcome) => outcome.status === 'uploaded'),
        uploadedTables,
        windows: outcomes,
    };
};

export const logReport = (report: RunReport, context: Pick<RunContext, 'log'>): void => {
    const { log } = context;
    if (report.uploadedTables.length > 0) {
        log.info(`Successfully uploaded:\n - ${report.uploadedTables.join('\n - ')}`);
    } else {
        log.warning('No tables were uploaded.');
    }

    for (const outcome of report.windows) {
        if (outcome.excluded.length > 0) {
            log.warning(`Weekend of ${outcome.window.start}: ${outcome.excluded.length} listings left out`, {
                listings: outcome.excluded,
            });
        }
        if (outcome.status !== 'uploaded') {
            log.error(`Weekend of ${outcome.window.start} not uploaded (${outcome.status}): ${outcome.error}`);
        }
    }
};
