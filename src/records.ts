import type { Batch, EnrichedRecord, ListingDetail, ListingSummary, Log, Row, RowValue, Window } from './types.js';

const LOG_PREFIX = '[records]';

/** One output row, or null when the listing has no detail and must be left out. */
export const assembleRecord = (
    summary: ListingSummary,
    detail: ListingDetail | null,
    window: Window,
    capturedOn: string,
): EnrichedRecord | null => {
    if (!detail) return null;
    return { ...summary, ...detail, weekend: window.start, dateAccessed: capturedOn };
};

/**
 * Collects the rows of one window. The first row fixes the column set; later rows are fitted to it,
 * missing columns becoming null and unexpected ones being dropped.
 */
export class BatchBuilder {
    private columns: string[] | null = null;

    private readonly rows: Row[] = [];

    constructor(
        private readonly window: Window,
        private readonly log: Log,
    ) {}

    get size(): number {
        return this.rows.length;
    }

    add(row: Row): void {
        const keys = Object.keys(row);
        this.columns ??= keys;
        const columns = this.columns;

        const missing = columns.filter((column) => !(column in row));
        const extra = keys.filter((key) => !columns.includes(key));
        if (missing.length > 0 || extra.length > 0) {
            this.log.warning(`${LOG_PREFIX} Row ${this.rows.length} does not match the batch columns`, {
                weekend: this.window.start,
                missing,
                extra,
            });
        }

        this.rows.push(Object.fromEntries(columns.map((column): [string, RowValue] => [column, row[column] ?? null])));
    }

    build(): Batch {
        return { window: this.window, columns: this.columns ?? [], rows: [...this.rows] };
    }
}
