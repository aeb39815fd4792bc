const DAY_MS = 86_400_000;

const pad = (value: number): string => String(value).padStart(2, '0');

/** Calendar date of `date` in local time, as YYYY-MM-DD. */
export const toIsoDate = (date: Date): string =>
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;

const parseIsoDate = (isoDate: string): Date => {
    const [year, month, day] = isoDate.split('-').map(Number);
    return new Date(Date.UTC(year, month - 1, day));
};

export const addDays = (isoDate: string, days: number): string =>
    new Date(parseIsoDate(isoDate).getTime() + days * DAY_MS).toISOString().slice(0, 10);

/** ISO weekday, Monday = 1 … Sunday = 7. */
export const isoWeekday = (isoDate: string): number => parseIsoDate(isoDate).getUTCDay() || 7;

/** 2026-10-23 → 10/23/2026 */
export const formatUsDate = (isoDate: string): string => {
    const [year, month, day] = isoDate.split('-');
    return `${month}/${day}/${year}`;
};

// Letters, digits, punctuation, space and \t \n \v \f \r.
const NON_PRINTABLE = /[^\x20-\x7E\t\n\v\f\r]/g;

export const printable = (text: string): string => text.replace(NON_PRINTABLE, '');

/**
 * Maps `items` with at most `concurrency` calls in flight. Results keep the input order,
 * whatever order the calls finish in.
 */
export const mapInOrder = async <T, R>(
    items: readonly T[],
    concurrency: number,
    mapper: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
    const results = new Array<R>(items.length);
    let next = 0;

    const worker = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            results[index] = await mapper(items[index], index);
        }
    };

    const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, async () => worker());
    await Promise.all(workers);

    return results;
};
