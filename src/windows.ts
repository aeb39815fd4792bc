import type { Window } from './types.js';
import { addDays, formatUsDate, isoWeekday, toIsoDate } from './utils.js';

const FRIDAY = 5;
const SUNDAY = 7;

const dayOfWeek = (weekday: number, isoDate: string): string => addDays(isoDate, weekday - isoWeekday(isoDate));

/**
 * The next `weeksAhead` Friday–Sunday windows. When this week's Friday has already passed,
 * the first window is next week's, so no window starts in the past.
 */
export const weekendWindows = (weeksAhead: number, today: Date = new Date()): Window[] => {
    let anchor = toIsoDate(today);
    if (dayOfWeek(FRIDAY, anchor) < anchor) anchor = addDays(anchor, 7);

    return Array.from({ length: Math.max(0, weeksAhead) }, (_, week) => {
        const date = addDays(anchor, week * 7);
        return { start: dayOfWeek(FRIDAY, date), end: dayOfWeek(SUNDAY, date) };
    });
};

/** Destination table name for a window: MM_DD_YYYY of its Friday. */
export const tableNameFor = (window: Window): string => formatUsDate(window.start).replaceAll('/', '_');
