import { DateTime } from "luxon";

/**
 * Time window for slot matching. Bounds are "HH:mm" and inclusive;
 * a null bound is open.
 */
export interface TimeWindow {
    earliest: string | null;
    latest: string | null;
}

/**
 * One offered slot as the scanner sees it
 */
export interface SlotInfo {
    config_token: string;
    start: string; // "2024-06-01 19:00:00"
    type?: string;
}

const CLOCK_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

/**
 * Check a string is a well-formed 24h "HH:mm"
 */
export function isClockTime(value: string): boolean {
    return CLOCK_PATTERN.test(value);
}

/**
 * Check a string is a real calendar date in "yyyy-MM-dd"
 */
export function isCalendarDate(value: string): boolean {
    return /^\d{4}-\d{2}-\d{2}$/.test(value) && DateTime.fromISO(value).isValid;
}

/**
 * Time-of-day of a Resy slot start: the first five characters of the time
 * component. "2024-06-01 19:30:00" -> "19:30", "19:30:00" -> "19:30"
 */
export function slotTimeOfDay(start: string): string {
    const parts = start.trim().split(" ");
    return parts[parts.length - 1].slice(0, 5);
}

/**
 * Check a slot's "HH:mm" falls within the window. Comparison is
 * lexicographic, which orders zero-padded 24h times correctly.
 */
export function isTimeInWindow(timeOfDay: string, window: TimeWindow): boolean {
    if (window.earliest && timeOfDay < window.earliest) {
        return false;
    }
    if (window.latest && timeOfDay > window.latest) {
        return false;
    }
    return true;
}

/**
 * Keep the slots inside the window, preserving API order.
 * Slots without a start time can't be placed in a window and are dropped.
 */
export function filterSlots(slots: SlotInfo[], window: TimeWindow): SlotInfo[] {
    return slots.filter((slot) => {
        if (!slot.start) {
            return false;
        }
        return isTimeInWindow(slotTimeOfDay(slot.start), window);
    });
}

/**
 * Every calendar date from start to end inclusive, ascending.
 * A reversed range is empty; a malformed date throws.
 */
export function enumerateDates(start: string, end: string): string[] {
    const first = DateTime.fromISO(start, { zone: "utc" });
    const last = DateTime.fromISO(end, { zone: "utc" });

    if (!isCalendarDate(start) || !first.isValid) {
        throw new Error(`Invalid date: "${start}"`);
    }
    if (!isCalendarDate(end) || !last.isValid) {
        throw new Error(`Invalid date: "${end}"`);
    }

    const dates: string[] = [];
    for (let day = first; day.toMillis() <= last.toMillis(); day = day.plus({ days: 1 })) {
        dates.push(day.toFormat("yyyy-MM-dd"));
    }
    return dates;
}
