// Wall-clock helpers. A "wall-clock" Date carries the local calendar date and
// clock time of some time zone in its UTC fields, so arithmetic and
// comparison stay free of host-zone and DST effects.

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export interface ClockTime {
    hours: number;
    minutes: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
    let formatter = formatterCache.get(timeZone);
    if (!formatter) {
        formatter = new Intl.DateTimeFormat("en-US", {
            timeZone,
            year: "numeric",
            month: "2-digit",
            day: "2-digit",
            hour: "2-digit",
            minute: "2-digit",
            second: "2-digit",
            hourCycle: "h23",
        });
        formatterCache.set(timeZone, formatter);
    }
    return formatter;
}

/**
 * Converts an instant to the wall-clock reading of `timeZone`.
 */
export function toWallClock(instant: Date, timeZone: string): Date {
    const parts: Record<string, number> = {};
    for (const part of getFormatter(timeZone).formatToParts(instant)) {
        if (part.type !== "literal") {
            parts[part.type] = Number(part.value);
        }
    }

    return new Date(
        Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second, instant.getUTCMilliseconds())
    );
}

/**
 * Parses "HH:MM". Throws a RangeError when the value is not a clock time.
 */
export function parseClockTime(value: string): ClockTime {
    const match = value.match(/^\s*(\d{1,2})\s*:\s*(\d{1,2})\s*$/);
    if (!match) {
        throw new RangeError(`Invalid clock time "${value}"`);
    }

    const hours = Number(match[1]);
    const minutes = Number(match[2]);
    if (hours > 23 || minutes > 59) {
        throw new RangeError(`Clock time out of range "${value}"`);
    }
    return { hours, minutes };
}

/** Same calendar day as `day`, at the given clock time, seconds zero. */
export function atClockTime(day: Date, time: ClockTime): Date {
    return new Date(Date.UTC(day.getUTCFullYear(), day.getUTCMonth(), day.getUTCDate(), time.hours, time.minutes, 0, 0));
}

export function addDays(value: Date, days: number): Date {
    return new Date(value.getTime() + days * DAY_MS);
}

export function addMinutes(value: Date, minutes: number): Date {
    return new Date(value.getTime() + minutes * MINUTE_MS);
}

/** `YYYY-MM-DD HH:MM:SS` */
export function formatWallClock(value: Date): string {
    return value.toISOString().slice(0, 19).replace("T", " ");
}

/** Inverse of formatWallClock; null when the text is not in that form. */
export function parseWallClock(text: string): Date | null {
    const match = text.match(/^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/);
    if (!match) {
        return null;
    }

    const value = new Date(`${match[1]}-${match[2]}-${match[3]}T${match[4]}:${match[5]}:${match[6]}.000Z`);
    if (Number.isNaN(value.getTime()) || formatWallClock(value) !== text) {
        return null;
    }
    return value;
}

/** `YYYYMMDD` */
export function formatCompactDate(value: Date): string {
    return value.toISOString().slice(0, 10).replace(/-/g, "");
}
