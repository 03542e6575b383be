/**
 * Wall-clock view in the trading time zone.
 */

export interface LocalTime {
    readonly timeZone: string;
    /** YYYY-MM-DD in the trading time zone */
    readonly date: string;
    /** 0 = Sunday ... 6 = Saturday */
    readonly weekday: number;
    /** Minutes since local midnight */
    readonly minutes: number;
}

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"] as const;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
    let formatter = formatters.get(timeZone);
    if (!formatter) {
        formatter = new Intl.DateTimeFormat("en-US", {
            timeZone,
            year: "numeric",
            month: "2-digit",
            day: "2-digit",
            weekday: "short",
            hour: "2-digit",
            minute: "2-digit",
            hourCycle: "h23",
        });
        formatters.set(timeZone, formatter);
    }
    return formatter;
}

/**
 * Throws RangeError for zones the runtime does not know.
 */
export function assertTimeZone(timeZone: string): void {
    formatterFor(timeZone);
}

export function localTimeIn(timeZone: string, at: Date = new Date()): LocalTime {
    const parts: Record<string, string> = {};
    for (const part of formatterFor(timeZone).formatToParts(at)) {
        parts[part.type] = part.value;
    }

    const weekday = WEEKDAYS.findIndex((day) => day === parts.weekday);
    const hour = Number(parts.hour);
    const minute = Number(parts.minute);

    return {
        timeZone,
        date: `${parts.year}-${parts.month}-${parts.day}`,
        weekday,
        minutes: hour * 60 + minute,
    };
}

export function weekdayIndex(name: string): number {
    const normalized = name.trim().slice(0, 3).toLowerCase();
    return WEEKDAYS.findIndex((day) => day.toLowerCase() === normalized);
}

export function formatMinutes(minutes: number): string {
    const h = Math.floor(minutes / 60);
    const m = minutes % 60;
    return `${String(h).padStart(2, "0")}:${String(m).padStart(2, "0")}`;
}
