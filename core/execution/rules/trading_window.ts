import { ReasonCode, type GuardDecision } from "../../events/admission_event.js";
import type { GuardContext, GuardPolicy } from "../guard_context.js";
import { formatMinutes, weekdayIndex, type LocalTime } from "../local_clock.js";

/**
 * Trading window, e.g. "09:30-16:00", "Mon-Fri 09:30-16:00", "Sun,Mon 22:00-02:00".
 * Bounds are inclusive; end < start wraps past midnight.
 */
export interface TradingWindow {
    readonly raw: string;
    /** Allowed local weekdays (0 = Sunday); null = every day */
    readonly days: ReadonlySet<number> | null;
    readonly start: number;
    readonly end: number;
}

const WINDOW_PATTERN = /^(?:(\S+)\s+)?(\d{1,2}):(\d{2})\s*-\s*(\d{1,2}):(\d{2})$/;

function parseClock(hours: string, minutes: string, raw: string): number {
    const h = Number(hours);
    const m = Number(minutes);
    if (h > 23 || m > 59) {
        throw new Error(`Invalid trading window "${raw}": ${hours}:${minutes} is not a time of day`);
    }
    return h * 60 + m;
}

function parseDays(spec: string, raw: string): Set<number> {
    const days = new Set<number>();
    for (const item of spec.split(",")) {
        const [fromName, toName] = item.split("-");
        const from = weekdayIndex(fromName ?? "");
        const to = toName === undefined ? from : weekdayIndex(toName);
        if (from < 0 || to < 0) {
            throw new Error(`Invalid trading window "${raw}": unknown day in "${item}"`);
        }
        // Mon-Fri, or a wrapping range such as Fri-Mon
        for (let day = from; ; day = (day + 1) % 7) {
            days.add(day);
            if (day === to) break;
        }
    }
    return days;
}

/**
 * Throws on malformed input; callers decide whether to fail open.
 */
export function parseTradingWindow(raw: string): TradingWindow {
    const trimmed = raw.trim();
    const match = WINDOW_PATTERN.exec(trimmed);
    if (!match) {
        throw new Error(`Invalid trading window "${raw}": expected "[days ]HH:MM-HH:MM"`);
    }
    const [, daySpec, startH, startM, endH, endM] = match;

    return {
        raw: trimmed,
        days: daySpec ? parseDays(daySpec, raw) : null,
        start: parseClock(startH ?? "", startM ?? "", raw),
        end: parseClock(endH ?? "", endM ?? "", raw),
    };
}

export function isWithinWindow(window: TradingWindow, local: LocalTime): boolean {
    if (window.days && !window.days.has(local.weekday)) {
        return false;
    }
    if (window.start <= window.end) {
        return local.minutes >= window.start && local.minutes <= window.end;
    }
    return local.minutes >= window.start || local.minutes <= window.end;
}

export function checkTradingWindow(context: GuardContext, policy: GuardPolicy): GuardDecision {
    const window = policy.trading_window;
    if (!window || isWithinWindow(window, context.local_time)) {
        return { guard: "trading_window", outcome: "PASSED", reason_code: ReasonCode.PASSED, reason: "" };
    }

    return {
        guard: "trading_window",
        outcome: "SKIPPED",
        reason_code: ReasonCode.OUTSIDE_TRADING_WINDOW,
        reason: "outside trading window",
        details: {
            window: window.raw,
            local_time: formatMinutes(context.local_time.minutes),
            local_date: context.local_time.date,
            time_zone: context.local_time.timeZone,
        },
    };
}
