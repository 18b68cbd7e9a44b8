import { TICKER_ALIASES, UNKNOWN_TICKER } from '../../config/tickerAliases';
import { fail, ok, unwrapOr, type Result } from '../../utils/result';

export type CoercionFailure = {
    reason: string;
    input: unknown;
};

export type CanonicalDateTime = {
    iso: string;
    source: 'parsed' | 'fallback';
};

type DateTimeParts = {
    year: number;
    month: number;
    day: number;
    hour: number;
    minute: number;
    second: number;
    microsecond: number;
};

type DateTimeFormat = {
    name: string;
    pattern: RegExp;
    toParts: (match: RegExpExecArray) => DateTimeParts | null;
};

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];
// The offset is dropped, not applied: chart timestamps are kept as wall-clock time.
const TIMEZONE_SUFFIX_RE = /\s+UTC[+-]\d{1,2}$/i;

function toInt(input: string | undefined): number {
    return Number.parseInt(input ?? '', 10);
}

function fractionToMicroseconds(fraction: string | undefined): number {
    if (!fraction) {
        return 0;
    }
    return toInt(fraction.padEnd(6, '0').slice(0, 6));
}

function numericParts(match: RegExpExecArray, withSeconds: boolean, withFraction: boolean): DateTimeParts {
    return {
        year: toInt(match[1]),
        month: toInt(match[2]),
        day: toInt(match[3]),
        hour: toInt(match[4]),
        minute: toInt(match[5]),
        second: withSeconds ? toInt(match[6]) : 0,
        microsecond: withFraction ? fractionToMicroseconds(match[7]) : 0,
    };
}

/** Tried in order; the first format that parses wins. */
export const DATE_TIME_FORMATS: readonly DateTimeFormat[] = [
    {
        name: 'YYYY-MM-DD HH:mm:ss',
        pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})\s+(\d{1,2}):(\d{1,2}):(\d{1,2})$/,
        toParts: (match) => numericParts(match, true, false),
    },
    {
        name: 'YYYY-MM-DDTHH:mm:ss.ffffff',
        pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{1,2}):(\d{1,2})\.(\d{1,6})$/,
        toParts: (match) => numericParts(match, true, true),
    },
    {
        name: 'YYYY-MM-DDTHH:mm:ss',
        pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{1,2}):(\d{1,2})$/,
        toParts: (match) => numericParts(match, true, false),
    },
    {
        name: 'YYYY-MM-DD HH:mm',
        pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})\s+(\d{1,2}):(\d{1,2})$/,
        toParts: (match) => numericParts(match, false, false),
    },
    {
        name: 'MMM DD, YYYY HH:mm',
        pattern: /^([A-Za-z]{3})\s+(\d{1,2}),\s+(\d{4})\s+(\d{1,2}):(\d{1,2})$/,
        toParts: (match) => {
            const month = MONTHS.indexOf((match[1] ?? '').toLowerCase());
            if (month === -1) {
                return null;
            }
            return {
                year: toInt(match[3]),
                month: month + 1,
                day: toInt(match[2]),
                hour: toInt(match[4]),
                minute: toInt(match[5]),
                second: 0,
                microsecond: 0,
            };
        },
    },
];

function isValidCalendarDate(parts: DateTimeParts): boolean {
    if (parts.month < 1 || parts.month > 12 || parts.day < 1) {
        return false;
    }
    if (parts.hour > 23 || parts.minute > 59 || parts.second > 59) {
        return false;
    }
    const daysInMonth = new Date(Date.UTC(parts.year, parts.month, 0)).getUTCDate();
    return parts.day <= daysInMonth;
}

function pad(value: number, width: number): string {
    return String(value).padStart(width, '0');
}

function renderIso(parts: DateTimeParts): string {
    const date = `${pad(parts.year, 4)}-${pad(parts.month, 2)}-${pad(parts.day, 2)}`;
    const time = `${pad(parts.hour, 2)}:${pad(parts.minute, 2)}:${pad(parts.second, 2)}`;
    const fraction = parts.microsecond > 0 ? `.${pad(parts.microsecond, 6)}` : '';
    return `${date}T${time}${fraction}`;
}

/** Local wall-clock rendering of `now`, in the same shape parsed values use. */
export function renderProcessingTime(now: Date): string {
    return renderIso({
        year: now.getFullYear(),
        month: now.getMonth() + 1,
        day: now.getDate(),
        hour: now.getHours(),
        minute: now.getMinutes(),
        second: now.getSeconds(),
        microsecond: now.getMilliseconds() * 1000,
    });
}

export function parseTradeDateTime(input: unknown): Result<string, CoercionFailure> {
    if (typeof input !== 'string') {
        return fail({ reason: 'date_time is not a string', input });
    }
    const cleaned = input.trim().replace(TIMEZONE_SUFFIX_RE, '').trim();
    if (cleaned.length === 0) {
        return fail({ reason: 'date_time is empty', input });
    }

    for (const format of DATE_TIME_FORMATS) {
        const match = format.pattern.exec(cleaned);
        if (!match) {
            continue;
        }
        const parts = format.toParts(match);
        if (parts && isValidCalendarDate(parts)) {
            return ok(renderIso(parts));
        }
    }
    return fail({ reason: `unrecognized date_time format "${cleaned}"`, input });
}

/**
 * Parsed value when a known format matches, otherwise the processing time.
 * `source` tells the two apart; a fallback is not the trade's real time.
 */
export function standardizeDateTime(input: unknown, now: Date = new Date()): CanonicalDateTime {
    const parsed = parseTradeDateTime(input);
    if (parsed.ok) {
        return { iso: parsed.value, source: 'parsed' };
    }
    return { iso: renderProcessingTime(now), source: 'fallback' };
}

export function coerceNumeric(input: unknown): Result<number, CoercionFailure> {
    if (typeof input === 'number') {
        return Number.isFinite(input)
            ? ok(input === 0 ? 0 : input)
            : fail({ reason: 'number is not finite', input });
    }
    if (typeof input !== 'string') {
        return fail({ reason: `unsupported type ${input === null ? 'null' : typeof input}`, input });
    }

    const cleaned = input.replace(/,/g, '').replace(/[^\d.+-]/g, '');
    if (cleaned.length === 0) {
        return fail({ reason: 'no numeric content', input });
    }
    const parsed = Number(cleaned);
    if (!Number.isFinite(parsed)) {
        return fail({ reason: `cannot parse "${cleaned}"`, input });
    }
    return ok(parsed === 0 ? 0 : parsed);
}

/** "+1,234.56 USD" -> 1234.56, "-$500" -> -500; failures are "no PnL". */
export function coercePnlAmount(input: unknown): Result<number, CoercionFailure> {
    return coerceNumeric(input);
}

export function pnlAmountOrZero(input: unknown): number {
    return unwrapOr(coercePnlAmount(input), 0);
}

export function numberOrZero(input: unknown): number {
    return unwrapOr(coerceNumeric(input), 0);
}

export function standardizeTicker(input: unknown): string {
    if (typeof input !== 'string') {
        return UNKNOWN_TICKER;
    }
    const ticker = input.trim().toUpperCase();
    if (ticker.length === 0) {
        return UNKNOWN_TICKER;
    }
    return TICKER_ALIASES[ticker] ?? ticker;
}
