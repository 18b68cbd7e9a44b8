import { randomUUID } from 'crypto';
import type { ExtractionMetadata, TradeRecord } from '@trade-journal/shared';
import {
    coercePnlAmount,
    numberOrZero,
    standardizeDateTime,
    standardizeTicker,
} from './tradeFieldCoercion';

type Row = Record<string, unknown>;

/**
 * Source keys consulted per canonical field, highest priority first. Model
 * output and historical log rows disagree on spelling; this is the one place
 * that knows about it.
 */
export const SOURCE_KEYS = {
    trade_id: ['trade_id', 'id'],
    ticker: ['ticker', 'symbol'],
    timeframe: ['timeframe'],
    entry_price: ['entry_price'],
    exit_price: ['exit_price'],
    direction: ['direction', 'side'],
    pnl: ['pnl', 'PnL'],
    pnl_amount: ['pnl_amount', 'pnl', 'PnL'],
    date_time: ['date_time', 'datetime', 'date'],
    image_source: ['image_source'],
    reason_or_annotations: ['reason_or_annotations', 'reason', 'annotations'],
    ocr_confidence: ['ocr_confidence'],
} as const satisfies Record<string, readonly string[]>;

export const DEFAULT_DIRECTION = 'unknown';

export interface NormalizationContext {
    /** Basename of the screenshot; overrides any `image_source` in the source. */
    imageName?: string;
    metadata?: ExtractionMetadata;
    /** Existing creation timestamp to keep (offline clean pass only). */
    loggedAt?: string;
    now?: Date;
    generateId?: () => string;
}

export function generateTradeId(): string {
    return randomUUID().replace(/-/g, '').slice(0, 8);
}

function isPresent(value: unknown): boolean {
    if (value === undefined || value === null) {
        return false;
    }
    return typeof value !== 'string' || value.trim().length > 0;
}

export function pickFirst(source: Row, keys: readonly string[]): unknown {
    for (const key of keys) {
        const value = source[key];
        if (isPresent(value)) {
            return value;
        }
    }
    return undefined;
}

function textOrNull(value: unknown): string | null {
    if (typeof value === 'string') {
        const trimmed = value.trim();
        return trimmed.length > 0 ? trimmed : null;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
        return String(value);
    }
    return null;
}

/**
 * Returns the first candidate that coerces to a number. A later key is only
 * consulted when an earlier one is absent or unparsable.
 */
export function resolvePnlAmount(source: Row): number | null {
    for (const key of SOURCE_KEYS.pnl_amount) {
        const value = source[key];
        if (!isPresent(value)) {
            continue;
        }
        const coerced = coercePnlAmount(value);
        if (coerced.ok) {
            return coerced.value;
        }
    }
    return null;
}

export function formatConfidence(metadata: ExtractionMetadata): string {
    return `${metadata.confidence.toFixed(1)}%`;
}

/**
 * Maps a loosely typed mapping (decoded model output, a sentinel, or an old
 * log row) onto the canonical record. Never throws.
 */
export function normalizeTradeRecord(source: Row, context: NormalizationContext = {}): TradeRecord {
    const now = context.now ?? new Date();
    const existingId = textOrNull(pickFirst(source, SOURCE_KEYS.trade_id));
    const direction = textOrNull(pickFirst(source, SOURCE_KEYS.direction));

    return {
        trade_id: existingId ?? (context.generateId ?? generateTradeId)(),
        ticker: standardizeTicker(pickFirst(source, SOURCE_KEYS.ticker)),
        timeframe: textOrNull(pickFirst(source, SOURCE_KEYS.timeframe)),
        entry_price: numberOrZero(pickFirst(source, SOURCE_KEYS.entry_price)),
        exit_price: numberOrZero(pickFirst(source, SOURCE_KEYS.exit_price)),
        direction: direction ?? DEFAULT_DIRECTION,
        pnl: textOrNull(pickFirst(source, SOURCE_KEYS.pnl)),
        pnl_amount: resolvePnlAmount(source) ?? 0,
        date_time: standardizeDateTime(pickFirst(source, SOURCE_KEYS.date_time), now).iso,
        logged_at: context.loggedAt ?? now.toISOString(),
        image_source: context.imageName ?? textOrNull(pickFirst(source, SOURCE_KEYS.image_source)),
        reason_or_annotations: textOrNull(pickFirst(source, SOURCE_KEYS.reason_or_annotations)),
        ocr_confidence: context.metadata
            ? formatConfidence(context.metadata)
            : textOrNull(pickFirst(source, SOURCE_KEYS.ocr_confidence)),
    };
}
