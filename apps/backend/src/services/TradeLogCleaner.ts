import type { TradeLogRow } from '@trade-journal/shared';
import { normalizeTradeRecord } from '../modules/normalize/tradeRecordNormalizer';
import { forComponent } from '../utils/logger';
import type { TradeStore } from './TradeStore';

const log = forComponent('TradeLogCleaner');

export interface CleanTradeLogOptions {
    now?: () => Date;
}

export interface CleanTradeLogResult {
    cleaned: number;
    skipped: number;
}

function keptLoggedAt(row: TradeLogRow): string | undefined {
    const value = row.logged_at;
    if (typeof value !== 'string' || value.trim().length === 0) {
        return undefined;
    }
    return Number.isFinite(Date.parse(value)) ? value : undefined;
}

/**
 * Re-normalizes every row of the trade log in place. Corrupt lines are
 * dropped from the rewritten file and counted as skipped.
 */
export async function cleanTradeLog(store: TradeStore, options: CleanTradeLogOptions = {}): Promise<CleanTradeLogResult> {
    const { rows, corrupt } = await store.scan();
    const now = options.now ?? (() => new Date());

    const records = rows.map((row) => normalizeTradeRecord(row, {
        loggedAt: keptLoggedAt(row),
        now: now(),
    }));
    await store.rewrite(records);

    log.info(`cleaned ${records.length} trades, skipped ${corrupt.length} corrupt lines`);
    return { cleaned: records.length, skipped: corrupt.length };
}
