import type { PnlHistoryPoint, TradeLogRow, TradeStatistics } from '@trade-journal/shared';
import { resolvePnlAmount } from '../normalize/tradeRecordNormalizer';

const SEEDED_DIRECTIONS = ['long', 'short', 'buy', 'sell'];

function asText(input: unknown): string | null {
    if (typeof input !== 'string') {
        return null;
    }
    const trimmed = input.trim();
    return trimmed.length > 0 ? trimmed : null;
}

/** Day part of an ISO-ish timestamp ("2025-07-06T14:20:58" -> "2025-07-06"). */
export function historyDate(row: TradeLogRow): string {
    const raw = asText(row.date_time) ?? asText(row.logged_at);
    if (!raw) {
        return 'Unknown';
    }
    return raw.split(/[T ]/)[0] || raw;
}

/**
 * Aggregates over every row. Rows without a determinable PnL count toward
 * `total_trades` only; a PnL of exactly zero is neither a win nor a loss.
 */
export function computeTradeStatistics(rows: TradeLogRow[]): TradeStatistics {
    const tickers = new Set<string>();
    const directions = new Map<string, number>(SEEDED_DIRECTIONS.map((side) => [side, 0]));
    const pnlAmounts: number[] = [];
    let bestTrade: number | null = null;
    let worstTrade: number | null = null;
    const history: PnlHistoryPoint[] = [];
    let winningTrades = 0;
    let losingTrades = 0;

    for (const row of rows) {
        const ticker = asText(row.ticker);
        if (ticker) {
            tickers.add(ticker);
        }

        const direction = asText(row.direction)?.toLowerCase();
        if (direction) {
            directions.set(direction, (directions.get(direction) ?? 0) + 1);
        }

        const pnl = resolvePnlAmount(row);
        if (pnl === null) {
            continue;
        }
        pnlAmounts.push(pnl);
        bestTrade = bestTrade === null ? pnl : Math.max(bestTrade, pnl);
        worstTrade = worstTrade === null ? pnl : Math.min(worstTrade, pnl);
        if (pnl > 0) {
            winningTrades += 1;
        } else if (pnl < 0) {
            losingTrades += 1;
        }
        history.push({
            date: historyDate(row),
            pnl,
            ticker: ticker ?? 'Unknown',
        });
    }

    // Array#sort is stable: same-day trades keep log order.
    history.sort((left, right) => (left.date < right.date ? -1 : left.date > right.date ? 1 : 0));

    const withPnl = pnlAmounts.length;
    const totalPnl = withPnl > 0 ? pnlAmounts.reduce((sum, value) => sum + value, 0) : null;

    return {
        total_trades: rows.length,
        trades_with_pnl: withPnl,
        win_rate: withPnl > 0 ? winningTrades / withPnl : null,
        winning_trades: winningTrades,
        losing_trades: losingTrades,
        total_pnl: totalPnl,
        average_pnl: totalPnl !== null ? totalPnl / withPnl : null,
        best_trade: bestTrade,
        worst_trade: worstTrade,
        unique_tickers: tickers.size,
        tickers: Array.from(tickers),
        directions: Object.fromEntries(directions),
        pnl_history: history,
        latest_trade: rows.length > 0 ? rows[rows.length - 1] ?? null : null,
    };
}
