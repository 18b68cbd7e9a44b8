/**
 * Canonical symbol for every spelling seen in chart screenshots. Keys are
 * matched after trimming and upper-casing.
 */
export const TICKER_ALIASES: Readonly<Record<string, string>> = Object.freeze({
    'BITCOIN / USD': 'BTCUSD',
    'BITCOIN/USD': 'BTCUSD',
    'BTC/USD': 'BTCUSD',
    'ETH/USD': 'ETHUSD',
    'SOL/USD': 'SOLUSD',
});

export const UNKNOWN_TICKER = 'UNKNOWN';
