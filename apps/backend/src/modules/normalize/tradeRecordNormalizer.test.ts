import {
    generateTradeId,
    normalizeTradeRecord,
    pickFirst,
    resolvePnlAmount,
    SOURCE_KEYS,
} from './tradeRecordNormalizer';
import { decodeOrSentinel } from '../decode/tolerantJsonDecoder';

const NOW = new Date('2026-03-01T12:00:00.000Z');

describe('normalizeTradeRecord', () => {
    it('builds a canonical record from model output', () => {
        const record = normalizeTradeRecord({
            ticker: 'btc/usd',
            timeframe: '5m',
            entry_price: 100,
            exit_price: '105',
            direction: 'long',
            pnl: '+5.00 USD',
            pnl_amount: 5,
            date_time: '2025-07-06 14:20:58',
            reason_or_annotations: 'Breakout retest',
        }, {
            imageName: 'chart.png',
            metadata: { confidence: 78.94, total_words: 12, image_size: { width: 800, height: 600 } },
            now: NOW,
            generateId: () => 'abc12345',
        });

        expect(record).toEqual({
            trade_id: 'abc12345',
            ticker: 'BTCUSD',
            timeframe: '5m',
            entry_price: 100,
            exit_price: 105,
            direction: 'long',
            pnl: '+5.00 USD',
            pnl_amount: 5,
            date_time: '2025-07-06T14:20:58',
            logged_at: '2026-03-01T12:00:00.000Z',
            image_source: 'chart.png',
            reason_or_annotations: 'Breakout retest',
            ocr_confidence: '78.9%',
        });
    });

    it('fills every key with a safe default for a sentinel mapping', () => {
        const record = normalizeTradeRecord(decodeOrSentinel('not json at all'), {
            now: NOW,
            generateId: () => 'deadbeef',
        });

        expect(Object.keys(record).sort()).toEqual([
            'date_time',
            'direction',
            'entry_price',
            'exit_price',
            'image_source',
            'logged_at',
            'ocr_confidence',
            'pnl',
            'pnl_amount',
            'reason_or_annotations',
            'ticker',
            'timeframe',
            'trade_id',
        ]);
        expect(record.trade_id).toBe('deadbeef');
        expect(record.ticker).toBe('UNKNOWN');
        expect(record.direction).toBe('unknown');
        expect(record.entry_price).toBe(0);
        expect(record.exit_price).toBe(0);
        expect(record.pnl).toBeNull();
        expect(record.pnl_amount).toBe(0);
        expect(record.timeframe).toBeNull();
        expect(record.image_source).toBeNull();
        expect(record.reason_or_annotations).toBeNull();
        expect(record.ocr_confidence).toBeNull();
    });

    it('falls back to the processing time for an unparseable date', () => {
        const now = new Date(2026, 2, 1, 8, 15, 0, 0);
        const record = normalizeTradeRecord({ date_time: 'last tuesday' }, { now });

        expect(record.date_time).toBe('2026-03-01T08:15:00');
    });

    it('derives pnl_amount from the display string when no amount is given', () => {
        const record = normalizeTradeRecord({ pnl: '-$1,250.75' }, { now: NOW });

        expect(record.pnl).toBe('-$1,250.75');
        expect(record.pnl_amount).toBe(-1250.75);
    });

    it('reads legacy PnL spellings', () => {
        expect(normalizeTradeRecord({ PnL: '+12 USD' }, { now: NOW }).pnl_amount).toBe(12);
    });

    it('does not regenerate an existing trade id', () => {
        const generateId = jest.fn(() => 'fresh000');
        const record = normalizeTradeRecord({ trade_id: 'keep1234' }, { now: NOW, generateId });

        expect(record.trade_id).toBe('keep1234');
        expect(generateId).not.toHaveBeenCalled();
    });

    it('is idempotent on canonical records', () => {
        const first = normalizeTradeRecord({
            ticker: 'Bitcoin / USD',
            pnl: '+1,234.56 USD',
            date_time: 'Jul 06, 2025 14:20',
        }, { now: NOW });
        const second = normalizeTradeRecord({ ...first }, {
            now: new Date('2030-01-01T00:00:00.000Z'),
            loggedAt: first.logged_at,
        });

        expect(second.trade_id).toBe(first.trade_id);
        expect(second.ticker).toBe('BTCUSD');
        expect(second.pnl_amount).toBe(1234.56);
        expect(second.date_time).toBe('2025-07-06T14:20:00');
        expect(second).toEqual(first);
    });

    it('keeps a fallback timestamp stable across repeated normalization', () => {
        const first = normalizeTradeRecord({}, { now: new Date(2026, 0, 5, 10, 0, 0, 123) });
        const second = normalizeTradeRecord({ ...first }, { now: new Date(2027, 0, 1), loggedAt: first.logged_at });

        expect(second.date_time).toBe(first.date_time);
    });

    it('prefers OCR metadata and image name from the pipeline context', () => {
        const record = normalizeTradeRecord({
            image_source: 'from-model.png',
            ocr_confidence: '10.0%',
        }, {
            imageName: 'upload.png',
            metadata: { confidence: 0, total_words: 0, image_size: { width: 1, height: 1 } },
            now: NOW,
        });

        expect(record.image_source).toBe('upload.png');
        expect(record.ocr_confidence).toBe('0.0%');
    });
});

describe('resolvePnlAmount', () => {
    it('consults candidate keys in priority order', () => {
        expect(SOURCE_KEYS.pnl_amount).toEqual(['pnl_amount', 'pnl', 'PnL']);
        expect(resolvePnlAmount({ pnl_amount: 3, pnl: '+9 USD' })).toBe(3);
        expect(resolvePnlAmount({ pnl_amount: 'n/a', pnl: '+9 USD' })).toBe(9);
        expect(resolvePnlAmount({ pnl_amount: null, PnL: '-4' })).toBe(-4);
    });

    it('returns null when no candidate holds a number', () => {
        expect(resolvePnlAmount({ pnl: 'N/A' })).toBeNull();
        expect(resolvePnlAmount({})).toBeNull();
    });
});

describe('pickFirst', () => {
    it('skips blank strings and nulls', () => {
        expect(pickFirst({ ticker: '  ', symbol: 'ETH/USD' }, SOURCE_KEYS.ticker)).toBe('ETH/USD');
        expect(pickFirst({ ticker: null }, SOURCE_KEYS.ticker)).toBeUndefined();
    });
});

describe('generateTradeId', () => {
    it('produces short hexadecimal ids', () => {
        const id = generateTradeId();

        expect(id).toMatch(/^[0-9a-f]{8}$/);
        expect(generateTradeId()).not.toBe(id);
    });
});
