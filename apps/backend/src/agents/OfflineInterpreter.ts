import type { TradeInterpreter } from './interfaces';
import { sentinelResponse } from './interpreterFallback';
import { extractOcrBlock } from './prompts';
import { TICKER_ALIASES } from '../config/tickerAliases';
import { coercePnlAmount } from '../modules/normalize/tradeFieldCoercion';
import { logger } from '../utils/logger';

const PAIR_RE = /\b([A-Z]{2,6}\/?USDT?)\b/;
const DIRECTION_RE = /\b(long|short|buy|sell)\b/i;
const PNL_RE = /(?:^|\s)([+-]\s?\$?\d[\d,]*(?:\.\d+)?(?:\s*USDT?\b)?)/i;
const DATE_TIME_RE = /\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}(?::\d{2})?/;
const TIMEFRAME_RE = /\b(\d{1,3}[mhDW])\b/;

function findTicker(text: string): string | null {
    const upper = text.toUpperCase();
    for (const alias of Object.keys(TICKER_ALIASES)) {
        if (upper.includes(alias)) {
            return alias;
        }
    }
    return PAIR_RE.exec(text)?.[1] ?? null;
}

/** Best-effort field scrape of raw OCR text. */
export function scrapeTradeFields(ocrText: string): Record<string, unknown> {
    const pnl = PNL_RE.exec(ocrText)?.[1]?.trim() ?? null;
    const amount = pnl ? coercePnlAmount(pnl) : null;

    return {
        ticker: findTicker(ocrText),
        timeframe: TIMEFRAME_RE.exec(ocrText)?.[1] ?? null,
        direction: DIRECTION_RE.exec(ocrText)?.[1]?.toLowerCase() ?? null,
        pnl,
        pnl_amount: amount && amount.ok ? amount.value : null,
        date_time: DATE_TIME_RE.exec(ocrText)?.[0] ?? null,
        reason_or_annotations: 'Extracted without a language model',
    };
}

/**
 * Used when no model credentials are configured. Extraction prompts get a
 * regex scrape of the OCR text; anything else gets the sentinel payload.
 */
export class OfflineInterpreter implements TradeInterpreter {
    public name: string;
    public provider = 'offline' as const;

    constructor(name = 'offline') {
        this.name = name;
    }

    async interpret(prompt: string): Promise<string> {
        const ocrText = extractOcrBlock(prompt);
        if (ocrText === null) {
            logger.debug(`[${this.name}] no OCR block in prompt, returning sentinel`);
            return sentinelResponse('No language model configured');
        }
        return JSON.stringify(scrapeTradeFields(ocrText));
    }
}
