import type { TradeRecord } from '@trade-journal/shared';
import type { TradeInterpreter } from '../agents/interfaces';
import { buildSummaryPrompt } from '../agents/prompts';
import { errorMessage } from '../errors/pipelineErrors';
import { decodedError, decodeModelOutput } from '../modules/decode/tolerantJsonDecoder';
import { forComponent } from '../utils/logger';

const log = forComponent('TradeSummaryService');

const SUMMARY_TEMPERATURE = 0.7;
const SUMMARY_MAX_TOKENS = 800;

export interface TradeSummary {
    text: string;
    source: 'model' | 'fallback';
}

function priceMovePct(record: TradeRecord): number | null {
    const { entry_price: entry, exit_price: exit } = record;
    if (entry <= 0 || exit <= 0) {
        return null;
    }
    const side = record.direction.toLowerCase();
    if (side === 'long' || side === 'buy') {
        return (exit / entry - 1) * 100;
    }
    if (side === 'short' || side === 'sell') {
        return (entry / exit - 1) * 100;
    }
    return null;
}

/** Plain-text digest used when no model summary is available. */
export function buildFallbackSummary(record: TradeRecord): string {
    const lines = [
        `Symbol: ${record.ticker}`,
        `Date: ${record.date_time}`,
        `Direction: ${record.direction.toUpperCase()}`,
    ];
    if (record.timeframe) {
        lines.push(`Timeframe: ${record.timeframe}`);
    }
    if (record.entry_price > 0) {
        lines.push(`Entry Price: $${record.entry_price}`);
    }
    if (record.exit_price > 0) {
        lines.push(`Exit Price: $${record.exit_price}`);
    }
    lines.push(`P&L: ${record.pnl ?? record.pnl_amount.toFixed(2)}`);

    const move = priceMovePct(record);
    if (move !== null) {
        lines.push(`Price Move: ${move.toFixed(2)}%`);
    }
    if (record.reason_or_annotations) {
        lines.push('', `Notes: ${record.reason_or_annotations}`);
    }
    return lines.join('\n');
}

function isUsableAnswer(answer: string): boolean {
    if (answer.trim().length === 0) {
        return false;
    }
    const decoded = decodeModelOutput(answer);
    return !(decoded.ok && decodedError(decoded.value) !== null);
}

export class TradeSummaryService {
    constructor(private readonly interpreter: TradeInterpreter) {}

    public async summarize(record: TradeRecord): Promise<TradeSummary> {
        try {
            const answer = await this.interpreter.interpret(buildSummaryPrompt(record), {
                temperature: SUMMARY_TEMPERATURE,
                maxTokens: SUMMARY_MAX_TOKENS,
            });
            if (isUsableAnswer(answer)) {
                return { text: answer.trim(), source: 'model' };
            }
            log.warn(`no model summary for trade_id=${record.trade_id}, using fallback`);
        } catch (error) {
            log.warn(`summary failed for trade_id=${record.trade_id}: ${errorMessage(error)}`);
        }
        return { text: buildFallbackSummary(record), source: 'fallback' };
    }
}
