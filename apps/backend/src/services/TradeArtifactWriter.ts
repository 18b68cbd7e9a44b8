import fs from 'fs/promises';
import path from 'path';
import type { TradeLogRow, TradeRecord } from '@trade-journal/shared';
import type { ArtifactMode } from '../config/pipelineConfig';
import { isMapping } from '../modules/decode/tolerantJsonDecoder';
import { renderProcessingTime } from '../modules/normalize/tradeFieldCoercion';
import { forComponent } from '../utils/logger';

const log = forComponent('TradeArtifactWriter');

const APP_ROOT = path.resolve(__dirname, '..', '..');

export interface DailySummary {
    date: string;
    trades: TradeLogRow[];
    total_trades: number;
    total_pnl: number;
    created_at: string;
    updated_at: string;
}

export interface TradeArtifactWriterOptions {
    outputDir?: string;
    summaryDir?: string;
    now?: () => Date;
}

function resolveDir(configured: string | undefined, fallback: string): string {
    const value = (configured || '').trim() || fallback;
    return path.isAbsolute(value) ? value : path.resolve(APP_ROOT, value);
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

function localDay(now: Date): string {
    return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

function fileStamp(now: Date): string {
    return `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_`
        + `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
}

function sumPnl(trades: TradeLogRow[]): number {
    return trades.reduce((sum, trade) => {
        const amount = trade.pnl_amount;
        return sum + (typeof amount === 'number' && Number.isFinite(amount) ? amount : 0);
    }, 0);
}

function parseDailySummary(content: string, filePath: string): { trades: TradeLogRow[]; created_at?: string } {
    const parsed: unknown = JSON.parse(content);
    if (!isMapping(parsed) || !Array.isArray(parsed.trades)) {
        throw new Error(`daily summary ${filePath} is not a summary object`);
    }
    return {
        trades: parsed.trades.filter(isMapping),
        created_at: typeof parsed.created_at === 'string' ? parsed.created_at : undefined,
    };
}

/**
 * Secondary copies of each trade: one pretty-printed file per trade and a
 * per-day roll-up. The JSONL log stays the source of truth.
 */
export class TradeArtifactWriter {
    private readonly outputDir: string;
    private readonly summaryDir: string;
    private readonly now: () => Date;
    private writeQueue: Promise<void> = Promise.resolve();

    constructor(options: TradeArtifactWriterOptions = {}) {
        this.outputDir = resolveDir(options.outputDir, 'output');
        this.summaryDir = resolveDir(options.summaryDir, 'summaries');
        this.now = options.now ?? (() => new Date());
    }

    public async write(record: TradeRecord, mode: ArtifactMode): Promise<string[]> {
        const task = this.writeQueue.then(async () => {
            const saved: string[] = [];
            const now = this.now();
            if (mode === 'both' || mode === 'json') {
                saved.push(await this.writeTradeFile(record, now));
            }
            if (mode === 'both' || mode === 'jsonl') {
                saved.push(await this.updateDailySummary(record, now));
            }
            return saved;
        });
        this.writeQueue = task.then(() => undefined, () => undefined);
        return task;
    }

    private async writeTradeFile(record: TradeRecord, now: Date): Promise<string> {
        await fs.mkdir(this.outputDir, { recursive: true });
        const filePath = path.join(this.outputDir, `trade_${record.trade_id}_${fileStamp(now)}.json`);
        await fs.writeFile(filePath, JSON.stringify(record, null, 2), { encoding: 'utf8' });
        log.debug(`wrote ${filePath}`);
        return filePath;
    }

    private async updateDailySummary(record: TradeRecord, now: Date): Promise<string> {
        await fs.mkdir(this.summaryDir, { recursive: true });
        const day = localDay(now);
        const filePath = path.join(this.summaryDir, `daily_summary_${day}.json`);
        const stamp = renderProcessingTime(now);

        let existing: { trades: TradeLogRow[]; created_at?: string } = { trades: [] };
        try {
            existing = parseDailySummary(await fs.readFile(filePath, 'utf8'), filePath);
        } catch (error) {
            if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
                throw error;
            }
        }

        const trades = [...existing.trades, { ...record }];
        const summary: DailySummary = {
            date: day,
            trades,
            total_trades: trades.length,
            total_pnl: sumPnl(trades),
            created_at: existing.created_at ?? stamp,
            updated_at: stamp,
        };
        await fs.writeFile(filePath, JSON.stringify(summary, null, 2), { encoding: 'utf8' });
        log.debug(`${filePath} now holds ${trades.length} trades`);
        return filePath;
    }
}
