import fs, { type FileHandle } from 'fs/promises';
import path from 'path';
import type { TradeLogRow, TradeRecord, TradeSearchResult, TradeStatistics } from '@trade-journal/shared';
import { CorruptLineError, errorMessage } from '../errors/pipelineErrors';
import { isMapping } from '../modules/decode/tolerantJsonDecoder';
import { computeTradeStatistics } from '../modules/stats/tradeStatistics';
import { forComponent } from '../utils/logger';
import { fail, ok, type Result } from '../utils/result';

const log = forComponent('TradeStore');

export const DEFAULT_TRADE_LOG_PATH = path.join('logs', 'trade_log.jsonl');
export const DEFAULT_SEARCH_LIMIT = 10;
const APP_ROOT = path.resolve(__dirname, '..', '..');

export interface TradeLogScan {
    rows: TradeLogRow[];
    corrupt: CorruptLineError[];
}

export interface TradeStoreOptions {
    onCorruptLine?: (error: CorruptLineError) => void;
}

export function resolveTradeLogPath(filePath?: string): string {
    const configured = (filePath || '').trim();
    if (configured.length === 0) {
        return path.resolve(APP_ROOT, DEFAULT_TRADE_LOG_PATH);
    }
    return path.isAbsolute(configured) ? configured : path.resolve(APP_ROOT, configured);
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function parseLine(line: string, lineNumber: number): Result<TradeLogRow, CorruptLineError> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(line);
    } catch (error) {
        return fail(new CorruptLineError(lineNumber, line, errorMessage(error)));
    }
    if (!isMapping(parsed)) {
        return fail(new CorruptLineError(lineNumber, line, 'not a JSON object'));
    }
    return ok(parsed);
}

function clampLimit(limit: number): number {
    if (!Number.isFinite(limit)) {
        return DEFAULT_SEARCH_LIMIT;
    }
    return Math.max(1, Math.floor(limit));
}

/**
 * Append-only JSONL trade log. Writes from this process go through a single
 * promise chain; concurrent writers in other processes are not coordinated.
 */
export class TradeStore {
    private readonly filePath: string;
    private readonly onCorruptLine?: (error: CorruptLineError) => void;
    private initialized = false;
    private writeQueue: Promise<void> = Promise.resolve();

    constructor(filePath?: string, options: TradeStoreOptions = {}) {
        this.filePath = resolveTradeLogPath(filePath);
        this.onCorruptLine = options.onCorruptLine;
    }

    public async init(): Promise<void> {
        if (this.initialized) {
            return;
        }
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        this.initialized = true;
        log.info(`trade log at ${this.filePath}`);
    }

    public getPath(): string {
        return this.filePath;
    }

    public async append(record: TradeRecord): Promise<void> {
        const line = `${JSON.stringify(record)}\n`;
        await this.enqueue('append trade', async () => {
            const separator = await this.endsMidLine() ? '\n' : '';
            if (separator) {
                log.warn(`${this.filePath} ends without a newline, starting a fresh line`);
            }
            await fs.appendFile(this.filePath, `${separator}${line}`, { encoding: 'utf8' });
        });
        log.debug(`appended trade_id=${record.trade_id}`);
    }

    /** Replaces the whole log. Only the offline clean pass calls this. */
    public async rewrite(records: TradeRecord[]): Promise<void> {
        const body = records.map((record) => `${JSON.stringify(record)}\n`).join('');
        const tempPath = `${this.filePath}.tmp`;
        await this.enqueue('rewrite trade log', async () => {
            await fs.writeFile(tempPath, body, { encoding: 'utf8' });
            await fs.rename(tempPath, this.filePath);
        });
        log.info(`rewrote ${records.length} trades to ${this.filePath}`);
    }

    public async readAll(): Promise<TradeLogRow[]> {
        return (await this.scan()).rows;
    }

    /** Every parsable row plus the lines that were skipped. */
    public async scan(): Promise<TradeLogScan> {
        await this.writeQueue;
        let content = '';
        try {
            content = await fs.readFile(this.filePath, 'utf8');
        } catch (error) {
            if (isMissingFile(error)) {
                return { rows: [], corrupt: [] };
            }
            throw error;
        }

        const scan: TradeLogScan = { rows: [], corrupt: [] };
        const lines = content.split('\n');
        for (let index = 0; index < lines.length; index += 1) {
            const line = (lines[index] ?? '').trim();
            if (line.length === 0) {
                continue;
            }
            const parsed = parseLine(line, index + 1);
            if (parsed.ok) {
                scan.rows.push(parsed.value);
                continue;
            }
            scan.corrupt.push(parsed.error);
            this.reportCorrupt(parsed.error);
        }
        return scan;
    }

    public async search(query = '', limit = DEFAULT_SEARCH_LIMIT): Promise<TradeSearchResult> {
        const rows = await this.readAll();
        const needle = query.toLowerCase();
        const matches = needle.length === 0
            ? rows
            : rows.filter((row) => JSON.stringify(row).toLowerCase().includes(needle));

        return {
            results: matches.slice(-clampLimit(limit)),
            total_found: matches.length,
            total_trades: rows.length,
        };
    }

    public async computeStatistics(): Promise<TradeStatistics> {
        return computeTradeStatistics(await this.readAll());
    }

    public async countRows(): Promise<number> {
        return (await this.readAll()).length;
    }

    /** True when an interrupted write left the last line without its newline. */
    private async endsMidLine(): Promise<boolean> {
        let handle: FileHandle;
        try {
            handle = await fs.open(this.filePath, 'r');
        } catch (error) {
            if (isMissingFile(error)) {
                return false;
            }
            throw error;
        }
        try {
            const { size } = await handle.stat();
            if (size === 0) {
                return false;
            }
            const lastByte = Buffer.alloc(1);
            await handle.read(lastByte, 0, 1, size - 1);
            return lastByte[0] !== 0x0a;
        } finally {
            await handle.close();
        }
    }

    private reportCorrupt(error: CorruptLineError): void {
        log.warn(`${error.message} path=${this.filePath}`);
        this.onCorruptLine?.(error);
    }

    private async enqueue(label: string, work: () => Promise<void>): Promise<void> {
        const task = this.writeQueue.then(async () => {
            if (!this.initialized) {
                await this.init();
            }
            await work();
        });
        this.writeQueue = task.catch((error) => {
            log.error(`failed to ${label}: ${errorMessage(error)}`);
        });
        await task;
    }
}
