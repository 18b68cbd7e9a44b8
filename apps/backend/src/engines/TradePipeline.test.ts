import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { NotificationOutcome, TradeRecord } from '@trade-journal/shared';
import type { TradeInterpreter, TradeNotifier } from '../agents/interfaces';
import { sentinelResponse } from '../agents/interpreterFallback';
import { NotFoundError } from '../errors/pipelineErrors';
import { TextExtractor, type OcrEngine, type OcrRecognition } from '../modules/extraction/textExtractor';
import { TradeArtifactWriter } from '../services/TradeArtifactWriter';
import { TradeStore } from '../services/TradeStore';
import { TradeSummaryService } from '../services/TradeSummaryService';
import { logger } from '../utils/logger';
import {
    NOTIFICATION_FAILED,
    NOTIFICATION_NOT_CONFIGURED,
    NOTIFICATION_NOT_REQUESTED,
    NOTIFICATION_SENT,
    PROCESSING_FAILED_BEFORE_NOTIFICATION,
    TradePipeline,
    type TradePipelineDeps,
} from './TradePipeline';

const BTC_OCR = 'BTCUSD 5m long entry 100 exit 105 pnl +5.00';
const BTC_ANSWER = '{"ticker":"BTCUSD","direction":"long","entry_price":100,"exit_price":105,"pnl":"+5.00 USD","pnl_amount":5.0}';

class FakeOcrEngine implements OcrEngine {
    constructor(private readonly failFor: string[] = []) {}

    async recognize(imagePath: string): Promise<OcrRecognition> {
        if (this.failFor.includes(path.basename(imagePath))) {
            throw new Error('engine crashed');
        }
        return {
            text: BTC_OCR,
            tokens: [
                { text: 'BTCUSD', confidence: 90 },
                { text: '5m', confidence: 80 },
                { text: '', confidence: -1 },
            ],
            imageSize: { width: 1280, height: 720 },
        };
    }
}

class ScriptedInterpreter implements TradeInterpreter {
    public name = 'scripted';
    public provider = 'offline' as const;
    public readonly prompts: string[] = [];

    constructor(private readonly answer: (prompt: string) => Promise<string>) {}

    async interpret(prompt: string): Promise<string> {
        this.prompts.push(prompt);
        return this.answer(prompt);
    }
}

class FakeNotifier implements TradeNotifier {
    public channel = 'fake';
    public readonly sent: Array<{ record: TradeRecord; summary: string }> = [];

    constructor(private readonly outcome: () => Promise<NotificationOutcome>) {}

    async notify(record: TradeRecord, summary: string): Promise<NotificationOutcome> {
        this.sent.push({ record, summary });
        return this.outcome();
    }
}

describe('TradePipeline', () => {
    let tempDir: string;
    let imageDir: string;
    let store: TradeStore;

    beforeEach(async () => {
        for (const level of ['info', 'warn', 'error', 'debug'] as const) {
            jest.spyOn(logger, level).mockImplementation(() => logger);
        }
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'trade-pipeline-'));
        imageDir = path.join(tempDir, 'shots');
        await fs.mkdir(imageDir);
        await fs.writeFile(path.join(imageDir, 'chart.png'), 'png-bytes');
        store = new TradeStore(path.join(tempDir, 'logs', 'trade_log.jsonl'));
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    function pipeline(overrides: Partial<TradePipelineDeps> = {}): TradePipeline {
        return new TradePipeline({
            extractor: new TextExtractor(new FakeOcrEngine()),
            interpreter: new ScriptedInterpreter(async () => BTC_ANSWER),
            store,
            ...overrides,
        });
    }

    it('stores a trade from a screenshot and finds it by ticker', async () => {
        const interpreter = new ScriptedInterpreter(async () => BTC_ANSWER);

        const result = await pipeline({ interpreter }).process(path.join(imageDir, 'chart.png'));

        expect(result.trade_id).toMatch(/^[0-9a-f]{8}$/);
        expect(result).toEqual({
            trade_id: result.trade_id,
            image: 'chart.png',
            ticker: 'BTCUSD',
            direction: 'long',
            pnl_amount: 5,
            confidence: 85,
            saved_files: [store.getPath()],
            interpretation_status: 'ok',
            notified: false,
            notification_status: NOTIFICATION_NOT_REQUESTED,
        });
        expect(interpreter.prompts[0]).toContain(`OCR text from chart.png:\n"""${BTC_OCR}"""`);

        const search = await store.search('BTCUSD', 10);
        expect(search.total_found).toBe(1);
        expect(search.results[0]).toMatchObject({
            trade_id: result.trade_id,
            ticker: 'BTCUSD',
            direction: 'long',
            entry_price: 100,
            exit_price: 105,
            pnl: '+5.00 USD',
            pnl_amount: 5,
            image_source: 'chart.png',
            ocr_confidence: '85.0%',
        });
    });

    it('fails on a missing image without touching the store', async () => {
        await expect(pipeline().process(path.join(imageDir, 'nope.png'))).rejects.toBeInstanceOf(NotFoundError);
        expect(await store.countRows()).toBe(0);
    });

    it('persists a default record when the model answer is not JSON', async () => {
        const result = await pipeline({
            interpreter: new ScriptedInterpreter(async () => 'Sorry, I cannot read this chart.'),
        }).process(path.join(imageDir, 'chart.png'));

        expect(result.ticker).toBe('UNKNOWN');
        expect(result.direction).toBe('unknown');
        expect(result.pnl_amount).toBe(0);
        expect(result.interpretation_status).toMatch(/^JSON parse error: /);
        expect(await store.countRows()).toBe(1);
    });

    it('reports an interpreter timeout in the result', async () => {
        const result = await pipeline({
            interpreter: new ScriptedInterpreter(async () => sentinelResponse('API request timed out')),
        }).process(path.join(imageDir, 'chart.png'));

        expect(result.interpretation_status).toBe('API request timed out');
        expect(await store.countRows()).toBe(1);
    });

    it('recovers when an interpreter throws', async () => {
        const result = await pipeline({
            interpreter: new ScriptedInterpreter(async () => {
                throw new Error('socket hang up');
            }),
        }).process(path.join(imageDir, 'chart.png'));

        expect(result.interpretation_status).toBe('API call failed');
        expect(await store.countRows()).toBe(1);
    });

    it('says so when notification is requested but no channel exists', async () => {
        const result = await pipeline().process(path.join(imageDir, 'chart.png'), true);

        expect(result.notified).toBe(false);
        expect(result.notification_status).toBe(NOTIFICATION_NOT_CONFIGURED);
    });

    it('sends the model summary through the notifier', async () => {
        const notifier = new FakeNotifier(async () => ({ success: true, detail: 'queued' }));
        const summarizer = new TradeSummaryService(new ScriptedInterpreter(async () => 'Textbook breakout.'));

        const result = await pipeline({ notifier, summarizer }).process(path.join(imageDir, 'chart.png'), true);

        expect(result.notified).toBe(true);
        expect(result.notification_status).toBe(NOTIFICATION_SENT);
        expect(result.notification_detail).toBe('queued');
        expect(notifier.sent).toHaveLength(1);
        expect(notifier.sent[0]?.summary).toBe('Textbook breakout.');
        expect(notifier.sent[0]?.record.trade_id).toBe(result.trade_id);
    });

    it('keeps the stored trade when the notifier fails', async () => {
        const failing = new FakeNotifier(async () => ({ success: false, detail: 'SendGrid responded with status 401' }));
        const throwing = new FakeNotifier(async () => {
            throw new Error('transport closed');
        });

        const first = await pipeline({ notifier: failing }).process(path.join(imageDir, 'chart.png'), true);
        const second = await pipeline({ notifier: throwing }).process(path.join(imageDir, 'chart.png'), true);

        expect(first).toMatchObject({
            notified: false,
            notification_status: NOTIFICATION_FAILED,
            notification_detail: 'SendGrid responded with status 401',
        });
        expect(second).toMatchObject({
            notified: false,
            notification_status: NOTIFICATION_FAILED,
            notification_detail: 'transport closed',
        });
        expect(await store.countRows()).toBe(2);
    });

    it('lists artifact files after the trade log', async () => {
        const artifacts = new TradeArtifactWriter({
            outputDir: path.join(tempDir, 'output'),
            summaryDir: path.join(tempDir, 'summaries'),
            now: () => new Date(2025, 6, 6, 9, 5, 7),
        });

        const result = await pipeline({ artifacts, artifactMode: 'json', generateId: () => 'cafe0001' })
            .process(path.join(imageDir, 'chart.png'));

        expect(result.saved_files).toEqual([
            store.getPath(),
            path.join(tempDir, 'output', 'trade_cafe0001_20250706_090507.json'),
        ]);
    });

    describe('processBatch', () => {
        it('processes images in name order and counts outcomes', async () => {
            await fs.writeFile(path.join(imageDir, 'a.JPG'), 'jpg-bytes');
            await fs.writeFile(path.join(imageDir, 'bad.png'), 'png-bytes');
            await fs.writeFile(path.join(imageDir, 'notes.txt'), 'not an image');
            const notifier = new FakeNotifier(async () => ({ success: true, detail: 'queued' }));

            const result = await pipeline({
                extractor: new TextExtractor(new FakeOcrEngine(['bad.png'])),
                notifier,
            }).processBatch(imageDir, true);

            expect(result.total).toBe(3);
            expect(result.ok).toBe(2);
            expect(result.fail).toBe(1);
            expect(result.notifications_sent).toBe(2);
            expect(result.notification_failures).toBe(1);
            expect(result.details.map((detail) => detail.image)).toEqual(['a.JPG', 'bad.png', 'chart.png']);
            expect(result.details[1]).toEqual({
                image: 'bad.png',
                error: 'engine crashed',
                notified: false,
                notification_status: PROCESSING_FAILED_BEFORE_NOTIFICATION,
            });
            expect(await store.countRows()).toBe(2);
        });

        it('returns zero totals for a folder without images', async () => {
            const emptyDir = path.join(tempDir, 'empty');
            await fs.mkdir(emptyDir);

            expect(await pipeline().processBatch(emptyDir)).toEqual({
                total: 0,
                ok: 0,
                fail: 0,
                details: [],
                notifications_sent: 0,
                notification_failures: 0,
            });
        });

        it('rejects a missing folder', async () => {
            await expect(pipeline().processBatch(path.join(tempDir, 'missing')))
                .rejects.toThrow(`Folder not found: ${path.join(tempDir, 'missing')}`);
        });
    });
});
