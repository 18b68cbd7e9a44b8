import fs from 'fs/promises';
import path from 'path';
import type {
    BatchItemResult,
    BatchResult,
    ExtractionResult,
    PipelineResult,
    TradeRecord,
} from '@trade-journal/shared';
import type { TradeInterpreter, TradeNotifier } from '../agents/interfaces';
import { sentinelResponse } from '../agents/interpreterFallback';
import { buildExtractionPrompt } from '../agents/prompts';
import type { ArtifactMode } from '../config/pipelineConfig';
import { errorMessage, NotFoundError } from '../errors/pipelineErrors';
import { decodedError, decodeOrSentinel } from '../modules/decode/tolerantJsonDecoder';
import { normalizeTradeRecord } from '../modules/normalize/tradeRecordNormalizer';
import type { TradeArtifactWriter } from '../services/TradeArtifactWriter';
import type { TradeStore } from '../services/TradeStore';
import { buildFallbackSummary, type TradeSummaryService } from '../services/TradeSummaryService';
import { forComponent } from '../utils/logger';

const log = forComponent('TradePipeline');

export const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.bmp', '.gif', '.tiff']);

export const NOTIFICATION_NOT_REQUESTED = 'Notification not requested';
export const NOTIFICATION_NOT_CONFIGURED = 'Notification channel not configured';
export const NOTIFICATION_SENT = 'Notification sent';
export const NOTIFICATION_FAILED = 'Notification failed';
export const PROCESSING_FAILED_BEFORE_NOTIFICATION = 'Processing failed before notification';

export interface TextSource {
    extract(imagePath: string): Promise<ExtractionResult>;
}

export interface TradePipelineDeps {
    extractor: TextSource;
    interpreter: TradeInterpreter;
    store: TradeStore;
    artifacts?: TradeArtifactWriter;
    artifactMode?: ArtifactMode;
    summarizer?: TradeSummaryService;
    notifier?: TradeNotifier | null;
    now?: () => Date;
    generateId?: () => string;
}

type NotificationFields = Pick<PipelineResult, 'notified' | 'notification_status' | 'notification_detail'>;

export class TradePipeline {
    constructor(private readonly deps: TradePipelineDeps) {}

    /**
     * One screenshot in, one stored trade out. A missing image is the only
     * failure that escapes; model and notification problems are reported in
     * the result.
     */
    public async process(imagePath: string, sendNotification = false): Promise<PipelineResult> {
        const imageName = path.basename(imagePath);
        const extraction = await this.deps.extractor.extract(imagePath);

        const raw = await this.interpret(buildExtractionPrompt(extraction.text, imageName));
        const mapping = decodeOrSentinel(raw);
        const interpretationError = decodedError(mapping);
        if (interpretationError) {
            log.warn(`${imageName}: interpretation degraded (${interpretationError})`);
        }

        const record = normalizeTradeRecord(mapping, {
            imageName,
            metadata: extraction.metadata,
            now: this.deps.now?.(),
            generateId: this.deps.generateId,
        });

        await this.deps.store.append(record);
        const savedFiles = [this.deps.store.getPath(), ...await this.writeArtifacts(record)];
        log.info(`stored trade_id=${record.trade_id} ticker=${record.ticker} pnl_amount=${record.pnl_amount}`);

        return {
            trade_id: record.trade_id,
            image: imageName,
            ticker: record.ticker,
            direction: record.direction,
            pnl_amount: record.pnl_amount,
            confidence: extraction.metadata.confidence,
            saved_files: savedFiles,
            interpretation_status: interpretationError ?? 'ok',
            ...await this.notify(record, sendNotification),
        };
    }

    /** Processes every image in `folder`, in file-name order, one at a time. */
    public async processBatch(folder: string, sendNotification = false): Promise<BatchResult> {
        let entries: string[];
        try {
            const stats = await fs.stat(folder);
            if (!stats.isDirectory()) {
                throw new NotFoundError(folder, `Folder not found: ${folder}`);
            }
            entries = await fs.readdir(folder);
        } catch (error) {
            if (error instanceof NotFoundError) {
                throw error;
            }
            throw new NotFoundError(folder, `Folder not found: ${folder}`);
        }

        const images = entries
            .filter((entry) => IMAGE_EXTENSIONS.has(path.extname(entry).toLowerCase()))
            .sort();

        const result: BatchResult = {
            total: images.length,
            ok: 0,
            fail: 0,
            details: [],
            notifications_sent: 0,
            notification_failures: 0,
        };

        for (const image of images) {
            let detail: BatchItemResult;
            try {
                const processed = await this.process(path.join(folder, image), sendNotification);
                detail = processed;
                result.ok += 1;
                if (sendNotification) {
                    if (processed.notified) {
                        result.notifications_sent += 1;
                    } else {
                        result.notification_failures += 1;
                    }
                }
            } catch (error) {
                log.error(`batch item ${image} failed: ${errorMessage(error)}`);
                detail = {
                    image,
                    error: errorMessage(error),
                    notified: false,
                    notification_status: sendNotification
                        ? PROCESSING_FAILED_BEFORE_NOTIFICATION
                        : NOTIFICATION_NOT_REQUESTED,
                };
                result.fail += 1;
                if (sendNotification) {
                    result.notification_failures += 1;
                }
            }
            result.details.push(detail);
        }

        log.info(`batch ${folder}: ok=${result.ok} fail=${result.fail} total=${result.total}`);
        return result;
    }

    private async interpret(prompt: string): Promise<string> {
        try {
            return await this.deps.interpreter.interpret(prompt);
        } catch (error) {
            log.error(`interpreter ${this.deps.interpreter.name} threw: ${errorMessage(error)}`);
            return sentinelResponse('API call failed');
        }
    }

    private async writeArtifacts(record: TradeRecord): Promise<string[]> {
        if (!this.deps.artifacts) {
            return [];
        }
        try {
            return await this.deps.artifacts.write(record, this.deps.artifactMode ?? 'both');
        } catch (error) {
            log.error(`artifact write failed for trade_id=${record.trade_id}: ${errorMessage(error)}`);
            return [];
        }
    }

    private async notify(record: TradeRecord, requested: boolean): Promise<NotificationFields> {
        if (!requested) {
            return { notified: false, notification_status: NOTIFICATION_NOT_REQUESTED };
        }
        const notifier = this.deps.notifier;
        if (!notifier) {
            return { notified: false, notification_status: NOTIFICATION_NOT_CONFIGURED };
        }

        try {
            const summary = this.deps.summarizer
                ? (await this.deps.summarizer.summarize(record)).text
                : buildFallbackSummary(record);
            const outcome = await notifier.notify(record, summary);
            return {
                notified: outcome.success,
                notification_status: outcome.success ? NOTIFICATION_SENT : NOTIFICATION_FAILED,
                notification_detail: outcome.detail,
            };
        } catch (error) {
            log.error(`${notifier.channel} notification threw for trade_id=${record.trade_id}: ${errorMessage(error)}`);
            return {
                notified: false,
                notification_status: NOTIFICATION_FAILED,
                notification_detail: errorMessage(error),
            };
        }
    }
}
