import type { TradeInterpreter, TradeNotifier } from '../agents/interfaces';
import { createInterpreter } from '../agents/interpreterFactory';
import type { PipelineConfig } from '../config/pipelineConfig';
import { TradePipeline } from '../engines/TradePipeline';
import { TextExtractor, type OcrEngine } from '../modules/extraction/textExtractor';
import { EmailNotifier } from './EmailNotifier';
import { TesseractOcrEngine } from './TesseractOcrEngine';
import { TradeArtifactWriter } from './TradeArtifactWriter';
import { TradeStore } from './TradeStore';
import { TradeSummaryService } from './TradeSummaryService';

export interface TradeServices {
    store: TradeStore;
    interpreter: TradeInterpreter;
    notifier: TradeNotifier | null;
    pipeline: TradePipeline;
}

export interface TradeServiceOverrides {
    ocrEngine?: OcrEngine;
    interpreter?: TradeInterpreter;
    artifactMode?: PipelineConfig['artifactMode'];
}

/** Wires the pipeline and its collaborators from validated configuration. */
export function createTradeServices(config: PipelineConfig, overrides: TradeServiceOverrides = {}): TradeServices {
    const store = new TradeStore(config.tradeLogPath);
    const interpreter = overrides.interpreter ?? createInterpreter(config.llm);
    const notifier = config.email ? new EmailNotifier(config.email) : null;
    const ocrEngine = overrides.ocrEngine ?? new TesseractOcrEngine(config.ocr);

    const pipeline = new TradePipeline({
        extractor: new TextExtractor(ocrEngine),
        interpreter,
        store,
        artifacts: new TradeArtifactWriter({ outputDir: config.outputDir, summaryDir: config.summaryDir }),
        artifactMode: overrides.artifactMode ?? config.artifactMode,
        summarizer: new TradeSummaryService(interpreter),
        notifier,
    });

    return { store, interpreter, notifier, pipeline };
}
