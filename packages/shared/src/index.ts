export type {
    BatchItemResult,
    BatchResult,
    ExtractionMetadata,
    ExtractionResult,
    ImageSize,
    NotificationOutcome,
    PipelineResult,
    PnlHistoryPoint,
    TradeLogRow,
    TradeRecord,
    TradeSearchResult,
    TradeStatistics,
} from './types/trade-record';
