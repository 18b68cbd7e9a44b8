export interface ImageSize {
    width: number;
    height: number;
}

export interface ExtractionMetadata {
    confidence: number; // 0-100
    total_words: number;
    image_size: ImageSize;
}

export interface ExtractionResult {
    text: string;
    metadata: ExtractionMetadata;
}

/**
 * Canonical trade row as persisted in the JSONL trade log.
 * The key set is fixed: absent values are `null`, never omitted.
 */
export interface TradeRecord {
    trade_id: string;
    ticker: string;
    timeframe: string | null;
    entry_price: number;
    exit_price: number;
    direction: string;
    pnl: string | null;
    pnl_amount: number;
    date_time: string;
    logged_at: string;
    image_source: string | null;
    reason_or_annotations: string | null;
    ocr_confidence: string | null;
}

// Rows read back from the log may predate the canonical schema.
export type TradeLogRow = Record<string, unknown>;

export interface TradeSearchResult {
    results: TradeLogRow[];
    total_found: number;
    total_trades: number;
}

export interface PnlHistoryPoint {
    date: string;
    pnl: number;
    ticker: string;
}

export interface TradeStatistics {
    total_trades: number;
    trades_with_pnl: number;
    win_rate: number | null;
    winning_trades: number;
    losing_trades: number;
    total_pnl: number | null;
    average_pnl: number | null;
    best_trade: number | null;
    worst_trade: number | null;
    unique_tickers: number;
    tickers: string[];
    directions: Record<string, number>;
    pnl_history: PnlHistoryPoint[];
    latest_trade: TradeLogRow | null;
}

export interface NotificationOutcome {
    success: boolean;
    detail: string;
}

export interface PipelineResult {
    trade_id: string;
    image: string;
    ticker: string;
    direction: string;
    pnl_amount: number;
    confidence: number;
    saved_files: string[];
    interpretation_status: string;
    notified: boolean;
    notification_status: string;
    notification_detail?: string;
}

export type BatchItemResult =
    | PipelineResult
    | {
        image: string;
        error: string;
        notified: false;
        notification_status: string;
    };

export interface BatchResult {
    total: number;
    ok: number;
    fail: number;
    details: BatchItemResult[];
    notifications_sent: number;
    notification_failures: number;
}
