import type { TradeRecord } from '@trade-journal/shared';

const OCR_OPEN = '"""';
const OCR_BLOCK_RE = /"""([\s\S]*?)"""/;

export const EXTRACTION_KEYS = [
    'ticker',
    'timeframe',
    'entry_price',
    'exit_price',
    'direction',
    'pnl',
    'pnl_amount',
    'date_time',
    'reason_or_annotations',
] as const;

const EXAMPLE_OUTPUT = {
    ticker: 'SOLUSD',
    timeframe: '5m',
    entry_price: 150.25,
    exit_price: 151.5,
    direction: 'long',
    pnl: '+38.07 USD',
    pnl_amount: 38.07,
    date_time: '2025-07-06 14:20:58',
    reason_or_annotations: 'Quick scalp trade',
};

export function buildExtractionPrompt(ocrText: string, imageName: string): string {
    return `You are an expert trading analyst. Given OCR text from a trading screenshot, output ONLY valid JSON with the following keys:

${EXTRACTION_KEYS.join(', ')}

IMPORTANT: For pnl_amount, extract only the numeric value (e.g., if you see "+38.07 USD", output 38.07)

OCR text from ${imageName}:
${OCR_OPEN}${ocrText.split(OCR_OPEN).join('"')}${OCR_OPEN}

Example output:
${JSON.stringify(EXAMPLE_OUTPUT, null, 2)}
`;
}

/** OCR text embedded by `buildExtractionPrompt`, or null for other prompts. */
export function extractOcrBlock(prompt: string): string | null {
    const match = OCR_BLOCK_RE.exec(prompt);
    return match ? match[1] ?? '' : null;
}

export function buildSummaryPrompt(record: TradeRecord): string {
    return `You are a professional trading analyst. Analyze the following trade data and provide a concise, insightful
summary for the trader. Include assessment of the trade strategy, performance, and any recommendations.

TRADE DATA:
${JSON.stringify(record, null, 2)}

Your analysis should:
1. Provide a brief overview of the trade (symbol, direction, price points)
2. Analyze the trade's performance
3. Highlight what went well or could be improved
4. Suggest any follow-up actions or patterns to watch for

Write in a professional, concise manner. Use no more than 300 words.
`;
}
