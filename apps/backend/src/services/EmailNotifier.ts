import axios, { isAxiosError } from 'axios';
import type { NotificationOutcome, TradeRecord } from '@trade-journal/shared';
import type { TradeNotifier } from '../agents/interfaces';
import type { EmailSettings } from '../config/pipelineConfig';
import { errorMessage } from '../errors/pipelineErrors';
import { forComponent } from '../utils/logger';

const log = forComponent('EmailNotifier');

export const SENDGRID_SEND_URL = 'https://api.sendgrid.com/v3/mail/send';
const NO_SUMMARY = 'No summary available';

export interface TradeEmail {
    subject: string;
    text: string;
    html: string;
}

/** Printable ASCII plus line breaks and tabs; backslashes are dropped. */
export function cleanTextForEmail(input: unknown): string {
    if (input === undefined || input === null) {
        return '';
    }
    let cleaned = '';
    for (const char of String(input)) {
        const code = char.charCodeAt(0);
        if ((code >= 32 && code <= 126) || char === '\n' || char === '\r' || char === '\t') {
            cleaned += char;
        }
    }
    return cleaned.split('\\').join('').trim();
}

export function escapeHtml(input: string): string {
    return input
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

function price(value: number): string {
    return value > 0 ? `$${value}` : 'N/A';
}

function resultClass(pnlAmount: number): string {
    if (pnlAmount > 0) {
        return 'profit';
    }
    return pnlAmount < 0 ? 'loss' : 'neutral';
}

export function buildTradeEmail(record: TradeRecord, summary: string): TradeEmail {
    const cleanedSummary = cleanTextForEmail(summary) || NO_SUMMARY;
    const details: Array<[string, string]> = [
        ['Symbol', record.ticker],
        ['Date & Time', record.date_time],
        ['Timeframe', record.timeframe ?? 'N/A'],
        ['Direction', record.direction.toUpperCase()],
        ['Entry Price', price(record.entry_price)],
        ['Exit Price', price(record.exit_price)],
        ['Result', record.pnl ?? 'N/A'],
    ];

    const text = [
        'TRADE EXECUTION SUMMARY',
        '=======================',
        '',
        `Trade ID: ${record.trade_id}`,
        ...details.map(([label, value]) => `${label}: ${value}`),
        '',
        'ANALYSIS SUMMARY:',
        cleanedSummary,
        '',
        '---',
        'Generated by the trade journal pipeline. For informational purposes only.',
    ].join('\n');

    const rows = details.map(([label, value]) => {
        const css = label === 'Result' ? ` class="${resultClass(record.pnl_amount)}"` : '';
        return `<tr><th align="left">${escapeHtml(label)}</th><td${css}>${escapeHtml(value)}</td></tr>`;
    }).join('\n');

    const html = `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>Trade Summary</title>
<style>
body { font-family: Helvetica, Arial, sans-serif; background: #f5f5f5; padding: 20px; }
.container { max-width: 600px; margin: 0 auto; background: #ffffff; border-radius: 8px; padding: 24px; }
.profit { color: #28a745; font-weight: bold; }
.loss { color: #dc3545; font-weight: bold; }
.neutral { color: #6c757d; font-weight: bold; }
.summary { background: #e3f2fd; border-left: 4px solid #2196f3; padding: 16px; white-space: pre-wrap; }
</style>
</head>
<body>
<div class="container">
<h1>Trade Execution Summary</h1>
<p>Trade ID: ${escapeHtml(record.trade_id)}</p>
<table width="100%">
${rows}
</table>
<h3>Analysis Summary</h3>
<div class="summary">${escapeHtml(cleanedSummary)}</div>
</div>
</body>
</html>`;

    return {
        subject: `Trade Alert: ${record.ticker} - ${record.pnl_amount > 0 ? 'PROFIT' : 'INFO'}`,
        text: cleanTextForEmail(text),
        html,
    };
}

/** Sends trade alerts through the SendGrid v3 REST API. */
export class EmailNotifier implements TradeNotifier {
    public readonly channel = 'email';

    constructor(private readonly settings: EmailSettings) {}

    private describeFailure(error: unknown): string {
        if (isAxiosError(error)) {
            if (error.response) {
                return `SendGrid responded with status ${error.response.status}`;
            }
            if (error.code === 'ECONNABORTED') {
                return `SendGrid request timed out after ${this.settings.timeoutMs}ms`;
            }
        }
        return `SendGrid request failed: ${errorMessage(error)}`;
    }

    public async notify(record: TradeRecord, summary: string): Promise<NotificationOutcome> {
        const { apiKey, fromEmail, toEmail } = this.settings;
        if (!apiKey.trim() || !fromEmail.trim() || !toEmail.trim()) {
            return {
                success: false,
                detail: 'Missing required email settings (SENDGRID_API_KEY, FROM_EMAIL, TO_EMAIL)',
            };
        }

        const email = buildTradeEmail(record, summary);
        try {
            const response = await axios.post(SENDGRID_SEND_URL, {
                personalizations: [{ to: [{ email: toEmail }] }],
                from: { email: fromEmail },
                subject: email.subject,
                content: [
                    { type: 'text/plain', value: email.text },
                    { type: 'text/html', value: email.html },
                ],
            }, {
                headers: {
                    Authorization: `Bearer ${apiKey}`,
                    'Content-Type': 'application/json',
                },
                timeout: this.settings.timeoutMs,
            });
            log.info(`sent trade_id=${record.trade_id} to ${toEmail} status=${response.status}`);
            return { success: true, detail: `Email sent to ${toEmail} (status ${response.status})` };
        } catch (error) {
            const detail = this.describeFailure(error);
            log.warn(`send failed for trade_id=${record.trade_id}: ${detail}`);
            return { success: false, detail };
        }
    }
}
