import type { NotificationOutcome, TradeRecord } from '@trade-journal/shared';

export type InterpreterProvider = 'openai' | 'anthropic' | 'offline';

export interface InterpretOptions {
    temperature?: number;
    maxTokens?: number;
}

/**
 * Turns a prompt into raw model text. Implementations never throw: a timeout,
 * transport error or empty answer comes back as a sentinel JSON string.
 */
export interface TradeInterpreter {
    name: string;
    provider: InterpreterProvider;
    interpret(prompt: string, options?: InterpretOptions): Promise<string>;
}

export interface TradeNotifier {
    channel: string;
    notify(record: TradeRecord, summary: string): Promise<NotificationOutcome>;
}
