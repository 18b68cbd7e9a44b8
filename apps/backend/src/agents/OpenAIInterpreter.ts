import OpenAI from 'openai';
import type { InterpretOptions, TradeInterpreter } from './interfaces';
import { runInterpreterCall } from './interpreterFallback';

export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_MAX_TOKENS = 500;

export interface OpenAIInterpreterSettings {
    name: string;
    model: string;
    apiKey: string;
    /** OpenAI-compatible endpoint, e.g. DeepSeek. */
    baseURL?: string;
    timeoutMs: number;
}

export class OpenAIInterpreter implements TradeInterpreter {
    private client: OpenAI;
    public name: string;
    public provider = 'openai' as const;
    private model: string;
    private timeoutMs: number;

    constructor(settings: OpenAIInterpreterSettings) {
        this.name = settings.name;
        this.model = settings.model;
        this.timeoutMs = settings.timeoutMs;
        this.client = new OpenAI({
            apiKey: settings.apiKey,
            baseURL: settings.baseURL,
            timeout: settings.timeoutMs,
            maxRetries: 0,
        });
    }

    async interpret(prompt: string, options: InterpretOptions = {}): Promise<string> {
        return runInterpreterCall(this.name, this.timeoutMs, async (signal) => {
            const completion = await this.client.chat.completions.create({
                model: this.model,
                messages: [{ role: 'user', content: prompt }],
                temperature: options.temperature ?? DEFAULT_TEMPERATURE,
                max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
            }, { signal });

            return completion.choices[0]?.message.content ?? '';
        });
    }
}
