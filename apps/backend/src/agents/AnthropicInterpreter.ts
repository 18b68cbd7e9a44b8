import Anthropic from '@anthropic-ai/sdk';
import type { InterpretOptions, TradeInterpreter } from './interfaces';
import { runInterpreterCall } from './interpreterFallback';
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from './OpenAIInterpreter';

export interface AnthropicInterpreterSettings {
    name: string;
    model: string;
    apiKey: string;
    timeoutMs: number;
}

export class AnthropicInterpreter implements TradeInterpreter {
    private client: Anthropic;
    public name: string;
    public provider = 'anthropic' as const;
    private model: string;
    private timeoutMs: number;

    constructor(settings: AnthropicInterpreterSettings) {
        this.name = settings.name;
        this.model = settings.model;
        this.timeoutMs = settings.timeoutMs;
        this.client = new Anthropic({
            apiKey: settings.apiKey,
            timeout: settings.timeoutMs,
            maxRetries: 0,
        });
    }

    async interpret(prompt: string, options: InterpretOptions = {}): Promise<string> {
        return runInterpreterCall(this.name, this.timeoutMs, async (signal) => {
            const msg = await this.client.messages.create({
                model: this.model,
                max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
                temperature: options.temperature ?? DEFAULT_TEMPERATURE,
                messages: [{ role: 'user', content: prompt }],
            }, { signal });

            return msg.content
                .map((block) => (block.type === 'text' ? block.text : ''))
                .join('');
        });
    }
}
