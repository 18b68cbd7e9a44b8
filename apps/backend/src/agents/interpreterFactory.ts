import type { TradeInterpreter } from './interfaces';
import { AnthropicInterpreter } from './AnthropicInterpreter';
import { OfflineInterpreter } from './OfflineInterpreter';
import { OpenAIInterpreter } from './OpenAIInterpreter';
import type { LlmSettings } from '../config/pipelineConfig';
import { forComponent, logger } from '../utils/logger';

const log = forComponent('Interpreter');

export function createInterpreter(settings: LlmSettings): TradeInterpreter {
    if (settings.provider === 'openai' && settings.apiKey) {
        log.info(`using OpenAI-compatible model ${settings.model}${settings.baseURL ? ` at ${settings.baseURL}` : ''}`);
        return new OpenAIInterpreter({
            name: settings.model,
            model: settings.model,
            apiKey: settings.apiKey,
            baseURL: settings.baseURL,
            timeoutMs: settings.timeoutMs,
        });
    }

    if (settings.provider === 'anthropic' && settings.anthropicApiKey) {
        log.info(`using Anthropic model ${settings.anthropicModel}`);
        return new AnthropicInterpreter({
            name: settings.anthropicModel,
            model: settings.anthropicModel,
            apiKey: settings.anthropicApiKey,
            timeoutMs: settings.timeoutMs,
        });
    }

    logger.warn('[Interpreter] no model credentials configured, using offline extraction');
    return new OfflineInterpreter();
}
