import { loadPipelineConfig } from './pipelineConfig';
import { ConfigValidationError } from '../errors/pipelineErrors';

describe('loadPipelineConfig', () => {
    it('falls back to offline interpretation and no email without credentials', () => {
        expect(loadPipelineConfig({})).toEqual({
            tradeLogPath: undefined,
            outputDir: undefined,
            summaryDir: undefined,
            artifactMode: 'both',
            llm: {
                provider: 'offline',
                apiKey: null,
                baseURL: 'https://api.deepseek.com',
                model: 'deepseek-chat',
                anthropicApiKey: null,
                anthropicModel: 'claude-3-5-sonnet-20240620',
                timeoutMs: 30_000,
            },
            email: null,
            ocr: { language: 'eng', langPath: undefined },
            port: 5114,
            allowedOrigins: ['http://localhost:3112', 'http://localhost:5114'],
        });
    });

    it('infers a DeepSeek-compatible provider from its key', () => {
        const config = loadPipelineConfig({ DEEPSEEK_API_KEY: 'test-secret', LLM_TIMEOUT_MS: '45000' });

        expect(config.llm).toMatchObject({
            provider: 'openai',
            apiKey: 'test-secret',
            baseURL: 'https://api.deepseek.com',
            model: 'deepseek-chat',
            timeoutMs: 45_000,
        });
    });

    it('targets OpenAI itself for a bare OpenAI key', () => {
        const config = loadPipelineConfig({ OPENAI_API_KEY: 'test-secret' });

        expect(config.llm.baseURL).toBeUndefined();
        expect(config.llm.model).toBe('gpt-4o-mini');
    });

    it('prefers Anthropic when it holds the only key', () => {
        expect(loadPipelineConfig({ ANTHROPIC_API_KEY: 'test-secret' }).llm.provider).toBe('anthropic');
    });

    it('treats blank values as unset and normalizes enum case', () => {
        const config = loadPipelineConfig({
            LLM_API_KEY: '   ',
            ARTIFACT_MODE: 'JSONL',
            LLM_PROVIDER: 'Offline',
            PORT: '',
        });

        expect(config.artifactMode).toBe('jsonl');
        expect(config.llm.provider).toBe('offline');
        expect(config.llm.apiKey).toBeNull();
        expect(config.port).toBe(5114);
        expect(config.allowedOrigins).toEqual(['http://localhost:3112', 'http://localhost:5114']);
    });

    it('allows the configured frontend origin', () => {
        expect(loadPipelineConfig({ FRONTEND_URL: 'https://journal.example.com' }).allowedOrigins).toEqual([
            'http://localhost:3112',
            'http://localhost:5114',
            'https://journal.example.com',
        ]);
    });

    it('builds email settings when SendGrid is fully configured', () => {
        const config = loadPipelineConfig({
            SENDGRID_API_KEY: 'test-secret',
            FROM_EMAIL: 'alerts@example.com',
            TO_EMAIL: 'trader@example.com',
        });

        expect(config.email).toEqual({
            apiKey: 'test-secret',
            fromEmail: 'alerts@example.com',
            toEmail: 'trader@example.com',
            timeoutMs: 15_000,
        });
    });

    it('reports every invalid field at once', () => {
        let caught: unknown;
        try {
            loadPipelineConfig({
                LLM_TIMEOUT_MS: '500',
                ARTIFACT_MODE: 'csv',
                TO_EMAIL: 'not-an-email',
            });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigValidationError);
        if (!(caught instanceof ConfigValidationError)) {
            return;
        }
        expect(caught.code).toBe('INVALID_CONFIG');
        expect(caught.issues).toHaveLength(3);
        expect(caught.issues[0]).toMatch(/^ARTIFACT_MODE: /);
        expect(caught.issues[1]).toBe('LLM_TIMEOUT_MS: Number must be greater than or equal to 1000');
        expect(caught.issues[2]).toBe('TO_EMAIL: Invalid email');
    });

    it('requires credentials for the selected provider and channel', () => {
        let caught: unknown;
        try {
            loadPipelineConfig({ LLM_PROVIDER: 'anthropic', SENDGRID_API_KEY: 'test-secret' });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigValidationError);
        if (!(caught instanceof ConfigValidationError)) {
            return;
        }
        expect(caught.issues).toEqual([
            'ANTHROPIC_API_KEY: ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic',
            'FROM_EMAIL: FROM_EMAIL is required when SENDGRID_API_KEY is set',
            'TO_EMAIL: TO_EMAIL is required when SENDGRID_API_KEY is set',
        ]);
    });

    it('rejects non-numeric timeouts', () => {
        expect(() => loadPipelineConfig({ LLM_TIMEOUT_MS: 'soon' }))
            .toThrow('Invalid configuration: LLM_TIMEOUT_MS: expected finite number, received "soon"');
    });
});
