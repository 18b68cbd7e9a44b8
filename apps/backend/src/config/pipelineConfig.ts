import { z } from 'zod';
import type { InterpreterProvider } from '../agents/interfaces';
import { ConfigValidationError } from '../errors/pipelineErrors';

export type ArtifactMode = 'both' | 'json' | 'jsonl';

export const ARTIFACT_MODES: readonly ArtifactMode[] = ['both', 'json', 'jsonl'];
export const DEFAULT_PORT = 5114;
export const DEEPSEEK_BASE_URL = 'https://api.deepseek.com';
export const DEFAULT_ALLOWED_ORIGINS: readonly string[] = ['http://localhost:3112', 'http://localhost:5114'];

export interface LlmSettings {
    provider: InterpreterProvider;
    apiKey: string | null;
    baseURL?: string;
    model: string;
    anthropicApiKey: string | null;
    anthropicModel: string;
    timeoutMs: number;
}

export interface EmailSettings {
    apiKey: string;
    fromEmail: string;
    toEmail: string;
    timeoutMs: number;
}

export interface PipelineConfig {
    tradeLogPath?: string;
    outputDir?: string;
    summaryDir?: string;
    artifactMode: ArtifactMode;
    llm: LlmSettings;
    /** Null when no SendGrid key is configured; notifications are then unavailable. */
    email: EmailSettings | null;
    ocr: {
        language: string;
        langPath?: string;
    };
    port: number;
    /** Browser origins the HTTP API accepts; FRONTEND_URL is appended when set. */
    allowedOrigins: string[];
}

type Env = Record<string, string | undefined>;

const text = z.string().trim().min(1).optional();

function integerInRange(min: number, max: number) {
    return z.string().transform((input, ctx) => {
        const parsed = Number(input);
        if (!Number.isFinite(parsed)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected finite number, received "${input}"` });
            return z.NEVER;
        }
        return parsed;
    }).pipe(z.number().int().min(min).max(max)).optional();
}

const lowercaseEnum = <const T extends [string, ...string[]]>(values: T) =>
    z.string().transform((input) => input.trim().toLowerCase()).pipe(z.enum(values)).optional();

const envSchema = z.object({
    TRADE_LOG_PATH: text,
    TRADE_OUTPUT_DIR: text,
    TRADE_SUMMARY_DIR: text,
    ARTIFACT_MODE: lowercaseEnum(['both', 'json', 'jsonl']),
    LLM_PROVIDER: lowercaseEnum(['openai', 'anthropic', 'offline']),
    LLM_API_KEY: text,
    DEEPSEEK_API_KEY: text,
    OPENAI_API_KEY: text,
    LLM_BASE_URL: z.string().trim().url().optional(),
    LLM_MODEL: text,
    ANTHROPIC_API_KEY: text,
    ANTHROPIC_MODEL: text,
    LLM_TIMEOUT_MS: integerInRange(1_000, 120_000),
    SENDGRID_API_KEY: text,
    FROM_EMAIL: z.string().trim().email().optional(),
    TO_EMAIL: z.string().trim().email().optional(),
    EMAIL_TIMEOUT_MS: integerInRange(1_000, 120_000),
    OCR_LANGUAGE: text,
    OCR_LANG_PATH: text,
    PORT: integerInRange(1, 65_535),
    FRONTEND_URL: z.string().trim().url().optional(),
}).superRefine((value, ctx) => {
    const openAiKey = value.LLM_API_KEY ?? value.DEEPSEEK_API_KEY ?? value.OPENAI_API_KEY;
    if (value.LLM_PROVIDER === 'openai' && !openAiKey) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['LLM_API_KEY'],
            message: 'an API key (LLM_API_KEY, DEEPSEEK_API_KEY or OPENAI_API_KEY) is required when LLM_PROVIDER=openai',
        });
    }
    if (value.LLM_PROVIDER === 'anthropic' && !value.ANTHROPIC_API_KEY) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['ANTHROPIC_API_KEY'],
            message: 'ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic',
        });
    }
    if (value.SENDGRID_API_KEY) {
        for (const key of ['FROM_EMAIL', 'TO_EMAIL'] as const) {
            if (!value[key]) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: [key],
                    message: `${key} is required when SENDGRID_API_KEY is set`,
                });
            }
        }
    }
});

type ParsedEnv = z.infer<typeof envSchema>;

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        return `${path}${issue.message}`;
    });
}

// Blank values in .env files mean "unset".
function withoutBlanks(env: Env): Env {
    const cleaned: Env = {};
    for (const [key, value] of Object.entries(env)) {
        if (typeof value === 'string' && value.trim().length > 0) {
            cleaned[key] = value;
        }
    }
    return cleaned;
}

function resolveLlmSettings(value: ParsedEnv): LlmSettings {
    const compatibleKey = value.LLM_API_KEY ?? value.DEEPSEEK_API_KEY ?? null;
    const apiKey = compatibleKey ?? value.OPENAI_API_KEY ?? null;
    const provider: InterpreterProvider = value.LLM_PROVIDER
        ?? (apiKey ? 'openai' : value.ANTHROPIC_API_KEY ? 'anthropic' : 'offline');
    // A bare OPENAI_API_KEY targets OpenAI itself; the other keys default to DeepSeek.
    const baseURL = value.LLM_BASE_URL ?? (compatibleKey || !apiKey ? DEEPSEEK_BASE_URL : undefined);

    return {
        provider,
        apiKey,
        baseURL,
        model: value.LLM_MODEL ?? (baseURL === DEEPSEEK_BASE_URL ? 'deepseek-chat' : 'gpt-4o-mini'),
        anthropicApiKey: value.ANTHROPIC_API_KEY ?? null,
        anthropicModel: value.ANTHROPIC_MODEL ?? 'claude-3-5-sonnet-20240620',
        timeoutMs: value.LLM_TIMEOUT_MS ?? 30_000,
    };
}

function resolveEmailSettings(value: ParsedEnv): EmailSettings | null {
    if (!value.SENDGRID_API_KEY || !value.FROM_EMAIL || !value.TO_EMAIL) {
        return null;
    }
    return {
        apiKey: value.SENDGRID_API_KEY,
        fromEmail: value.FROM_EMAIL,
        toEmail: value.TO_EMAIL,
        timeoutMs: value.EMAIL_TIMEOUT_MS ?? 15_000,
    };
}

/** Validates the environment once at startup; every problem is reported together. */
export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
    const parsed = envSchema.safeParse(withoutBlanks(env));
    if (!parsed.success) {
        throw new ConfigValidationError(formatIssues(parsed.error));
    }
    const value = parsed.data;

    return {
        tradeLogPath: value.TRADE_LOG_PATH,
        outputDir: value.TRADE_OUTPUT_DIR,
        summaryDir: value.TRADE_SUMMARY_DIR,
        artifactMode: value.ARTIFACT_MODE ?? 'both',
        llm: resolveLlmSettings(value),
        email: resolveEmailSettings(value),
        ocr: {
            language: value.OCR_LANGUAGE ?? 'eng',
            langPath: value.OCR_LANG_PATH,
        },
        port: value.PORT ?? DEFAULT_PORT,
        allowedOrigins: value.FRONTEND_URL
            ? [...DEFAULT_ALLOWED_ORIGINS, value.FRONTEND_URL]
            : [...DEFAULT_ALLOWED_ORIGINS],
    };
}
