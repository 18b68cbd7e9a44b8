import { DecodeError, errorMessage } from '../../errors/pipelineErrors';
import { fail, ok, type Result } from '../../utils/result';

export type DecodedMapping = Record<string, unknown>;

export type DecodeResult = Result<DecodedMapping, DecodeError>;

const FENCE = '```';
const FENCED_BLOCK_RE = /^```[A-Za-z0-9_+-]*[ \t]*\r?\n?([\s\S]*?)\r?\n?```\s*$/;

/**
 * Fields downstream consumers rely on when the model output could not be
 * decoded. Kept in sync with the interpreter's own error payloads.
 */
export const SENTINEL_DEFAULTS = {
    ticker: 'UNKNOWN',
    direction: 'unknown',
    pnl_amount: 0,
} as const;

export function isMapping(value: unknown): value is DecodedMapping {
    return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Removes a leading fence line (with an optional language tag) and the
 * trailing fence. Input that does not open with a fence is only trimmed.
 */
export function stripCodeFence(input: string): string {
    const trimmed = input.trim();
    if (!trimmed.startsWith(FENCE)) {
        return trimmed;
    }

    const block = FENCED_BLOCK_RE.exec(trimmed);
    if (block) {
        return (block[1] ?? '').trim();
    }

    // Opening fence without a closing one: drop the fence line only.
    const newline = trimmed.indexOf('\n');
    return newline === -1 ? '' : trimmed.slice(newline + 1).trim();
}

function parseMapping(candidate: string, original: string): DecodeResult {
    let parsed: unknown;
    try {
        parsed = JSON.parse(candidate);
    } catch (error) {
        return fail(new DecodeError(`JSON parse error: ${errorMessage(error)}`, original, error));
    }
    if (!isMapping(parsed)) {
        const kind = Array.isArray(parsed) ? 'array' : parsed === null ? 'null' : typeof parsed;
        return fail(new DecodeError(`Expected a JSON object, received ${kind}`, original));
    }
    return ok(parsed);
}

function outermostObjectSpan(text: string): string | null {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    return start !== -1 && end > start ? text.slice(start, end + 1) : null;
}

export function decodeModelOutput(raw: string): DecodeResult {
    const cleaned = stripCodeFence(raw);
    const direct = parseMapping(cleaned, raw);
    if (direct.ok) {
        return direct;
    }

    // Prose around the object ("Here is the JSON: {...}").
    const span = outermostObjectSpan(cleaned);
    if (span !== null && span !== cleaned) {
        const embedded = parseMapping(span, raw);
        if (embedded.ok) {
            return embedded;
        }
    }
    return direct;
}

/**
 * Never throws. A decode failure yields a mapping carrying `error` plus the
 * safe defaults the normalizer expects.
 */
export function decodeOrSentinel(raw: string): DecodedMapping {
    const result = decodeModelOutput(raw);
    if (result.ok) {
        return result.value;
    }
    return {
        error: result.error.message,
        ...SENTINEL_DEFAULTS,
    };
}

export function decodedError(mapping: DecodedMapping): string | null {
    const value = mapping.error;
    if (typeof value === 'string' && value.trim().length > 0) {
        return value.trim();
    }
    return null;
}
