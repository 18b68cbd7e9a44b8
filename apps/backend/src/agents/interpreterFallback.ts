import { EmptyResponseError, errorMessage, TimeoutError } from '../errors/pipelineErrors';
import { SENTINEL_DEFAULTS } from '../modules/decode/tolerantJsonDecoder';
import { callWithTimeout } from '../utils/timeout';
import { logger } from '../utils/logger';

export function sentinelResponse(reason: string): string {
    return JSON.stringify({ error: reason, ...SENTINEL_DEFAULTS });
}

function httpStatus(error: unknown): number | null {
    if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return null;
}

export function describeInterpreterFailure(error: unknown): string {
    if (error instanceof TimeoutError) {
        return 'API request timed out';
    }
    if (error instanceof EmptyResponseError) {
        return 'Unexpected API response format';
    }
    const status = httpStatus(error);
    if (status !== null) {
        return `API HTTP error ${status}`;
    }
    return 'API call failed';
}

/**
 * Runs one bounded model call. Any failure is logged and folded into the
 * sentinel payload so the pipeline can still persist a record.
 */
export async function runInterpreterCall(
    name: string,
    timeoutMs: number,
    call: (signal: AbortSignal) => Promise<string>,
): Promise<string> {
    const startedAt = Date.now();
    try {
        const content = await callWithTimeout(call, timeoutMs, `${name} request`);
        if (content.trim().length === 0) {
            throw new EmptyResponseError(name);
        }
        logger.info(`[${name}] response received in ${Date.now() - startedAt}ms chars=${content.length}`);
        return content;
    } catch (error) {
        const reason = describeInterpreterFailure(error);
        logger.error(`[${name}] ${reason}: ${errorMessage(error)}`);
        return sentinelResponse(reason);
    }
}
