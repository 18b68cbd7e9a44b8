export type PipelineErrorCode =
    | 'NOT_FOUND'
    | 'DECODE_FAILED'
    | 'TIMEOUT'
    | 'EMPTY_RESPONSE'
    | 'CORRUPT_LINE'
    | 'INVALID_CONFIG'
    | 'INVALID_USAGE';

export class PipelineError extends Error {
    public readonly code: PipelineErrorCode;

    constructor(code: PipelineErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Input resource (image or folder) is missing. Fatal to the invocation. */
export class NotFoundError extends PipelineError {
    public readonly path: string;

    constructor(path: string, message = `Image not found: ${path}`) {
        super('NOT_FOUND', message);
        this.path = path;
    }
}

export class DecodeError extends PipelineError {
    public readonly text: string;
    public readonly parseError: unknown;

    constructor(message: string, text: string, parseError?: unknown) {
        super('DECODE_FAILED', message);
        this.text = text;
        this.parseError = parseError;
    }
}

export class TimeoutError extends PipelineError {
    public readonly timeoutMs: number;

    constructor(label: string, timeoutMs: number) {
        super('TIMEOUT', `${label} timed out after ${timeoutMs}ms`);
        this.timeoutMs = timeoutMs;
    }
}

export class EmptyResponseError extends PipelineError {
    constructor(source: string) {
        super('EMPTY_RESPONSE', `${source} returned no content`);
    }
}

export class CorruptLineError extends PipelineError {
    public readonly lineNumber: number;
    public readonly preview: string;

    constructor(lineNumber: number, line: string, reason: string) {
        super('CORRUPT_LINE', `Skipping corrupt trade log line ${lineNumber}: ${reason}`);
        this.lineNumber = lineNumber;
        this.preview = line.slice(0, 180);
    }
}

export class ConfigValidationError extends PipelineError {
    public readonly issues: string[];

    constructor(issues: string[]) {
        super('INVALID_CONFIG', `Invalid configuration: ${issues.join('; ')}`);
        this.issues = issues;
    }
}

export class UsageError extends PipelineError {
    constructor(message: string) {
        super('INVALID_USAGE', message);
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
