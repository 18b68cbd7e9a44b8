import fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import type { ExtractionResult, ImageSize } from '@trade-journal/shared';
import { NotFoundError } from '../../errors/pipelineErrors';
import { forComponent } from '../../utils/logger';

const log = forComponent('TextExtractor');

export type OcrToken = {
    text: string;
    // Engines report numbers, numeric strings or -1 for non-word boxes.
    confidence: unknown;
};

export interface OcrRecognition {
    text: string;
    tokens: OcrToken[];
    imageSize: ImageSize;
}

export interface OcrEngine {
    recognize(imagePath: string): Promise<OcrRecognition>;
}

function asPositiveConfidence(input: unknown): number | null {
    if (typeof input !== 'number' && typeof input !== 'string') {
        return null;
    }
    if (typeof input === 'string' && input.trim().length === 0) {
        return null;
    }
    const parsed = Number(input);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

/**
 * Mean of the strictly positive token confidences. Returns 0 when no token
 * qualifies, so blank images never produce NaN.
 */
export function averageTokenConfidence(tokens: OcrToken[]): number {
    let sum = 0;
    let count = 0;
    for (const token of tokens) {
        const confidence = asPositiveConfidence(token.confidence);
        if (confidence === null) {
            continue;
        }
        sum += confidence;
        count += 1;
    }
    return count > 0 ? sum / count : 0;
}

export function countWords(tokens: OcrToken[]): number {
    return tokens.filter((token) => typeof token.text === 'string' && token.text.trim().length > 0).length;
}

async function assertReadableFile(imagePath: string): Promise<void> {
    try {
        await fs.access(imagePath, fsConstants.R_OK);
        const stats = await fs.stat(imagePath);
        if (!stats.isFile()) {
            throw new NotFoundError(imagePath, `Image path is not a file: ${imagePath}`);
        }
    } catch (error) {
        if (error instanceof NotFoundError) {
            throw error;
        }
        throw new NotFoundError(imagePath);
    }
}

export class TextExtractor {
    constructor(private readonly engine: OcrEngine) {}

    public async extract(imagePath: string): Promise<ExtractionResult> {
        await assertReadableFile(imagePath);

        const recognition = await this.engine.recognize(imagePath);
        const confidence = averageTokenConfidence(recognition.tokens);
        const totalWords = countWords(recognition.tokens);

        log.info(`${imagePath} words=${totalWords} confidence=${confidence.toFixed(1)}%`);

        return {
            text: recognition.text,
            metadata: {
                confidence,
                total_words: totalWords,
                image_size: recognition.imageSize,
            },
        };
    }
}
