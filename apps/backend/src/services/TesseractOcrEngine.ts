import { createWorker } from 'tesseract.js';
import { imageSize } from 'image-size';
import { errorMessage, NotFoundError } from '../errors/pipelineErrors';
import type { OcrEngine, OcrRecognition } from '../modules/extraction/textExtractor';
import { forComponent } from '../utils/logger';

const log = forComponent('TesseractOcrEngine');

export interface TesseractOcrConfig {
    language: string;
    langPath?: string;
}

// Header only; files image-size cannot identify are reported as missing images.
function readImageSize(imagePath: string): { width: number; height: number } {
    try {
        const { width, height } = imageSize(imagePath);
        return { width: width ?? 0, height: height ?? 0 };
    } catch (error) {
        throw new NotFoundError(imagePath, `Image is unreadable or not a supported format: ${imagePath} (${errorMessage(error)})`);
    }
}

/**
 * tesseract.js backed OCR. A worker is created per call and terminated
 * afterwards; the pipeline runs one OCR pass per invocation.
 */
export class TesseractOcrEngine implements OcrEngine {
    constructor(private readonly config: TesseractOcrConfig) {}

    async recognize(imagePath: string): Promise<OcrRecognition> {
        const dimensions = readImageSize(imagePath);
        const worker = await createWorker(this.config.language, undefined, {
            ...(this.config.langPath ? { langPath: this.config.langPath } : {}),
        });
        try {
            const { data } = await worker.recognize(imagePath);
            log.debug(`recognized ${data.words.length} word boxes in ${imagePath}`);
            return {
                text: data.text,
                tokens: data.words.map((word) => ({
                    text: word.text,
                    confidence: word.confidence,
                })),
                imageSize: dimensions,
            };
        } finally {
            await worker.terminate();
        }
    }
}
