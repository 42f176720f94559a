/**
 * Base error for the translation pipeline.
 */
export class TranslationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TranslationError';
    }
}

/**
 * A single translation unit (field, batch item or HTML text node) failed.
 */
export class TranslationFailure extends TranslationError {
    constructor(
        public readonly provider: string,
        message: string,
        public readonly originalError?: unknown
    ) {
        super(`${provider}: ${message}`);
        this.name = 'TranslationFailure';
    }
}

/**
 * A batch request failed as a whole.
 */
export class BatchTranslationFailure extends TranslationError {
    constructor(
        public readonly batchSize: number,
        message: string,
        public readonly originalError?: unknown
    ) {
        super(`Batch of ${batchSize} failed: ${message}`);
        this.name = 'BatchTranslationFailure';
    }
}

/**
 * Content handed to the pipeline is not a document.
 */
export class InvalidContentError extends TranslationError {
    constructor(message: string = 'Invalid content') {
        super(message);
        this.name = 'InvalidContentError';
    }
}

export class UnsupportedLanguagePairError extends TranslationError {
    constructor(
        public readonly sourceLang: string,
        public readonly targetLang: string
    ) {
        super(`Unsupported language pair ${sourceLang}->${targetLang}`);
        this.name = 'UnsupportedLanguagePairError';
    }
}

/**
 * A field mapping configuration failed schema validation.
 */
export class ConfigValidationError extends TranslationError {
    constructor(
        message: string,
        public readonly details: string[] = []
    ) {
        super(message);
        this.name = 'ConfigValidationError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
