/**
 * Text Sanitizer
 *
 * Cleans text before it is sent to a translation provider: length cap,
 * control characters, instruction-injection phrases and runaway whitespace.
 */

export type TextSanitizer = (text: string, maxLength: number) => string;

export const DEFAULT_MAX_TEXT_LENGTH = 2000;
export const DEFAULT_MAX_CONTEXT_LENGTH = 500;

export const REDACTION_MARKER = '[REDACTED]';

// eslint-disable-next-line no-control-regex
const CONTROL_CHARACTERS = /[\x00-\x08\x0b\x0c\x0e-\x1f\x7f-\x9f]/g;

const INJECTION_PATTERNS: RegExp[] = [
    /ignore\s+(?:previous|all|above|prior)\s+(?:instructions?|prompts?|context)/gi,
    /(?:system|assistant|user)\s*:/gi,
    /(?:new|different|alternative)\s+(?:instructions?|prompts?|task)/gi,
    /(?:act|behave|pretend)\s+(?:as|like)\s+(?:a\s+)?(?:different|new)/gi,
    /(?:forget|ignore|disregard|override)\s+(?:everything|all)/gi,
    /jailbreak|prompt\s*injection|adversarial/gi
];

export const sanitizeText: TextSanitizer = (text, maxLength) => {
    if (!text) return '';

    let sanitized = text.slice(0, maxLength).replace(CONTROL_CHARACTERS, '');

    for (const pattern of INJECTION_PATTERNS) {
        sanitized = sanitized.replace(pattern, REDACTION_MARKER);
    }

    return sanitized
        .replace(/\n\s*\n\s*\n+/g, '\n\n')
        .replace(/[ \t]+/g, ' ')
        .trim();
};

export function sanitizeContext(
    context: string,
    maxLength: number = DEFAULT_MAX_CONTEXT_LENGTH,
    sanitizer: TextSanitizer = sanitizeText
): string {
    return sanitizer(context, maxLength);
}
