/**
 * Content Value
 *
 * Generic recursive representation of CMS documents.
 * Untyped input (parsed JSON, webhook payloads) is converted once at the
 * boundary; everything past that point works on these types.
 */

import { InvalidContentError } from '../errors/TranslationErrors';

export type ContentScalar = null | boolean | number | string;

export type ContentValue = ContentScalar | ContentValue[] | ContentMap;

export interface ContentMap {
    [key: string]: ContentValue;
}

export function isContentMap(value: ContentValue | undefined): value is ContentMap {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isContentList(value: ContentValue | undefined): value is ContentValue[] {
    return Array.isArray(value);
}

/**
 * Object literals from any realm (structuredClone and vm contexts hand back
 * objects whose Object.prototype is not ours).
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return false;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === null || Object.getPrototypeOf(proto) === null;
}

function isDate(value: unknown): value is Date {
    return Object.prototype.toString.call(value) === '[object Date]';
}

/**
 * Converts an arbitrary value into a ContentValue.
 * `undefined` entries inside objects are dropped, the same way JSON.stringify does.
 */
export function toContentValue(input: unknown, path: string = '$'): ContentValue {
    if (input === null) return null;

    switch (typeof input) {
        case 'string':
        case 'boolean':
            return input;
        case 'number':
            if (!Number.isFinite(input)) {
                throw new InvalidContentError(`Non-finite number at ${path}`);
            }
            return input;
        case 'object':
            break;
        default:
            throw new InvalidContentError(`Unsupported ${typeof input} value at ${path}`);
    }

    if (Array.isArray(input)) {
        return input.map((item, index) => toContentValue(item ?? null, `${path}[${index}]`));
    }

    if (isDate(input)) {
        return input.toISOString();
    }

    if (!isPlainObject(input)) {
        throw new InvalidContentError(`Unsupported object value at ${path}`);
    }

    const result: ContentMap = {};
    for (const [key, value] of Object.entries(input)) {
        if (value === undefined) continue;
        result[key] = toContentValue(value, `${path}.${key}`);
    }
    return result;
}

/**
 * Converts input that must be a document (a map at the top level).
 */
export function asContentDocument(input: unknown): ContentMap {
    if (!isPlainObject(input)) {
        throw new InvalidContentError('Content must be a JSON object');
    }
    const value = toContentValue(input);
    if (!isContentMap(value)) {
        throw new InvalidContentError('Content must be a JSON object');
    }
    return value;
}

export function cloneContent<T extends ContentValue>(value: T): T {
    return structuredClone(value);
}

/**
 * Short type name used in validation reports.
 */
export function describeContentType(value: ContentValue): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'list';
    if (isContentMap(value)) return 'map';
    return typeof value;
}
