/**
 * Validates raw field mapping configs (request bodies, stored JSON) and
 * fills in defaults.
 */

import Ajv, { ErrorObject } from 'ajv';
import {
    createDefaultFieldMappingConfig,
    FIELD_TYPES,
    FieldMappingConfig,
    FieldMappingConfigInput,
    TRANSLATION_PATTERNS
} from '../entities/FieldMapping';
import { ConfigValidationError } from '../errors/TranslationErrors';
import { isValidPath } from './PathResolver';

const fieldPathList = {
    type: 'array',
    items: { type: 'string', minLength: 1 }
} as const;

export const FIELD_MAPPING_CONFIG_SCHEMA = {
    type: 'object',
    required: ['clientId', 'collectionName'],
    additionalProperties: false,
    properties: {
        clientId: { type: 'string', minLength: 1 },
        collectionName: { type: 'string', minLength: 1 },
        fieldPaths: fieldPathList,
        fieldTypes: {
            type: 'object',
            additionalProperties: { type: 'string', enum: FIELD_TYPES }
        },
        rtlFieldMapping: {
            type: 'object',
            additionalProperties: {
                type: 'object',
                required: ['fieldPaths'],
                additionalProperties: false,
                properties: { fieldPaths: fieldPathList }
            }
        },
        batchProcessing: { type: 'boolean' },
        preserveHtml: { type: 'boolean' },
        contentSanitization: { type: 'boolean' },
        translationPattern: { type: 'string', enum: TRANSLATION_PATTERNS },
        primaryCollection: { type: ['string', 'null'] }
    }
} as const;

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validateInput = ajv.compile<FieldMappingConfigInput>(FIELD_MAPPING_CONFIG_SCHEMA);

function formatAjvError(error: ErrorObject): string {
    return `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`;
}

function invalidPaths(input: FieldMappingConfigInput): string[] {
    const paths = [
        ...(input.fieldPaths ?? []),
        ...Object.keys(input.fieldTypes ?? {}),
        ...Object.values(input.rtlFieldMapping ?? {}).flatMap(override => override.fieldPaths)
    ];
    return paths.filter(path => !isValidPath(path)).map(path => `Invalid field path: ${path}`);
}

/**
 * @throws ConfigValidationError when the input does not match the schema
 *         or names a malformed field path
 */
export function parseFieldMappingConfig(raw: unknown): FieldMappingConfig {
    if (!validateInput(raw)) {
        const details = (validateInput.errors ?? []).map(formatAjvError);
        throw new ConfigValidationError('Invalid field mapping configuration', details);
    }

    const pathErrors = invalidPaths(raw);
    if (pathErrors.length > 0) {
        throw new ConfigValidationError('Invalid field mapping configuration', pathErrors);
    }

    const defaults = createDefaultFieldMappingConfig(raw.clientId, raw.collectionName);
    return {
        clientId: raw.clientId,
        collectionName: raw.collectionName,
        fieldPaths: raw.fieldPaths ?? defaults.fieldPaths,
        fieldTypes: raw.fieldTypes ?? defaults.fieldTypes,
        rtlFieldMapping: raw.rtlFieldMapping ?? defaults.rtlFieldMapping,
        batchProcessing: raw.batchProcessing ?? defaults.batchProcessing,
        preserveHtml: raw.preserveHtml ?? defaults.preserveHtml,
        contentSanitization: raw.contentSanitization ?? defaults.contentSanitization,
        translationPattern: raw.translationPattern ?? defaults.translationPattern,
        primaryCollection: raw.primaryCollection ?? defaults.primaryCollection
    };
}
