import { InvalidArgumentError } from '../../types/errors';
import { FieldIssue } from '../../types/validation';

type Location = FieldIssue['location'];

const TRUE_VALUES = new Set(['1', 'on', 't', 'true', 'y', 'yes']);
const FALSE_VALUES = new Set(['0', 'off', 'f', 'false', 'n', 'no']);
const INTEGER_PATTERN = /^[+-]?\d+$/;

const invalid = (field: string, location: Location, message: string): InvalidArgumentError =>
    new InvalidArgumentError(`Invalid ${field}: ${message}`, [{ field, location, message }]);

/**
 * Normalizes a query or form value to a single string.
 * Repeated parameters resolve to the last occurrence.
 */
export function readString(value: unknown): string | undefined {
    if (typeof value === 'string') {
        return value;
    }
    if (Array.isArray(value)) {
        const last: unknown = value[value.length - 1];
        return typeof last === 'string' ? last : undefined;
    }
    return undefined;
}

export function requireString(value: unknown, field: string, location: Location): string {
    const text = readString(value);
    if (text === undefined) {
        throw invalid(field, location, 'Field required');
    }
    return text;
}

export function parseBoolean(value: unknown, field: string, location: Location, fallback: boolean): boolean {
    const text = readString(value);
    if (text === undefined) {
        return fallback;
    }

    const normalized = text.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
        return true;
    }
    if (FALSE_VALUES.has(normalized)) {
        return false;
    }
    throw invalid(field, location, 'Input should be a valid boolean');
}

export function parseInteger(value: unknown, field: string, location: Location): number {
    const text = requireString(value, field, location).trim();
    if (!INTEGER_PATTERN.test(text)) {
        throw invalid(field, location, 'Input should be a valid integer');
    }

    const parsed = Number(text);
    if (!Number.isSafeInteger(parsed)) {
        throw invalid(field, location, 'Input should be a valid integer');
    }
    return parsed;
}

export function parseChoice<T extends string>(
    value: unknown,
    field: string,
    location: Location,
    choices: readonly T[],
    fallback: T
): T {
    const text = readString(value);
    if (text === undefined) {
        return fallback;
    }

    const choice = choices.find(candidate => candidate === text);
    if (choice === undefined) {
        throw invalid(field, location, `Input should be ${choices.map(c => `'${c}'`).join(', ')}`);
    }
    return choice;
}

/**
 * Reads a named field off a parsed form or JSON body without trusting its shape.
 */
export function readField(body: unknown, field: string): unknown {
    if (typeof body !== 'object' || body === null) {
        return undefined;
    }
    return Object.entries(body).find(([key]) => key === field)?.[1];
}
