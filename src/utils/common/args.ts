/**
 * Command Argument Parsing
 * @module utils/common/args
 */

import { AppError, isAppError } from '../../errors/index.js';

type RawArg = string | null | undefined;

const INTEGER_PATTERN = /^[+-]?\d+$/;

function integerFailure(input: string): string | null {
    if (input.length === 0) return 'cannot parse integer from empty string';
    if (!INTEGER_PATTERN.test(input)) return 'invalid digit found in string';
    if (!Number.isSafeInteger(Number(input))) return 'number too large to fit in target type';
    return null;
}

/**
 * Parse a whole number argument
 */
export function parseIntArg(raw: RawArg): number {
    if (raw === null || raw === undefined) {
        throw AppError.from({ type: 'ParseInt', failure: { reason: 'missing' } });
    }

    const input = raw.trim();
    const cause = integerFailure(input);
    if (cause !== null) {
        throw AppError.from({ type: 'ParseInt', failure: { reason: 'invalid', input: raw, cause } });
    }
    // `-0` reads as 0
    return Number(input) || 0;
}

/**
 * Run `parse` on an argument, wrapping its AppError in a ParseArg error.
 * Anything else `parse` throws is left alone.
 */
export function parseArg<T>(raw: RawArg, parse: (input: string) => T): T {
    if (raw === null || raw === undefined) {
        throw AppError.from({ type: 'ParseArg', failure: { reason: 'missing' } });
    }

    try {
        return parse(raw);
    } catch (error) {
        if (!isAppError(error)) throw error;
        throw AppError.from({ type: 'ParseArg', failure: { reason: 'invalid', input: raw, cause: error } });
    }
}

/**
 * Split image tags on whitespace. Commas are rejected since users
 * tend to write `cat, dog` expecting two tags.
 */
export function parseImageTags(input: string): string[] {
    if (input.includes(',')) {
        throw AppError.from({ type: 'CommaInImageTag', input });
    }
    return input.split(/\s+/).filter(tag => tag.length > 0);
}
