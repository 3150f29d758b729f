import type { PrimitiveTypeName } from '@exprgen/schema';
import { isDeepStrictEqual } from 'node:util';
import { RuntimeArithmeticError, RuntimeParseError } from '../errors';

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// largest distance from the epoch a Date can represent
const MAX_EPOCH_MILLIS = 8.64e15;

const INTEGRAL_RANGES = {
    Int: [-2147483648, 2147483647],
    Short: [-32768, 32767],
    Byte: [-128, 127],
    Long: [Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER],
} as const;

function parseIntegral(type: keyof typeof INTEGRAL_RANGES) {
    return (text: string): number => {
        const trimmed = text.trim();
        const [min, max] = INTEGRAL_RANGES[type];
        const value = INTEGER.test(trimmed) ? Number(trimmed) : NaN;
        if (Number.isNaN(value) || value < min || value > max) {
            throw new RuntimeParseError(text, type);
        }
        return value;
    };
}

function parseDecimal(type: 'Float' | 'Double') {
    return (text: string): number => {
        const trimmed = text.trim();
        if (!DECIMAL.test(trimmed)) {
            throw new RuntimeParseError(text, type);
        }
        const value = Number(trimmed);
        return type === 'Float' ? Math.fround(value) : value;
    };
}

/**
 * Canonical string-to-value conversion per primitive type.
 */
export const valueOf = {
    Int: parseIntegral('Int'),
    Long: parseIntegral('Long'),
    Short: parseIntegral('Short'),
    Byte: parseIntegral('Byte'),
    Float: parseDecimal('Float'),
    Double: parseDecimal('Double'),
    Boolean: (text: string): boolean => text.toLowerCase() === 'true',
    Char: (text: string): string => {
        if ([...text].length !== 1) {
            throw new RuntimeParseError(text, 'Char');
        }
        return text;
    },
} satisfies Record<PrimitiveTypeName, (text: string) => unknown>;

/**
 * Interprets a string holding an integer as epoch milliseconds.
 */
export function parseEpochMillis(text: string): Date {
    const trimmed = text.trim();
    const millis = INTEGER.test(trimmed) ? Number(trimmed) : NaN;
    if (!Number.isSafeInteger(millis) || Math.abs(millis) > MAX_EPOCH_MILLIS) {
        throw new RuntimeParseError(text, 'epoch milliseconds');
    }
    return new Date(millis);
}

/**
 * Returns the divisor of an integral division or remainder, throwing when it is zero.
 */
export function checkDivisor(divisor: number): number {
    if (divisor === 0) {
        throw new RuntimeArithmeticError('/ by zero');
    }
    return divisor;
}

export function equals(a: unknown, b: unknown): boolean {
    return isDeepStrictEqual(a, b);
}
