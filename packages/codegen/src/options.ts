import type { CompositeType } from '@exprgen/schema';
import { IANAZone } from 'luxon';
import { z } from 'zod';
import { fromError } from 'zod-validation-error';
import { FORMATTER_NAMES } from './declaration-registry';
import { createConfigError } from './errors';
import { LOG_LEVELS, type LogConfig, type Logger } from './log';

/**
 * Code generation options.
 */
export type GenerationOptions = {
    /**
     * Whether generated code tracks absent values. When disabled, the caller guarantees that no
     * input value is ever absent. Defaults to `true`.
     */
    nullCheck?: boolean;

    /**
     * IANA time zone used by all date/time formatters of a session. Defaults to `'UTC'`.
     */
    timeZone?: string;

    /**
     * Logging configuration.
     */
    log?: LogConfig;
};

export type ResolvedGenerationOptions = {
    nullCheck: boolean;
    timeZone: string;
    log: LogConfig;
};

/**
 * A named input of the generated function and the layout of the records bound to it.
 */
export type InputBinding = readonly [name: string, type: CompositeType];

// `$` is left to generated names
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const RESERVED_WORDS = [
    'arguments', 'await', 'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger', 'default',
    'delete', 'do', 'else', 'enum', 'eval', 'export', 'extends', 'false', 'finally', 'for', 'function',
    'if', 'implements', 'import', 'in', 'instanceof', 'interface', 'let', 'new', 'null', 'package',
    'private', 'protected', 'public', 'return', 'static', 'super', 'switch', 'this', 'throw', 'true',
    'try', 'typeof', 'var', 'void', 'while', 'with', 'yield',
];

// identifiers the generated unit itself refers to
const GENERATED_UNIT_NAMES = [
    'runtime',
    ...Object.values(FORMATTER_NAMES),
    'Math',
    'String',
    'Date',
    'undefined',
    'NaN',
    'Infinity',
];

const RESERVED_NAMES = new Set([...RESERVED_WORDS, ...GENERATED_UNIT_NAMES]);

const optionsSchema = z.object({
    nullCheck: z.boolean().default(true),
    timeZone: z
        .string()
        .default('UTC')
        .refine((zone) => IANAZone.isValidZone(zone), { message: 'Invalid IANA time zone' }),
    log: z
        .union([z.array(z.enum(LOG_LEVELS)).readonly(), z.custom<Logger>((value) => typeof value === 'function')])
        .default([]),
});

export function resolveOptions(options: GenerationOptions | undefined): ResolvedGenerationOptions {
    const parsed = optionsSchema.safeParse(options ?? {});
    if (!parsed.success) {
        throw createConfigError(`Invalid generation options: ${fromError(parsed.error).toString()}`, {
            cause: parsed.error,
        });
    }
    return parsed.data;
}

export function validateInputs(inputs: readonly InputBinding[]) {
    const names = new Set<string>();
    for (const [name] of inputs) {
        if (!IDENTIFIER.test(name)) {
            throw createConfigError(`Input name "${name}" is not a valid identifier`);
        }
        if (RESERVED_NAMES.has(name)) {
            throw createConfigError(`Input name "${name}" is reserved`);
        }
        if (names.has(name)) {
            throw createConfigError(`Duplicate input name "${name}"`);
        }
        names.add(name);
    }
}
