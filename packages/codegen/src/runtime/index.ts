import { checkDivisor, equals, parseEpochMillis, valueOf } from './conversions';
import { createFormatter } from './formatter';

export { DateTimeFormatter } from './formatter';

/**
 * Helpers reachable from generated code through its `runtime` binding.
 */
export const runtime = {
    createFormatter,
    parseEpochMillis,
    checkDivisor,
    valueOf,
    equals,
};

export type Runtime = typeof runtime;
