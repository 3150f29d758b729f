import { invariant } from '@exprgen/common-helpers';
import type { CompositeType } from '@exprgen/schema';
import { match } from 'ts-pattern';

/**
 * How a field is read from a bound input record.
 */
export type FieldAccessor =
    | { kind: 'index'; index: number }
    | { kind: 'method'; name: string }
    | { kind: 'member'; name: string };

/**
 * Resolves the accessor for a field, following renaming layers down to the record
 * representation that actually holds it.
 */
export function resolveFieldAccess(type: CompositeType, fieldName: string): FieldAccessor {
    const index = type.getFieldIndex(fieldName);
    invariant(index >= 0, `Field "${fieldName}" not found in ${type.toString()}`);

    return match(type)
        .with({ kind: 'row' }, (): FieldAccessor => ({ kind: 'index', index }))
        .with({ kind: 'case-class' }, (): FieldAccessor => ({ kind: 'method', name: fieldName }))
        .with({ kind: 'tuple' }, { kind: 'pojo' }, (): FieldAccessor => ({ kind: 'member', name: fieldName }))
        .with({ kind: 'renaming' }, (t) => {
            const underlying = t.getUnderlyingType();
            const underlyingName = underlying.getFieldNames()[index];
            invariant(underlyingName !== undefined, `Renamed field "${fieldName}" has no underlying field`);
            return resolveFieldAccess(underlying, underlyingName);
        })
        .exhaustive();
}

/**
 * Renders the expression reading a field from the given input term.
 */
export function renderFieldAccess(inputTerm: string, accessor: FieldAccessor, typeTerm: string): string {
    const read = match(accessor)
        .with({ kind: 'index' }, ({ index }) => `${inputTerm}[${index}]`)
        .with({ kind: 'method' }, ({ name }) => `${inputTerm}${propertyAccess(name)}()`)
        .with({ kind: 'member' }, ({ name }) => `${inputTerm}${propertyAccess(name)}`)
        .exhaustive();
    return `(${read} as ${typeTerm})`;
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

function propertyAccess(name: string) {
    return IDENTIFIER.test(name) ? `.${name}` : `[${JSON.stringify(name)}]`;
}
