import { TypeUtils, type BasicTypeName, type PrimitiveTypeName, type TypeInfo } from '@exprgen/schema';
import { match, P } from 'ts-pattern';

const BASIC_TYPE_TERMS: Readonly<Record<BasicTypeName, string>> = {
    Int: 'number',
    Long: 'number',
    Short: 'number',
    Byte: 'number',
    Float: 'number',
    Double: 'number',
    Boolean: 'boolean',
    Char: 'string',
    String: 'string',
    Date: 'Date',
};

const ARRAY_TYPE_TERMS: Readonly<Record<PrimitiveTypeName, string>> = {
    Int: 'Int32Array',
    Long: 'number[]',
    Short: 'Int16Array',
    Byte: 'Int8Array',
    Float: 'Float32Array',
    Double: 'Float64Array',
    Boolean: 'boolean[]',
    Char: 'string[]',
};

const DEFAULT_VALUES: Readonly<Record<BasicTypeName, string>> = {
    Int: '-1',
    Long: '-1',
    Short: '-1',
    Byte: '-1',
    Float: 'Math.fround(-1.0)',
    Double: '-1.0',
    Boolean: 'false',
    String: '"<empty>"',
    Char: '"\\0"',
    Date: 'null',
};

/**
 * TypeScript type annotation of a generated binding holding a value of the given type.
 */
export function typeTermFor(type: TypeInfo): string {
    return match(type)
        .with({ kind: 'basic' }, (t) => BASIC_TYPE_TERMS[t.name])
        .with({ kind: 'primitive-array' }, (t) => ARRAY_TYPE_TERMS[t.element])
        .otherwise(() => 'unknown');
}

/**
 * Literal bound to the result of a null-propagating node when one of its operands is absent.
 */
export function defaultValueFor(type: TypeInfo): string {
    return type.kind === 'basic' ? DEFAULT_VALUES[type.name] : 'null';
}

/**
 * Wraps `term` so that a value of primitive type `from` is represented as primitive type `to`,
 * or returns `undefined` when no such coercion exists.
 */
export function coercePrimitive(term: string, from: PrimitiveTypeName, to: PrimitiveTypeName): string | undefined {
    if (from === to) {
        return term;
    }
    if (from === 'Boolean' || to === 'Boolean') {
        return undefined;
    }
    const numeric = from === 'Char' ? `${term}.charCodeAt(0)` : term;
    return match(to)
        .with(P.union('Int', 'Short', 'Byte'), (t) => wrapToRange(numeric, t))
        .with('Long', () => `Math.trunc(${numeric})`)
        .with('Float', () => `Math.fround(${numeric})`)
        .with('Double', () => numeric)
        .with('Char', () => `String.fromCharCode(${numeric})`)
        .exhaustive();
}

/**
 * Wraps a computed integral `term` so that it stays within the range of an Int, Short or Byte
 * result type, wrapping around on overflow. Other types are returned unchanged.
 */
export function narrowToType(term: string, type: TypeInfo): string {
    return match(type)
        .with({ kind: 'basic', name: P.union('Int', 'Short', 'Byte') }, (t) => wrapToRange(term, t.name))
        .otherwise(() => term);
}

function wrapToRange(term: string, to: 'Int' | 'Short' | 'Byte') {
    return match(to)
        .with('Int', () => `(${term} | 0)`)
        .with('Short', () => `((${term} << 16) >> 16)`)
        .with('Byte', () => `((${term} << 24) >> 24)`)
        .exhaustive();
}

/**
 * Whether values of the type compare by value with `===`.
 */
export function hasValueIdentity(type: TypeInfo): boolean {
    return TypeUtils.isPrimitive(type) || TypeUtils.isBasic(type, 'String');
}
