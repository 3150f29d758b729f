import type { CompositeType } from './composite-types';

export type PrimitiveTypeName = 'Int' | 'Long' | 'Short' | 'Byte' | 'Float' | 'Double' | 'Boolean' | 'Char';

export type BasicTypeName = PrimitiveTypeName | 'String' | 'Date';

export type BasicType = {
    kind: 'basic';
    name: BasicTypeName;
};

export type PrimitiveArrayType = {
    kind: 'primitive-array';
    element: PrimitiveTypeName;
};

/**
 * Semantic type tag carried by every expression node.
 */
export type TypeInfo = BasicType | PrimitiveArrayType | CompositeType;

export type PrimitiveBasicType = BasicType & { name: PrimitiveTypeName };

const TYPE_CLASSES: Record<BasicTypeName, 'integral' | 'fractional' | 'other-primitive' | 'object'> = {
    Int: 'integral',
    Long: 'integral',
    Short: 'integral',
    Byte: 'integral',
    Float: 'fractional',
    Double: 'fractional',
    Boolean: 'other-primitive',
    Char: 'other-primitive',
    String: 'object',
    Date: 'object',
};

function basic(name: BasicTypeName): BasicType {
    return { kind: 'basic', name };
}

function primitiveArray(element: PrimitiveTypeName): PrimitiveArrayType {
    return { kind: 'primitive-array', element };
}

/**
 * Predefined type tags and helpers to inspect them.
 */
export const TypeUtils = {
    Int: basic('Int'),
    Long: basic('Long'),
    Short: basic('Short'),
    Byte: basic('Byte'),
    Float: basic('Float'),
    Double: basic('Double'),
    Boolean: basic('Boolean'),
    String: basic('String'),
    Char: basic('Char'),
    Date: basic('Date'),

    arrayOf: primitiveArray,

    isBasic: (type: TypeInfo, name?: BasicTypeName): type is BasicType => {
        return type.kind === 'basic' && (name === undefined || type.name === name);
    },

    isPrimitive: (type: TypeInfo): type is PrimitiveBasicType => {
        return type.kind === 'basic' && TYPE_CLASSES[type.name] !== 'object';
    },

    isIntegral: (type: TypeInfo): type is PrimitiveBasicType => {
        return type.kind === 'basic' && TYPE_CLASSES[type.name] === 'integral';
    },

    isNumeric: (type: TypeInfo): type is PrimitiveBasicType => {
        return (
            type.kind === 'basic' && (TYPE_CLASSES[type.name] === 'integral' || TYPE_CLASSES[type.name] === 'fractional')
        );
    },

    isPrimitiveArray: (type: TypeInfo): type is PrimitiveArrayType => type.kind === 'primitive-array',

    isComposite: (type: TypeInfo): type is CompositeType => {
        return type.kind !== 'basic' && type.kind !== 'primitive-array';
    },

    equals: (a: TypeInfo, b: TypeInfo): boolean => {
        if (a.kind === 'basic' && b.kind === 'basic') {
            return a.name === b.name;
        }
        if (a.kind === 'primitive-array' && b.kind === 'primitive-array') {
            return a.element === b.element;
        }
        return a === b;
    },

    toString: (type: TypeInfo): string => {
        if (type.kind === 'basic') {
            return type.name;
        }
        if (type.kind === 'primitive-array') {
            return `${type.element}[]`;
        }
        return type.toString();
    },
};
