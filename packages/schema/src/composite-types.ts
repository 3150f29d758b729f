import { invariant } from '@exprgen/common-helpers';
import type { TypeInfo } from './types';

export type CompositeKind = 'row' | 'case-class' | 'tuple' | 'pojo' | 'renaming';

export type CompositeField = {
    name: string;
    type: TypeInfo;
};

/**
 * Describes how named fields are laid out in a structured input record, one class per record
 * representation.
 */
export type CompositeType = RowType | CaseClassType | TupleType | PojoType | RenamingType;

export abstract class CompositeTypeBase {
    abstract readonly kind: CompositeKind;

    protected readonly fields: readonly CompositeField[];

    constructor(fields: readonly CompositeField[]) {
        const seen = new Set<string>();
        for (const field of fields) {
            if (seen.has(field.name)) {
                throw new Error(`Duplicate field name "${field.name}"`);
            }
            seen.add(field.name);
        }
        this.fields = [...fields];
    }

    get arity() {
        return this.fields.length;
    }

    getFields(): readonly CompositeField[] {
        return this.fields;
    }

    getFieldNames(): string[] {
        return this.fields.map((f) => f.name);
    }

    /**
     * Returns the position of the field, or -1 if the type has no such field.
     */
    getFieldIndex(name: string): number {
        return this.fields.findIndex((f) => f.name === name);
    }

    hasField(name: string): boolean {
        return this.getFieldIndex(name) >= 0;
    }

    getFieldType(name: string): TypeInfo | undefined {
        return this.fields.find((f) => f.name === name)?.type;
    }

    toString() {
        return `${this.kind}(${this.fields.map((f) => f.name).join(', ')})`;
    }
}

/**
 * A positional record; fields are read by index.
 */
export class RowType extends CompositeTypeBase {
    readonly kind = 'row';
}

/**
 * A record exposing one accessor method per field.
 */
export class CaseClassType extends CompositeTypeBase {
    readonly kind = 'case-class';
}

/**
 * A generic tuple whose public members are named `f0`, `f1`, ...
 */
export class TupleType extends CompositeTypeBase {
    readonly kind = 'tuple';

    constructor(types: readonly TypeInfo[]) {
        super(types.map((type, i) => ({ name: `f${i}`, type })));
    }
}

/**
 * An arbitrary object with public members.
 */
export class PojoType extends CompositeTypeBase {
    readonly kind = 'pojo';
}

/**
 * Renames the fields of an underlying composite type. The alias at position `i` names the
 * underlying field at position `i`.
 */
export class RenamingType extends CompositeTypeBase {
    readonly kind = 'renaming';

    private readonly underlying: CompositeType;

    constructor(underlying: CompositeType, aliases: readonly string[]) {
        if (aliases.length !== underlying.arity) {
            throw new Error(
                `Renaming of ${underlying.toString()} expects ${underlying.arity} field names, got ${aliases.length}`,
            );
        }
        const fields = underlying.getFields();
        super(
            aliases.map((name, i) => {
                const field = fields[i];
                invariant(field, `No field at position ${i} of ${underlying.toString()}`);
                return { name, type: field.type };
            }),
        );
        this.underlying = underlying;
    }

    getUnderlyingType(): CompositeType {
        return this.underlying;
    }
}
