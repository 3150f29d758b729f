import { describe, expect, it } from 'vitest';
import { CaseClassType, RenamingType, RowType, TupleType, TypeUtils } from '../src';

describe('Composite types', () => {
    const row = new RowType([
        { name: 'id', type: TypeUtils.Long },
        { name: 'price', type: TypeUtils.Double },
    ]);

    it('looks up fields by name', () => {
        expect(row.arity).toBe(2);
        expect(row.getFieldNames()).toEqual(['id', 'price']);
        expect(row.getFieldIndex('price')).toBe(1);
        expect(row.getFieldIndex('qty')).toBe(-1);
        expect(row.hasField('id')).toBe(true);
        expect(row.getFieldType('price')).toBe(TypeUtils.Double);
        expect(row.getFieldType('qty')).toBeUndefined();
    });

    it('rejects duplicate field names', () => {
        expect(
            () =>
                new CaseClassType([
                    { name: 'a', type: TypeUtils.Int },
                    { name: 'a', type: TypeUtils.Long },
                ]),
        ).toThrow('Duplicate field name "a"');
    });

    it('names tuple fields by position', () => {
        const tuple = new TupleType([TypeUtils.Int, TypeUtils.String, TypeUtils.Date]);
        expect(tuple.getFieldNames()).toEqual(['f0', 'f1', 'f2']);
        expect(tuple.toString()).toBe('tuple(f0, f1, f2)');
    });

    it('renames fields positionally', () => {
        const renamed = new RenamingType(row, ['key', 'amount']);
        expect(renamed.getFields()).toEqual([
            { name: 'key', type: TypeUtils.Long },
            { name: 'amount', type: TypeUtils.Double },
        ]);
        expect(renamed.getUnderlyingType()).toBe(row);
        expect(renamed.hasField('id')).toBe(false);
        expect(renamed.toString()).toBe('renaming(key, amount)');
    });

    it('requires one alias per field', () => {
        expect(() => new RenamingType(row, ['key'])).toThrow('Renaming of row(id, price) expects 2 field names, got 1');
    });
});
