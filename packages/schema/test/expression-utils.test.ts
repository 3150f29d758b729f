import { describe, expect, it } from 'vitest';
import { ExpressionUtils as E, PojoType, TypeUtils } from '../src';

describe('Expression utils', () => {
    it('types comparisons and logical operators as Boolean', () => {
        const a = E.field('a', TypeUtils.Int);
        expect(E.compare(a, '<', E.literal(1, TypeUtils.Int)).type).toBe(TypeUtils.Boolean);
        expect(E.eq(a, a).op).toBe('==');
        expect(E.not(E.literal(true, TypeUtils.Boolean)).type).toBe(TypeUtils.Boolean);
        expect(E.isNull(a).type).toBe(TypeUtils.Boolean);
    });

    it('types arithmetic and unary operators by their left operand', () => {
        const d = E.field('d', TypeUtils.Double);
        expect(E.arithmetic(d, '*', E.field('e', TypeUtils.Double)).type).toBe(TypeUtils.Double);
        expect(E.arithmetic(d, '+', d, TypeUtils.Float).type).toBe(TypeUtils.Float);
        expect(E.negate(d).type).toBe(TypeUtils.Double);
        expect(E.substring(E.field('s', TypeUtils.String), d, d).type).toBe(TypeUtils.String);
    });

    it('folds conjunctions to the left', () => {
        const p = E.field('p', TypeUtils.Boolean);
        const q = E.field('q', TypeUtils.Boolean);
        const r = E.field('r', TypeUtils.Boolean);
        expect(E.toString(E.and(p, q, r))).toBe('((p && q) && r)');
        expect(E.or(p)).toBe(p);
    });

    it('unwraps nested namings', () => {
        const inner = E.literal(1, TypeUtils.Int);
        expect(E.unwrapNaming(E.naming(E.naming(inner, 'a'), 'b'))).toBe(inner);
        expect(E.naming(inner, 'a').type).toBe(TypeUtils.Int);
    });

    it('narrows by kind', () => {
        const cast = E.cast(E.literal('1', TypeUtils.String), TypeUtils.Int);
        expect(E.isCast(cast)).toBe(true);
        expect(E.isLiteral(cast)).toBe(false);
        expect(E.isLiteral(cast.operand)).toBe(true);
        expect(E.is(null, 'field')).toBe(false);
        expect(E.getLiteralValue(cast.operand)).toBe('1');
        expect(E.getLiteralValue(cast)).toBeUndefined();
    });

    it('renders expressions in infix notation', () => {
        const expr = E.and(
            E.isNotNull(E.field('name', TypeUtils.String)),
            E.neq(E.abs(E.field('n', TypeUtils.Int)), E.cast(E.literal('7', TypeUtils.String), TypeUtils.Int)),
        );
        expect(E.toString(expr)).toBe('(isNotNull(name) && (abs(n) != cast("7" as Int)))');
        expect(E.toString(E.literal(new Date(5), TypeUtils.Date))).toBe('Date(5)');
        expect(E.toString(E._null(TypeUtils.Int))).toBe('null');
        expect(E.toString(E.naming(E.bitwiseNot(E.field('x', TypeUtils.Int)), 'y'))).toBe('~(x) as y');
        expect(
            E.toString(E.substring(E.field('s', TypeUtils.String), E.literal(0, TypeUtils.Int), E.literal(2, TypeUtils.Int))),
        ).toBe('substring(s, 0, 2)');
    });
});

describe('Type utils', () => {
    it('classifies basic types', () => {
        expect(TypeUtils.isIntegral(TypeUtils.Short)).toBe(true);
        expect(TypeUtils.isIntegral(TypeUtils.Float)).toBe(false);
        expect(TypeUtils.isNumeric(TypeUtils.Float)).toBe(true);
        expect(TypeUtils.isNumeric(TypeUtils.Char)).toBe(false);
        expect(TypeUtils.isPrimitive(TypeUtils.Boolean)).toBe(true);
        expect(TypeUtils.isPrimitive(TypeUtils.String)).toBe(false);
        expect(TypeUtils.isBasic(TypeUtils.Date, 'Date')).toBe(true);
        expect(TypeUtils.isBasic(TypeUtils.arrayOf('Int'))).toBe(false);
    });

    it('compares and prints types', () => {
        const pojo = new PojoType([{ name: 'a', type: TypeUtils.Int }]);
        expect(TypeUtils.equals(TypeUtils.arrayOf('Byte'), TypeUtils.arrayOf('Byte'))).toBe(true);
        expect(TypeUtils.equals(TypeUtils.Int, TypeUtils.Long)).toBe(false);
        expect(TypeUtils.equals(pojo, new PojoType([{ name: 'a', type: TypeUtils.Int }]))).toBe(false);
        expect(TypeUtils.isComposite(pojo)).toBe(true);
        expect(TypeUtils.toString(TypeUtils.arrayOf('Char'))).toBe('Char[]');
        expect(TypeUtils.toString(pojo)).toBe('pojo(a)');
    });
});
