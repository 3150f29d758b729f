import type {
    ArithmeticOperator,
    BinaryExpression,
    BinaryOperator,
    BitwiseOperator,
    CastExpression,
    ComparisonOperator,
    Expression,
    FieldExpression,
    IsNotNullExpression,
    IsNullExpression,
    LiteralExpression,
    LiteralValue,
    NamingExpression,
    SubstringExpression,
    UnaryExpression,
    UnaryOperator,
} from './expression';
import { TypeUtils, type TypeInfo } from './types';

/**
 * Utility functions to create and work with Expression objects
 */
export const ExpressionUtils = {
    literal: (value: LiteralValue, type: TypeInfo): LiteralExpression => {
        return {
            kind: 'literal',
            value,
            type,
        };
    },

    _null: (type: TypeInfo): LiteralExpression => {
        return ExpressionUtils.literal(null, type);
    },

    field: (name: string, type: TypeInfo): FieldExpression => {
        return {
            kind: 'field',
            name,
            type,
        };
    },

    naming: (inner: Expression, alias: string): NamingExpression => {
        return {
            kind: 'naming',
            inner,
            alias,
            type: inner.type,
        };
    },

    binary: (left: Expression, op: BinaryOperator, right: Expression, type: TypeInfo): BinaryExpression => {
        return {
            kind: 'binary',
            op,
            left,
            right,
            type,
        };
    },

    unary: (op: UnaryOperator, operand: Expression, type: TypeInfo = operand.type): UnaryExpression => {
        return {
            kind: 'unary',
            op,
            operand,
            type,
        };
    },

    compare: (left: Expression, op: ComparisonOperator, right: Expression) => {
        return ExpressionUtils.binary(left, op, right, TypeUtils.Boolean);
    },

    eq: (left: Expression, right: Expression) => ExpressionUtils.binary(left, '==', right, TypeUtils.Boolean),

    neq: (left: Expression, right: Expression) => ExpressionUtils.binary(left, '!=', right, TypeUtils.Boolean),

    arithmetic: (left: Expression, op: ArithmeticOperator, right: Expression, type: TypeInfo = left.type) => {
        return ExpressionUtils.binary(left, op, right, type);
    },

    bitwise: (left: Expression, op: BitwiseOperator, right: Expression, type: TypeInfo = left.type) => {
        return ExpressionUtils.binary(left, op, right, type);
    },

    and: (expr: Expression, ...expressions: Expression[]) => {
        return expressions.reduce((acc, exp) => ExpressionUtils.binary(acc, '&&', exp, TypeUtils.Boolean), expr);
    },

    or: (expr: Expression, ...expressions: Expression[]) => {
        return expressions.reduce((acc, exp) => ExpressionUtils.binary(acc, '||', exp, TypeUtils.Boolean), expr);
    },

    not: (expr: Expression) => {
        return ExpressionUtils.unary('!', expr, TypeUtils.Boolean);
    },

    negate: (expr: Expression) => ExpressionUtils.unary('-', expr),

    bitwiseNot: (expr: Expression) => ExpressionUtils.unary('~', expr),

    abs: (expr: Expression) => ExpressionUtils.unary('abs', expr),

    isNull: (operand: Expression): IsNullExpression => {
        return {
            kind: 'isNull',
            operand,
            type: TypeUtils.Boolean,
        };
    },

    isNotNull: (operand: Expression): IsNotNullExpression => {
        return {
            kind: 'isNotNull',
            operand,
            type: TypeUtils.Boolean,
        };
    },

    cast: (operand: Expression, type: TypeInfo): CastExpression => {
        return {
            kind: 'cast',
            operand,
            type,
        };
    },

    substring: (str: Expression, begin: Expression, end: Expression): SubstringExpression => {
        return {
            kind: 'substring',
            str,
            begin,
            end,
            type: TypeUtils.String,
        };
    },

    /**
     * Strips `naming` wrappers, which carry no semantics of their own.
     */
    unwrapNaming: (expr: Expression): Expression => {
        let result = expr;
        while (result.kind === 'naming') {
            result = result.inner;
        }
        return result;
    },

    is: <K extends Expression['kind']>(value: unknown, kind: K): value is Extract<Expression, { kind: K }> => {
        return !!value && typeof value === 'object' && 'kind' in value && value.kind === kind;
    },

    isLiteral: (value: unknown): value is LiteralExpression => ExpressionUtils.is(value, 'literal'),

    isCast: (value: unknown): value is CastExpression => ExpressionUtils.is(value, 'cast'),

    getLiteralValue: (expr: Expression): LiteralValue | undefined => {
        return ExpressionUtils.isLiteral(expr) ? expr.value : undefined;
    },

    /**
     * Renders an expression in infix notation, for messages.
     */
    toString: (expr: Expression): string => {
        switch (expr.kind) {
            case 'literal':
                return expr.value instanceof Date
                    ? `Date(${expr.value.getTime()})`
                    : typeof expr.value === 'string'
                      ? JSON.stringify(expr.value)
                      : String(expr.value);
            case 'field':
                return expr.name;
            case 'naming':
                return `${ExpressionUtils.toString(expr.inner)} as ${expr.alias}`;
            case 'binary':
                return `(${ExpressionUtils.toString(expr.left)} ${expr.op} ${ExpressionUtils.toString(expr.right)})`;
            case 'unary':
                return expr.op === 'abs'
                    ? `abs(${ExpressionUtils.toString(expr.operand)})`
                    : `${expr.op}(${ExpressionUtils.toString(expr.operand)})`;
            case 'isNull':
                return `isNull(${ExpressionUtils.toString(expr.operand)})`;
            case 'isNotNull':
                return `isNotNull(${ExpressionUtils.toString(expr.operand)})`;
            case 'cast':
                return `cast(${ExpressionUtils.toString(expr.operand)} as ${TypeUtils.toString(expr.type)})`;
            case 'substring':
                return `substring(${ExpressionUtils.toString(expr.str)}, ${ExpressionUtils.toString(expr.begin)}, ${ExpressionUtils.toString(expr.end)})`;
        }
    },
};
