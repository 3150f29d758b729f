import type { TypeInfo } from './types';

export type Expression =
    | LiteralExpression
    | FieldExpression
    | NamingExpression
    | BinaryExpression
    | UnaryExpression
    | IsNullExpression
    | IsNotNullExpression
    | CastExpression
    | SubstringExpression;

export type LiteralValue = number | string | boolean | Date | null;

export type LiteralExpression = {
    kind: 'literal';
    value: LiteralValue;
    type: TypeInfo;
};

export type FieldExpression = {
    kind: 'field';
    name: string;
    type: TypeInfo;
};

export type NamingExpression = {
    kind: 'naming';
    inner: Expression;
    alias: string;
    type: TypeInfo;
};

export type BinaryExpression = {
    kind: 'binary';
    op: BinaryOperator;
    left: Expression;
    right: Expression;
    type: TypeInfo;
};

export type UnaryExpression = {
    kind: 'unary';
    op: UnaryOperator;
    operand: Expression;
    type: TypeInfo;
};

export type IsNullExpression = {
    kind: 'isNull';
    operand: Expression;
    type: TypeInfo;
};

export type IsNotNullExpression = {
    kind: 'isNotNull';
    operand: Expression;
    type: TypeInfo;
};

/**
 * Converts the operand to the expression's own `type`.
 */
export type CastExpression = {
    kind: 'cast';
    operand: Expression;
    type: TypeInfo;
};

export type SubstringExpression = {
    kind: 'substring';
    str: Expression;
    begin: Expression;
    end: Expression;
    type: TypeInfo;
};

export type ComparisonOperator = '>' | '>=' | '<' | '<=';
export type EqualityOperator = '==' | '!=';
export type LogicalOperator = '&&' | '||';
export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%';
export type BitwiseOperator = '&' | '|' | '^';

export type BinaryOperator = ComparisonOperator | EqualityOperator | LogicalOperator | ArithmeticOperator | BitwiseOperator;

export type UnaryOperator = '!' | '-' | '~' | 'abs';

/**
 * Upper bound of a substring that runs to the end of the string.
 */
export const MAX_INT = 2147483647;
