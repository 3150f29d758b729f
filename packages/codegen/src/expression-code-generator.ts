import {
    ExpressionUtils,
    MAX_INT,
    TypeUtils,
    type BinaryExpression,
    type BinaryOperator,
    type CastExpression,
    type Expression,
    type FieldExpression,
    type LiteralExpression,
    type SubstringExpression,
    type TypeInfo,
    type UnaryExpression,
} from '@exprgen/schema';
import { match, P } from 'ts-pattern';
import type { DeclarationRegistry } from './declaration-registry';
import {
    createIllegalCastError,
    createUnresolvedFieldError,
    createUnsupportedExpressionError,
} from './errors';
import { renderFieldAccess, resolveFieldAccess } from './field-access';
import type { NameAllocator } from './name-allocator';
import type { InputBinding } from './options';
import { coercePrimitive, defaultValueFor, hasValueIdentity, narrowToType, typeTermFor } from './type-terms';

/**
 * Code computing one expression. After `code` runs, `resultTerm` holds the value and, in
 * null-check mode, `nullTerm` holds whether the value is absent.
 */
export type GeneratedCode = {
    code: string;
    resultTerm: string;
    nullTerm: string;
};

export type CodeGenerationContext = {
    inputs: readonly InputBinding[];
    nullCheck: boolean;
    names: NameAllocator;
    declarations: DeclarationRegistry;
};

type Terms = {
    resultTerm: string;
    nullTerm: string;
};

function lines(...statements: string[]) {
    return statements.map((s) => s + '\n').join('');
}

/**
 * Generates TypeScript statements that evaluate an expression tree over the bound inputs.
 */
export class ExpressionCodeGenerator {
    constructor(private readonly context: CodeGenerationContext) {}

    private get nullCheck() {
        return this.context.nullCheck;
    }

    /**
     * Generates code for the expression, compiling sub-expressions depth-first.
     *
     * @throws CodegenError if the tree contains a node shape without a generation rule, a field
     * reference no input declares, or an illegal cast.
     */
    generate(expression: Expression): GeneratedCode {
        const terms: Terms = {
            nullTerm: this.context.names.fresh('isNull'),
            resultTerm: this.context.names.fresh('result'),
        };

        const expr = ExpressionUtils.unwrapNaming(expression);
        const code = match(expr)
            .with({ kind: 'literal' }, (e) => this.generateLiteral(e, terms))
            .with({ kind: 'field' }, (e) => this.generateField(e, terms))
            .with({ kind: 'binary' }, (e) => this.generateBinary(e, terms))
            .with({ kind: 'unary' }, (e) => this.generateUnary(e, terms))
            .with({ kind: 'isNull' }, { kind: 'isNotNull' }, (e) => this.generateNullTest(e.operand, e.kind, terms))
            .with({ kind: 'cast' }, (e) => this.generateCast(e, terms))
            .with({ kind: 'substring' }, (e) => this.generateSubstring(e, terms))
            .with({ kind: 'naming' }, (e) => {
                throw createUnsupportedExpressionError(e, 'unexpected naming wrapper');
            })
            .exhaustive();

        return { code, ...terms };
    }

    private generateLiteral(expr: LiteralExpression, { resultTerm, nullTerm }: Terms) {
        const typeTerm = typeTermFor(expr.type);

        if (expr.value === null) {
            return lines(
                ...(this.nullCheck ? [`const ${nullTerm} = true;`] : []),
                `const ${resultTerm}: ${typeTerm} | null = null;`,
            );
        }

        const value = this.literalValue(expr, expr.value);
        return lines(...(this.nullCheck ? [`const ${nullTerm} = false;`] : []), `const ${resultTerm}: ${typeTerm} = ${value};`);
    }

    private literalValue(expr: LiteralExpression, value: number | string | boolean | Date) {
        const mismatch = () =>
            createUnsupportedExpressionError(expr, `literal value does not match type ${TypeUtils.toString(expr.type)}`);

        return match([expr.type, value] as const)
            .with([{ kind: 'basic', name: 'Int' }, P.number], ([, v]) => {
                if (!Number.isInteger(v) || v < -MAX_INT - 1 || v > MAX_INT) {
                    throw mismatch();
                }
                return String(v);
            })
            .with([{ kind: 'basic', name: 'Long' }, P.number], ([, v]) => {
                if (!Number.isSafeInteger(v)) {
                    throw mismatch();
                }
                return String(v);
            })
            .with([{ kind: 'basic', name: 'Double' }, P.number], ([, v]) => String(v))
            .with([{ kind: 'basic', name: 'Float' }, P.number], ([, v]) => `Math.fround(${String(v)})`)
            .with([{ kind: 'basic', name: 'String' }, P.string], ([, v]) => JSON.stringify(v))
            .with([{ kind: 'basic', name: 'Boolean' }, P.boolean], ([, v]) => String(v))
            .with([{ kind: 'basic', name: 'Date' }, P.instanceOf(Date)], ([, v]) => {
                if (Number.isNaN(v.getTime())) {
                    throw mismatch();
                }
                return this.context.declarations.ensureDateConstant(v);
            })
            .otherwise(() => {
                throw mismatch();
            });
    }

    private generateField(expr: FieldExpression, { resultTerm, nullTerm }: Terms) {
        const input = this.context.inputs.find(([, type]) => type.hasField(expr.name));
        if (!input) {
            throw createUnresolvedFieldError(
                expr,
                expr.name,
                this.context.inputs.map(([name, type]) => `${name}: ${type.toString()}`),
            );
        }

        const [inputTerm, inputType] = input;
        const typeTerm = typeTermFor(expr.type);
        const access = renderFieldAccess(inputTerm, resolveFieldAccess(inputType, expr.name), typeTerm);
        return lines(
            `const ${resultTerm}: ${typeTerm} = ${access};`,
            ...(this.nullCheck ? [`const ${nullTerm} = ${resultTerm} == null;`] : []),
        );
    }

    // Evaluates `operation` only when both operands are present; otherwise binds the default
    // value of `resultType`.
    private generateIfNonNull(
        left: Expression,
        right: Expression,
        resultType: TypeInfo,
        { resultTerm, nullTerm }: Terms,
        operation: (left: GeneratedCode, right: GeneratedCode) => string,
    ) {
        const leftCode = this.generate(left);
        const rightCode = this.generate(right);
        const resultTypeTerm = typeTermFor(resultType);

        if (this.nullCheck) {
            return (
                leftCode.code +
                rightCode.code +
                lines(
                    `const ${nullTerm} = ${leftCode.nullTerm} || ${rightCode.nullTerm};`,
                    `let ${resultTerm}: ${resultTypeTerm};`,
                    `if (${nullTerm}) {`,
                    `    ${resultTerm} = ${defaultValueFor(resultType)};`,
                    `} else {`,
                    `    ${resultTerm} = ${operation(leftCode, rightCode)};`,
                    `}`,
                )
            );
        } else {
            return (
                leftCode.code +
                rightCode.code +
                lines(`const ${resultTerm}: ${resultTypeTerm} = ${operation(leftCode, rightCode)};`)
            );
        }
    }

    private generateBinary(expr: BinaryExpression, terms: Terms) {
        const { left, right } = expr;
        const infix = (op: BinaryOperator) => (l: GeneratedCode, r: GeneratedCode) =>
            `${l.resultTerm} ${op} ${r.resultTerm}`;

        return match(expr.op)
            .with(P.union('>', '>=', '<', '<=', '&&', '||'), (op) =>
                this.generateIfNonNull(left, right, TypeUtils.Boolean, terms, infix(op)),
            )
            .with('==', () =>
                this.generateIfNonNull(left, right, TypeUtils.Boolean, terms, (l, r) =>
                    this.equality(left.type, right.type, l.resultTerm, r.resultTerm),
                ),
            )
            .with('!=', () =>
                this.generateIfNonNull(
                    left,
                    right,
                    TypeUtils.Boolean,
                    terms,
                    (l, r) => `!(${this.equality(left.type, right.type, l.resultTerm, r.resultTerm)})`,
                ),
            )
            .with(P.union('+', '-'), (op) =>
                this.generateIfNonNull(left, right, expr.type, terms, (l, r) =>
                    narrowToType(`${l.resultTerm} ${op} ${r.resultTerm}`, expr.type),
                ),
            )
            .with('*', () =>
                this.generateIfNonNull(left, right, expr.type, terms, (l, r) =>
                    TypeUtils.isBasic(expr.type, 'Int')
                        ? `Math.imul(${l.resultTerm}, ${r.resultTerm})`
                        : narrowToType(`${l.resultTerm} * ${r.resultTerm}`, expr.type),
                ),
            )
            .with('/', () =>
                this.generateIfNonNull(left, right, expr.type, terms, (l, r) =>
                    TypeUtils.isIntegral(expr.type)
                        ? narrowToType(
                              `Math.trunc(${l.resultTerm} / runtime.checkDivisor(${r.resultTerm}))`,
                              expr.type,
                          )
                        : `${l.resultTerm} / ${r.resultTerm}`,
                ),
            )
            .with('%', () =>
                this.generateIfNonNull(left, right, expr.type, terms, (l, r) =>
                    TypeUtils.isIntegral(expr.type)
                        ? narrowToType(`${l.resultTerm} % runtime.checkDivisor(${r.resultTerm})`, expr.type)
                        : `${l.resultTerm} % ${r.resultTerm}`,
                ),
            )
            .with(P.union('&', '|', '^'), (op) =>
                this.generateIfNonNull(
                    left,
                    right,
                    expr.type,
                    terms,
                    (l, r) => `(${l.resultTerm} | 0) ${op} (${r.resultTerm} | 0)`,
                ),
            )
            .exhaustive();
    }

    private equality(leftType: TypeInfo, rightType: TypeInfo, leftTerm: string, rightTerm: string) {
        if (hasValueIdentity(leftType) && hasValueIdentity(rightType)) {
            return `${leftTerm} === ${rightTerm}`;
        }
        if (TypeUtils.isBasic(leftType, 'Date') && TypeUtils.isBasic(rightType, 'Date')) {
            return `${leftTerm}.getTime() === ${rightTerm}.getTime()`;
        }
        return `runtime.equals(${leftTerm}, ${rightTerm})`;
    }

    private generateUnary(expr: UnaryExpression, { resultTerm, nullTerm }: Terms) {
        const childCode = this.generate(expr.operand);
        const typeTerm = typeTermFor(expr.type);
        const operation = match(expr.op)
            .with('-', () => narrowToType(`-(${childCode.resultTerm})`, expr.type))
            .with('~', () => `~(${childCode.resultTerm} | 0)`)
            .with('!', () => `!(${childCode.resultTerm})`)
            .with('abs', () => narrowToType(`Math.abs(${childCode.resultTerm})`, expr.type))
            .exhaustive();

        if (this.nullCheck) {
            return (
                childCode.code +
                lines(
                    `const ${nullTerm} = ${childCode.nullTerm};`,
                    `let ${resultTerm}: ${typeTerm};`,
                    `if (${nullTerm}) {`,
                    `    ${resultTerm} = ${defaultValueFor(expr.operand.type)};`,
                    `} else {`,
                    `    ${resultTerm} = ${operation};`,
                    `}`,
                )
            );
        } else {
            return childCode.code + lines(`const ${resultTerm}: ${typeTerm} = ${operation};`);
        }
    }

    private generateNullTest(operand: Expression, kind: 'isNull' | 'isNotNull', { resultTerm, nullTerm }: Terms) {
        const childCode = this.generate(operand);
        if (this.nullCheck) {
            const test = kind === 'isNull' ? childCode.nullTerm : `!${childCode.nullTerm}`;
            return (
                childCode.code + lines(`const ${nullTerm} = false;`, `const ${resultTerm}: boolean = ${test};`)
            );
        } else {
            const test = kind === 'isNull' ? '==' : '!=';
            return childCode.code + lines(`const ${resultTerm}: boolean = (${childCode.resultTerm}) ${test} null;`);
        }
    }

    private generateSubstring(expr: SubstringExpression, { resultTerm, nullTerm }: Terms) {
        const strCode = this.generate(expr.str);
        const beginCode = this.generate(expr.begin);
        const endCode = this.generate(expr.end);

        const str = strCode.resultTerm;
        const begin = beginCode.resultTerm;
        const end = endCode.resultTerm;
        const toEnd = `${resultTerm} = (${str}).substring(${begin});`;
        const bounded = `${resultTerm} = (${str}).substring(${begin}, ${end});`;

        // a literal end decides the form here; otherwise the sentinel is tested at run time
        const endValue = ExpressionUtils.getLiteralValue(ExpressionUtils.unwrapNaming(expr.end));
        const selection =
            typeof endValue === 'number'
                ? [endValue === MAX_INT ? toEnd : bounded]
                : [`if (${end} === ${MAX_INT}) {`, `    ${toEnd}`, `} else {`, `    ${bounded}`, `}`];

        const prelude = strCode.code + beginCode.code + endCode.code;
        if (this.nullCheck) {
            return (
                prelude +
                lines(
                    `const ${nullTerm} = ${strCode.nullTerm} || ${beginCode.nullTerm} || ${endCode.nullTerm};`,
                    `let ${resultTerm}: string;`,
                    `if (${nullTerm}) {`,
                    `    ${resultTerm} = ${defaultValueFor(expr.str.type)};`,
                    `} else {`,
                    ...selection.map((s) => `    ${s}`),
                    `}`,
                )
            );
        } else {
            return prelude + lines(`let ${resultTerm}: string;`, ...selection);
        }
    }

    private generateCast(expr: CastExpression, terms: Terms) {
        const from = expr.operand.type;
        const to = expr.type;

        if (TypeUtils.isBasic(to, 'Date') && !TypeUtils.isBasic(from, 'Long') && !TypeUtils.isBasic(from, 'String')) {
            throw createIllegalCastError(expr, 'Only Long and String can be casted to Date.');
        }
        if (TypeUtils.isBasic(from, 'Date') && !TypeUtils.isBasic(to, 'Long') && !TypeUtils.isBasic(to, 'String')) {
            throw createIllegalCastError(expr, 'Date can only be casted to Long or String.');
        }

        const childCode = this.generate(expr.operand);
        const value = childCode.resultTerm;

        // statements binding `terms.resultTerm` from the present operand value
        const conversion: string[] = match([from, to] as const)
            .with([{ kind: 'basic', name: 'Date' }, { kind: 'basic', name: 'String' }], () => {
                const formatter = this.context.declarations.ensureFormatter('timestamp');
                return [`${terms.resultTerm} = ${formatter}.format(${value});`];
            })
            .with([P._, { kind: 'basic', name: 'String' }], () => [`${terms.resultTerm} = String(${value});`])
            .with([{ kind: 'basic', name: 'Long' }, { kind: 'basic', name: 'Date' }], () => [
                `${terms.resultTerm} = new Date(${value});`,
            ])
            .with([{ kind: 'basic', name: 'String' }, { kind: 'basic', name: 'Date' }], () =>
                this.parseDate(value, terms.resultTerm),
            )
            .with([{ kind: 'basic', name: 'Date' }, { kind: 'basic', name: 'Long' }], () => [
                `${terms.resultTerm} = ${value}.getTime();`,
            ])
            .otherwise(() => {
                if (TypeUtils.isBasic(from, 'String') && TypeUtils.isPrimitive(to)) {
                    return [`${terms.resultTerm} = runtime.valueOf.${to.name}(${value});`];
                }
                if (TypeUtils.isPrimitive(from) && TypeUtils.isPrimitive(to)) {
                    const coerced = coercePrimitive(value, from.name, to.name);
                    if (coerced !== undefined) {
                        return [`${terms.resultTerm} = ${coerced};`];
                    }
                }
                throw createUnsupportedExpressionError(
                    expr,
                    `no conversion from ${TypeUtils.toString(from)} to ${TypeUtils.toString(to)}`,
                );
            });

        return childCode.code + this.guardCast(to, childCode, terms, conversion);
    }

    private guardCast(to: TypeInfo, childCode: GeneratedCode, { resultTerm, nullTerm }: Terms, conversion: string[]) {
        const typeTerm = typeTermFor(to);
        if (this.nullCheck) {
            return lines(
                `const ${nullTerm} = ${childCode.nullTerm};`,
                `let ${resultTerm}: ${typeTerm} | null;`,
                `if (${nullTerm}) {`,
                `    ${resultTerm} = ${defaultValueFor(to)};`,
                `} else {`,
                ...conversion.map((s) => `    ${s}`),
                `}`,
            );
        } else {
            return lines(`let ${resultTerm}: ${typeTerm};`, ...conversion);
        }
    }

    // tries "2011-05-03 15:51:36.234", then "2011-05-03", then "15:51:36", then "1304437896234"
    private parseDate(value: string, resultTerm: string): string[] {
        const dateFormatter = this.context.declarations.ensureFormatter('date');
        const timeFormatter = this.context.declarations.ensureFormatter('time');
        const timestampFormatter = this.context.declarations.ensureFormatter('timestamp');
        const parsed = this.context.names.fresh('parsed');

        return [
            `let ${parsed}: Date;`,
            `try {`,
            `    ${parsed} = ${timestampFormatter}.parse(${value});`,
            `} catch {`,
            `    try {`,
            `        ${parsed} = ${dateFormatter}.parse(${value});`,
            `    } catch {`,
            `        try {`,
            `            ${parsed} = ${timeFormatter}.parse(${value});`,
            `        } catch {`,
            `            ${parsed} = runtime.parseEpochMillis(${value});`,
            `        }`,
            `    }`,
            `}`,
            `${resultTerm} = ${parsed};`,
        ];
    }
}
