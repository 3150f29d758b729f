import { invariant } from '@exprgen/common-helpers';
import { TypeUtils, type Expression } from '@exprgen/schema';
import { createUnsupportedExpressionError } from './errors';
import type { GeneratedCode } from './expression-code-generator';
import type { GenerationOptions, InputBinding } from './options';
import { GenerationSession } from './session';
import { assembleUnit, UnitCompiler } from './unit-compiler';

export type GeneratedFunction<F> = {
    /**
     * Source of the compiled unit.
     */
    source: string;
    fn: F;
};

function valueOrNull(session: GenerationSession, code: GeneratedCode) {
    return session.nullCheck ? `${code.nullTerm} ? null : ${code.resultTerm}` : code.resultTerm;
}

function build(session: GenerationSession, codes: GeneratedCode[], returns: string) {
    const source = assembleUnit({
        inputs: session.inputs.map(([name]) => name),
        members: session.getMemberDeclarations(),
        inits: session.getInitStatements(),
        body: codes.map((c) => c.code).join(''),
        returns,
    });
    return { source, evaluate: new UnitCompiler(session.log).compile(source) };
}

/**
 * Generates a row filter. Rows for which the predicate is absent are rejected.
 */
export function generateFilter(
    inputs: readonly InputBinding[],
    predicate: Expression,
    options?: GenerationOptions,
): GeneratedFunction<(...rows: unknown[]) => boolean> {
    if (!TypeUtils.isBasic(predicate.type, 'Boolean')) {
        throw createUnsupportedExpressionError(predicate, 'filter predicate must be of type Boolean');
    }

    const session = new GenerationSession(inputs, options);
    const code = session.compileOrThrow(predicate);
    const returns = session.nullCheck
        ? `!${code.nullTerm} && ${code.resultTerm} === true`
        : `${code.resultTerm} === true`;
    const { source, evaluate } = build(session, [code], returns);
    return { source, fn: (...rows) => evaluate(...rows) === true };
}

/**
 * Generates a projection computing one value per expression. Absent values are `null`.
 */
export function generateProjection(
    inputs: readonly InputBinding[],
    expressions: readonly Expression[],
    options?: GenerationOptions,
): GeneratedFunction<(...rows: unknown[]) => unknown[]> {
    const session = new GenerationSession(inputs, options);
    const codes = expressions.map((expr) => session.compileOrThrow(expr));
    const returns = `[${codes.map((c) => valueOrNull(session, c)).join(', ')}]`;
    const { source, evaluate } = build(session, codes, returns);
    return {
        source,
        fn: (...rows) => {
            const result = evaluate(...rows);
            invariant(Array.isArray(result), 'projection must produce an array');
            return result;
        },
    };
}
