import { ExpressionUtils, type Expression } from '@exprgen/schema';

/**
 * Reason code for code generation errors.
 */
export enum CodegenErrorReason {
    /**
     * Invalid generation options or input bindings.
     */
    CONFIG_ERROR = 'config-error',

    /**
     * The expression node does not match any supported node/type combination.
     */
    UNSUPPORTED_EXPRESSION = 'unsupported-expression',

    /**
     * No input binding declares the referenced field.
     */
    UNRESOLVED_FIELD = 'unresolved-field',

    /**
     * A cast to or from `Date` with an illegal counterpart type.
     */
    ILLEGAL_CAST = 'illegal-cast',

    /**
     * The assembled unit could not be compiled.
     */
    COMPILE_ERROR = 'compile-error',
}

/**
 * Expression code generation error.
 */
export class CodegenError extends Error {
    constructor(
        public reason: CodegenErrorReason,
        message?: string,
        options?: ErrorOptions,
    ) {
        super(message, options);
        this.name = 'CodegenError';
    }

    /**
     * The expression node at which generation failed.
     */
    public expression?: Expression;

    /**
     * The generated source that failed to compile. Only available when `reason` is `COMPILE_ERROR`.
     */
    public source?: string;
}

/**
 * Error raised by generated code at run time when a string cannot be converted.
 */
export class RuntimeParseError extends Error {
    constructor(
        public readonly text: string,
        public readonly target: string,
    ) {
        super(`Unparseable ${target}: "${text}"`);
        this.name = 'RuntimeParseError';
    }
}

/**
 * Error raised by generated code at run time for an integral division or remainder by zero.
 */
export class RuntimeArithmeticError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RuntimeArithmeticError';
    }
}

export function createConfigError(message: string, options?: ErrorOptions) {
    return new CodegenError(CodegenErrorReason.CONFIG_ERROR, message, options);
}

export function createUnsupportedExpressionError(expression: Expression, details?: string) {
    const error = new CodegenError(
        CodegenErrorReason.UNSUPPORTED_EXPRESSION,
        `Could not generate code for expression ${ExpressionUtils.toString(expression)}${details ? `: ${details}` : ''}`,
    );
    error.expression = expression;
    return error;
}

export function createUnresolvedFieldError(expression: Expression, field: string, inputs: readonly string[]) {
    const error = new CodegenError(
        CodegenErrorReason.UNRESOLVED_FIELD,
        `Could not get accessor for "${field}" in inputs ${inputs.length > 0 ? inputs.join(', ') : '(none)'}`,
    );
    error.expression = expression;
    return error;
}

export function createIllegalCastError(expression: Expression, message: string) {
    const error = new CodegenError(CodegenErrorReason.ILLEGAL_CAST, message);
    error.expression = expression;
    return error;
}

export function createCompileError(message: string, source: string, options?: ErrorOptions) {
    const error = new CodegenError(CodegenErrorReason.COMPILE_ERROR, message, options);
    error.source = source;
    return error;
}
