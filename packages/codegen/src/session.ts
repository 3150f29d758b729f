import { ExpressionUtils, type Expression } from '@exprgen/schema';
import { DeclarationRegistry } from './declaration-registry';
import { CodegenError } from './errors';
import { ExpressionCodeGenerator, type GeneratedCode } from './expression-code-generator';
import { Log } from './log';
import { NameAllocator } from './name-allocator';
import {
    resolveOptions,
    validateInputs,
    type GenerationOptions,
    type InputBinding,
    type ResolvedGenerationOptions,
} from './options';

export type GenerationResult = { success: true; data: GeneratedCode } | { success: false; error: CodegenError };

/**
 * Scope of one compile request: fresh-name state and the declarations shared by every
 * expression compiled in it. A session must not be shared between concurrent compiles.
 */
export class GenerationSession {
    readonly options: ResolvedGenerationOptions;
    readonly names = new NameAllocator();
    readonly declarations: DeclarationRegistry;
    readonly log: Log;
    private readonly generator: ExpressionCodeGenerator;

    /**
     * @throws CodegenError with reason `CONFIG_ERROR` for invalid options or input bindings
     */
    constructor(
        readonly inputs: readonly InputBinding[],
        options?: GenerationOptions,
    ) {
        validateInputs(inputs);
        this.options = resolveOptions(options);
        this.log = new Log(this.options.log);
        this.declarations = new DeclarationRegistry(this.options.timeZone);
        this.generator = new ExpressionCodeGenerator({
            inputs,
            nullCheck: this.options.nullCheck,
            names: this.names,
            declarations: this.declarations,
        });
    }

    get nullCheck() {
        return this.options.nullCheck;
    }

    /**
     * Compiles an expression into code. Generation errors are returned, never thrown.
     */
    compile(expression: Expression): GenerationResult {
        try {
            const data = this.generator.generate(expression);
            this.log.debug(() => ({
                message: `Generated code for ${ExpressionUtils.toString(expression)}`,
                details: {
                    resultTerm: data.resultTerm,
                    nullTerm: this.nullCheck ? data.nullTerm : undefined,
                    members: this.declarations.getMembers().length,
                    inits: this.declarations.getInits().length,
                },
            }));
            return { success: true, data };
        } catch (err) {
            if (err instanceof CodegenError) {
                this.log.error(() => ({ message: err.message, error: err }));
                return { success: false, error: err };
            }
            throw err;
        }
    }

    /**
     * Compiles an expression, throwing on generation errors.
     */
    compileOrThrow(expression: Expression): GeneratedCode {
        const result = this.compile(expression);
        if (!result.success) {
            throw result.error;
        }
        return result.data;
    }

    getMemberDeclarations(): string[] {
        return this.declarations.getMembers();
    }

    getInitStatements(): string[] {
        return this.declarations.getInits();
    }
}
