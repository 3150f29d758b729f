import ts from 'typescript';
import { createCompileError } from './errors';
import type { Log } from './log';
import { runtime as defaultRuntime, type Runtime } from './runtime';

export const EVALUATOR_FACTORY = 'createEvaluator';

export type UnitParts = {
    /**
     * Parameter names of the evaluator, one per input binding.
     */
    inputs: readonly string[];
    members: readonly string[];
    inits: readonly string[];
    body: string;
    /**
     * Expression returned by the evaluator.
     */
    returns: string;
};

export type Evaluator = (...rows: unknown[]) => unknown;

function indent(code: string, spaces: number) {
    const pad = ' '.repeat(spaces);
    return code
        .split('\n')
        .filter((line) => line.trim().length > 0)
        .map((line) => pad + line)
        .join('\n');
}

/**
 * Assembles the source of a unit exporting an evaluator factory. Member declarations come
 * first, then init statements, then the evaluator itself.
 */
export function assembleUnit({ inputs, members, inits, body, returns }: UnitParts): string {
    const sections = [
        `export function ${EVALUATOR_FACTORY}(runtime: any) {`,
        indent(members.join('\n'), 4),
        indent(inits.join('\n'), 4),
        `    return function evaluate(${inputs.map((name) => `${name}: any`).join(', ')}) {`,
        indent(body, 8),
        `        return ${returns};`,
        `    };`,
        `}`,
    ];
    return sections.filter((s) => s.length > 0).join('\n') + '\n';
}

/**
 * Turns assembled unit source into an invocable evaluator.
 */
export class UnitCompiler {
    constructor(
        private readonly log: Log,
        private readonly runtime: Runtime = defaultRuntime,
    ) {}

    /**
     * @throws CodegenError with reason `COMPILE_ERROR` when the source does not compile, fails
     * while loading or does not export an evaluator factory
     */
    compile(source: string): Evaluator {
        this.log.debug(() => ({ message: 'Compiling generated unit', details: { source } }));

        const output = ts.transpileModule(source, {
            compilerOptions: {
                target: ts.ScriptTarget.ES2022,
                module: ts.ModuleKind.CommonJS,
            },
            reportDiagnostics: true,
        });

        const errors = (output.diagnostics ?? []).filter((d) => d.category === ts.DiagnosticCategory.Error);
        if (errors.length > 0) {
            const message = errors.map((d) => ts.flattenDiagnosticMessageText(d.messageText, '\n')).join('; ');
            this.log.error(() => ({ message: `Generated unit does not compile: ${message}`, details: { source } }));
            throw createCompileError(`Generated unit does not compile: ${message}`, source);
        }

        const moduleExports: Record<string, unknown> = {};
        try {
            new Function('exports', output.outputText)(moduleExports);
        } catch (err) {
            throw this.loadError(source, err);
        }

        const factory = moduleExports[EVALUATOR_FACTORY];
        if (typeof factory !== 'function') {
            throw createCompileError(`Generated unit does not export "${EVALUATOR_FACTORY}"`, source);
        }

        // the factory runs the member declarations and init statements
        let evaluator: unknown;
        try {
            evaluator = Reflect.apply(factory, undefined, [this.runtime]);
        } catch (err) {
            throw this.loadError(source, err);
        }
        if (typeof evaluator !== 'function') {
            throw createCompileError('Evaluator factory did not return a function', source);
        }

        const evaluate = evaluator;
        return (...rows: unknown[]) => Reflect.apply(evaluate, undefined, rows);
    }

    private loadError(source: string, err: unknown) {
        this.log.error(() => ({ message: 'Failed to load generated unit', error: err }));
        return createCompileError('Failed to load generated unit', source, { cause: err });
    }
}
