import { describe, expect, it } from 'vitest';
import { assembleUnit, CodegenError, CodegenErrorReason, Log, runtime, UnitCompiler } from '../src';

function compileError(source: string) {
    try {
        new UnitCompiler(new Log([])).compile(source);
    } catch (err) {
        if (err instanceof CodegenError) {
            return err;
        }
        throw err;
    }
    throw new Error('expected compilation to fail');
}

describe('Unit compiler', () => {
    it('assembles sections in order and drops blank lines', () => {
        const source = assembleUnit({
            inputs: ['a', 'b'],
            members: ['const one = 1;'],
            inits: ['runtime.ready = true;'],
            body: 'const sum = a + b;\n\nconst total = sum + one;\n',
            returns: 'total',
        });
        expect(source).toBe(
            [
                'export function createEvaluator(runtime: any) {',
                '    const one = 1;',
                '    runtime.ready = true;',
                '    return function evaluate(a: any, b: any) {',
                '        const sum = a + b;',
                '        const total = sum + one;',
                '        return total;',
                '    };',
                '}',
                '',
            ].join('\n'),
        );
    });

    it('compiles and invokes an evaluator', () => {
        const source = assembleUnit({
            inputs: ['row'],
            members: ["const formatter = runtime.createFormatter('yyyy');"],
            inits: [],
            body: 'const year: string = formatter.format(row.when);\n',
            returns: 'year',
        });
        const evaluate = new UnitCompiler(new Log([]), runtime).compile(source);
        expect(evaluate({ when: new Date(Date.UTC(1999, 0, 1)) })).toBe('1999');
    });

    it('reports syntax errors with the source', () => {
        const source = 'export function createEvaluator(runtime: any) {\n    return function evaluate( {\n';
        const error = compileError(source);
        expect(error.reason).toBe(CodegenErrorReason.COMPILE_ERROR);
        expect(error.message).toMatch(/^Generated unit does not compile: /);
        expect(error.source).toBe(source);
    });

    it('reports failures while loading', () => {
        const error = compileError('throw new Error("boom");');
        expect(error.message).toBe('Failed to load generated unit');
        expect(error.cause).toBeInstanceOf(Error);
    });

    it('reports failures of the init statements', () => {
        const source = assembleUnit({
            inputs: ['row'],
            members: ["const formatter = runtime.createFormatter('yyyy');"],
            inits: ['formatter.setTimeZone(undefined.zone);'],
            body: '',
            returns: 'row',
        });
        const error = compileError(source);
        expect(error.reason).toBe(CodegenErrorReason.COMPILE_ERROR);
        expect(error.message).toBe('Failed to load generated unit');
        expect(error.cause).toBeInstanceOf(TypeError);
        expect(error.source).toBe(source);
    });

    it('requires the evaluator factory', () => {
        expect(compileError('export const x = 1;').message).toBe('Generated unit does not export "createEvaluator"');
        expect(compileError('export function createEvaluator() { return 1; }').message).toBe(
            'Evaluator factory did not return a function',
        );
    });

    it('logs the source at debug level', () => {
        const messages: string[] = [];
        const log = new Log((event) => messages.push(`${event.level}: ${event.message}`));
        new UnitCompiler(log).compile('export function createEvaluator() { return () => 1; }');
        expect(messages).toEqual(['debug: Compiling generated unit']);
    });
});
