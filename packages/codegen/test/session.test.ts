import { ExpressionUtils as E, PojoType, TypeUtils } from '@exprgen/schema';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { CodegenError, CodegenErrorReason, GenerationSession, type LogEvent } from '../src';

const item = new PojoType([{ name: 'price', type: TypeUtils.Double }]);

describe('Generation session', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('options', () => {
        it('applies defaults', () => {
            const session = new GenerationSession([['in1', item]]);
            expect(session.options.nullCheck).toBe(true);
            expect(session.options.timeZone).toBe('UTC');
            expect(session.options.log).toEqual([]);
        });

        it('rejects unknown time zones', () => {
            try {
                new GenerationSession([['in1', item]], { timeZone: 'Mars/Olympus' });
                expect.unreachable();
            } catch (err) {
                expect(err).toBeInstanceOf(CodegenError);
                expect(err).toHaveProperty('reason', CodegenErrorReason.CONFIG_ERROR);
                expect(err).toHaveProperty('message', expect.stringContaining('Invalid IANA time zone'));
            }
        });

        it('rejects invalid input names', () => {
            expect(() => new GenerationSession([['1st', item]])).toThrow('Input name "1st" is not a valid identifier');
            expect(() =>
                new GenerationSession([
                    ['in1', item],
                    ['in1', item],
                ]),
            ).toThrow('Duplicate input name "in1"');
        });

        it('rejects input names the generated unit uses', () => {
            for (const name of ['runtime', 'dateFormatter', 'timestampFormatter', 'Math', 'class', 'this']) {
                expect(() => new GenerationSession([[name, item]])).toThrow(`Input name "${name}" is reserved`);
            }
            for (const name of ['result$1', 'date$0', '$']) {
                expect(() => new GenerationSession([[name, item]])).toThrow(
                    `Input name "${name}" is not a valid identifier`,
                );
            }
        });

        it('reports rejected input names as configuration errors', () => {
            try {
                new GenerationSession([['runtime', item]]);
                expect.unreachable();
            } catch (err) {
                expect(err).toBeInstanceOf(CodegenError);
                expect(err).toHaveProperty('reason', CodegenErrorReason.CONFIG_ERROR);
            }
        });
    });

    describe('compile', () => {
        it('keeps names unique across expressions', () => {
            const session = new GenerationSession([['in1', item]]);
            const first = session.compileOrThrow(E.field('price', TypeUtils.Double));
            const second = session.compileOrThrow(E.field('price', TypeUtils.Double));
            expect([first.nullTerm, first.resultTerm, second.nullTerm, second.resultTerm]).toEqual([
                'isNull$0',
                'result$1',
                'isNull$2',
                'result$3',
            ]);
            expect(session.names.allocated).toBe(4);
        });

        it('returns generation errors', () => {
            const session = new GenerationSession([['in1', item]]);
            const result = session.compile(E.field('qty', TypeUtils.Int));
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.reason).toBe(CodegenErrorReason.UNRESOLVED_FIELD);
            }
            expect(() => session.compileOrThrow(E.field('qty', TypeUtils.Int))).toThrow(CodegenError);
        });
    });

    describe('logging', () => {
        it('sends events to a logger function', () => {
            const events: LogEvent[] = [];
            const session = new GenerationSession([['in1', item]], { log: (event) => events.push(event) });

            session.compile(E.literal(42, TypeUtils.Int));
            session.compile(E.field('qty', TypeUtils.Int));

            expect(events).toEqual([
                {
                    level: 'debug',
                    message: 'Generated code for 42',
                    details: { resultTerm: 'result$1', nullTerm: 'isNull$0', members: 0, inits: 0 },
                },
                {
                    level: 'error',
                    message: 'Could not get accessor for "qty" in inputs in1: pojo(price)',
                    error: expect.any(CodegenError),
                },
            ]);
        });

        it('prints enabled levels to the console', () => {
            const error = vi.spyOn(console, 'error').mockImplementation(() => {});
            const log = vi.spyOn(console, 'log').mockImplementation(() => {});
            const session = new GenerationSession([['in1', item]], { log: ['error'] });

            session.compile(E.literal(1, TypeUtils.Int));
            session.compile(E.field('qty', TypeUtils.Int));

            expect(log).not.toHaveBeenCalled();
            expect(error).toHaveBeenCalledTimes(1);
            expect(error).toHaveBeenCalledWith(
                '[exprgen] Could not get accessor for "qty" in inputs in1: pojo(price)',
                expect.any(CodegenError),
            );
        });

        it('is silent by default', () => {
            const error = vi.spyOn(console, 'error').mockImplementation(() => {});
            const log = vi.spyOn(console, 'log').mockImplementation(() => {});

            const session = new GenerationSession([['in1', item]]);
            session.compile(E.field('qty', TypeUtils.Int));
            session.compile(E.field('price', TypeUtils.Double));

            expect(session.log.isLevelEnabled('debug')).toBe(false);
            expect(error).not.toHaveBeenCalled();
            expect(log).not.toHaveBeenCalled();
        });
    });
});
