export * from './declaration-registry';
export * from './errors';
export * from './expression-code-generator';
export * from './field-access';
export * from './function-generators';
export * from './log';
export * from './name-allocator';
export * from './options';
export { DateTimeFormatter, runtime, type Runtime } from './runtime';
export * from './session';
export * from './type-terms';
export * from './unit-compiler';
