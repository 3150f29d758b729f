export * from './composite-types';
export * from './expression';
export * from './expression-utils';
export * from './types';
