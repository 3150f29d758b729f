export * from './tiny-invariant';
