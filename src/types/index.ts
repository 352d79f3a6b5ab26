export * from './trace';
export * from './signal';
export * from './policy';
