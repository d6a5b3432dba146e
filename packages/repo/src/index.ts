export * from './ignore';
export * from './scanner';
export * from './encoding';
export * from './language';
export * from './sanitize';
export { resolveRoot } from './root';
