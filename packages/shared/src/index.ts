export const name = '@codepack/shared';

export * from './types/events';
export * from './types/records';
export * from './logger';
export * from './errors';
export * from './result';
export * from './fs/io';
export * from './fs/path';
export * from './config/schema';
