export const name = '@codepack/core';

export * from './tokens';
export * from './processor';
export * from './pipeline';
export * from './output';
export * from './report';
export { ConfigLoader, PROJECT_CONFIG_FILE, type ConfigOptions, type LoadedConfig } from './config/loader';
