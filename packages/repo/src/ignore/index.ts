export * from './types';
export { parseRules, compile, matches } from './rules';
export { loadDefaultRules, loadSupplementalRules, PROJECT_IGNORE_FILES } from './loader';
