export { sanitize, DEFAULT_MAX_BLANK_LINES, type SanitizeOptions } from './sanitizer';
export { stripComments } from './comments';
export { resolveRule, type SanitizeRule, type StringDelimiter } from './rules';
