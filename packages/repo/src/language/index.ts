export { classify, FALLBACK_LANGUAGE, SAMPLE_CHARS } from './classifier';
export { guessFromContent } from './patterns';
