export { TokenAccountant, TRUNCATION_MARKER } from './accountant';
export type { FitResult, Tokenizer, TokenAccountantOptions } from './accountant';
export { lookupModel, knownModels, EncodingNameSchema } from './models';
export type { EncodingName, ModelProfile } from './models';
