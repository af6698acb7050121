export { abbreviate, abbreviateAddress, fitToLength } from './abbreviator.js';
export type { AddressLimits } from './abbreviator.js';
export { AddressNormalizer, cleanPostalCode, normalizeCityName } from './normalizer.js';
export type { AddressNormalizerOptions, NormalizationResult } from './normalizer.js';
export { suggestionFor } from './suggestions.js';
