export {
  parseVariantKey,
  parseVariantId,
  canonicalForm,
  variantKeysEqual,
  VARIANT_ID_SEPARATOR,
} from './variant-key.js';
