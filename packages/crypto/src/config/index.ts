/**
 * @journal-vault/crypto - Configuration
 */

export type { CodecConfig, KeyExpansionLayout } from './types';
export {
  DEFAULT_CODEC_CONFIG,
  LEGACY_PROFILE,
  CONFIG_PROPERTY_KEYS,
  resolveCodecConfig,
  codecConfigFromProperties,
} from './resolve';
