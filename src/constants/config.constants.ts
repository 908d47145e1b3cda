/**
 * Config slot keys. The set is fixed at startup; only values change.
 */
export const PUBLIC_IMAGE_KEY = 'public_image_url';

export const ESIGN_SLOT_COUNT = 5;

export const ESIGN_KEYS = [
  'esign_image_1',
  'esign_image_2',
  'esign_image_3',
  'esign_image_4',
  'esign_image_5',
] as const;

export type EsignKey = typeof ESIGN_KEYS[number];
export type ConfigKey = typeof PUBLIC_IMAGE_KEY | EsignKey;
