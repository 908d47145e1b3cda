import { ESIGN_KEYS, ESIGN_SLOT_COUNT, EsignKey, PUBLIC_IMAGE_KEY } from '../../constants';
import { ValidationError } from '../../utils/errors';
import { ConfigEntries } from './models/config.model';

export class ConfigStore {
  private entries: ConfigEntries;

  constructor(publicImageUrl: string = '') {
    this.entries = {
      [PUBLIC_IMAGE_KEY]: publicImageUrl,
      esign_image_1: '',
      esign_image_2: '',
      esign_image_3: '',
      esign_image_4: '',
      esign_image_5: '',
    };
  }

  getAll(): ConfigEntries {
    return { ...this.entries };
  }

  setPublicImageUrl(url: string): string {
    this.entries[PUBLIC_IMAGE_KEY] = url;
    return url;
  }

  /**
   * Overwrite esign slot `index` (1-based) and return the key written.
   */
  setEsignUrl(index: number, url: string): EsignKey {
    const key = esignKey(index);
    this.entries[key] = url;
    return key;
  }
}

export const esignKey = (index: number): EsignKey => {
  if (!Number.isInteger(index) || index < 1 || index > ESIGN_SLOT_COUNT) {
    throw new ValidationError(`Esign index must be between 1 and ${ESIGN_SLOT_COUNT}`);
  }
  return ESIGN_KEYS[index - 1];
};
