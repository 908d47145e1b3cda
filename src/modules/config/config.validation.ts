import { z } from 'zod';

export const publicImageSchema = z.object({
  public_image_url: z.string({
    required_error: 'Missing public_image_url field',
    invalid_type_error: 'public_image_url must be a string',
  }),
});

export const esignImageSchema = z.object({
  url: z.string({
    required_error: 'Missing url field',
    invalid_type_error: 'url must be a string',
  }),
});

export const esignIndexSchema = z.coerce
  .number({ invalid_type_error: 'Esign index must be a number' })
  .int('Esign index must be an integer');
