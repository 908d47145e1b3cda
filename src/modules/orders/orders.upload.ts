/**
 * Multer configuration for order image uploads
 */

import multer from 'multer';

export const IMAGE_FIELD = 'image';

// Memory storage: the bytes go to ImageStore once the order id is known.
// No fileFilter and no size limit, any byte stream is accepted.
export const createImageUpload = () =>
  multer({
    storage: multer.memoryStorage(),
  }).single(IMAGE_FIELD);

/**
 * Original file name as the client sent it. Multer decodes multipart
 * filenames as latin1; clients send UTF-8.
 */
export const originalFileName = (file: Express.Multer.File): string =>
  Buffer.from(file.originalname, 'latin1').toString('utf8');
