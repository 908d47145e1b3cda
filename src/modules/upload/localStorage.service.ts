/**
 * Local Storage Service - order images in one flat directory
 */

import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { NotFoundError, StorageError } from '../../utils/errors';
import { logger } from '../../utils/logging';

export interface LocalStorageConfig {
  uploadDir: string;
  placeholderName: string;
  publicPrefix: string;
}

const PLACEHOLDER_CONTENT = 'A placeholder image should be here.';

export class ImageStore {
  private readonly uploadDir: string;

  constructor(private readonly config: LocalStorageConfig) {
    this.uploadDir = path.resolve(config.uploadDir);
  }

  /**
   * Generate the stored name for an upload: order id, 8 random hex chars,
   * then the original name without any directory part.
   */
  generateFileName(orderId: number, originalName: string): string {
    const disambiguator = uuidv4().replace(/-/g, '').substring(0, 8);
    return `order_${orderId}_${disambiguator}_${path.basename(originalName)}`;
  }

  /**
   * Save file bytes for an order
   * @returns public path of the stored file, e.g. /images/order_3_1a2b3c4d_photo.jpg
   */
  async save(fileBuffer: Buffer, originalName: string, orderId: number): Promise<string> {
    const fileName = this.generateFileName(orderId, originalName);
    const filePath = path.join(this.uploadDir, fileName);

    try {
      this.ensureUploadDir();
      await fs.promises.writeFile(filePath, fileBuffer);
    } catch (error) {
      logger.error('Error saving file to local storage', {
        filePath,
        orderId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new StorageError('Could not save uploaded file');
    }

    return `${this.config.publicPrefix}/${fileName}`;
  }

  /**
   * Resolve a stored file by name, falling back to the placeholder.
   * @returns absolute path of the file to serve
   */
  resolve(name: string): string {
    const requested = path.join(this.uploadDir, path.basename(name));
    if (fs.existsSync(requested) && fs.statSync(requested).isFile()) {
      return requested;
    }

    const placeholder = this.placeholderPath();
    if (fs.existsSync(placeholder)) {
      return placeholder;
    }

    throw new NotFoundError('Image not found');
  }

  /**
   * Create the upload directory and placeholder file when missing.
   * Failure is logged, not thrown: images can still be uploaded.
   */
  ensurePlaceholder(): void {
    const placeholder = this.placeholderPath();
    try {
      this.ensureUploadDir();
      if (!fs.existsSync(placeholder)) {
        fs.writeFileSync(placeholder, PLACEHOLDER_CONTENT);
      }
    } catch (error) {
      logger.warn('Could not create placeholder image', {
        placeholder,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  get placeholderUrl(): string {
    return `${this.config.publicPrefix}/${this.config.placeholderName}`;
  }

  private placeholderPath(): string {
    return path.join(this.uploadDir, this.config.placeholderName);
  }

  private ensureUploadDir(): void {
    if (!fs.existsSync(this.uploadDir)) {
      fs.mkdirSync(this.uploadDir, { recursive: true });
    }
  }
}
