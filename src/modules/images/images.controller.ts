import { Request, Response, NextFunction } from 'express';
import { ImageStore } from '../upload/localStorage.service';

export const createImagesController = (images: ImageStore) => ({
  // Raw bytes, untyped; missing names fall back to the placeholder
  getImage: (req: Request, res: Response, next: NextFunction) => {
    try {
      const filePath = images.resolve(req.params.filename);
      res.type('application/octet-stream');
      res.sendFile(filePath, error => {
        if (error) {
          next(error);
        }
      });
    } catch (error) {
      next(error);
    }
  },
});
