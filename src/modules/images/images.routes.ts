import express from 'express';
import { ImageStore } from '../upload/localStorage.service';
import { createImagesController } from './images.controller';

export const createImagesRouter = (images: ImageStore) => {
  const router = express.Router();
  const imagesController = createImagesController(images);

  router.get('/:filename', imagesController.getImage);

  return router;
};
