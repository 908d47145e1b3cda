import express from 'express';
import multer from 'multer';
import { createAuthController } from './auth.controller';
import { AuthService } from './auth.service';

export const createAuthRouter = (auth: AuthService) => {
  const router = express.Router();
  const authController = createAuthController(auth);

  // Urlencoded, multipart or JSON body: username, password
  router.post('/', multer().none(), authController.login);

  return router;
};
