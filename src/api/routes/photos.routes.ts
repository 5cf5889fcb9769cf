import { RequestHandler, Router } from 'express';
import { PhotosHandler } from '../../handlers/photos.handler.js';

export function createPhotosRoutes(
  handler: PhotosHandler,
  authenticate: RequestHandler,
  photoUpload: RequestHandler
): Router {
  const router = Router();

  router.post('/submit', authenticate, photoUpload, handler.submitPhoto.bind(handler));

  return router;
}
