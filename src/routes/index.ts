import express, { Router } from 'express';
import type { BlogServices } from '../services';
import { PublicController } from '../controllers/publicController';
import { asyncHandler } from '../middleware/errors';

export function createIndexRouter(services: BlogServices): Router {
  const router: Router = express.Router();
  const publicController = new PublicController(services);

  /* GET home page. */
  router.get('/', (_req, res) => {
    res.json({ title: 'Inkwell', message: 'Welcome to the Inkwell blog API' });
  });

  router.get('/sitemap.xml', asyncHandler((req, res) => publicController.sitemap(req, res)));
  router.get('/robots.txt', (req, res) => publicController.robots(req, res));

  return router;
}
