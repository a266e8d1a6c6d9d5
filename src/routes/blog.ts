import express, { Router } from 'express';
import type { AppConfig } from '../config';
import type { BlogServices } from '../services';
import { PublicController } from '../controllers/publicController';
import { DashboardController } from '../controllers/dashboardController';
import { Capability, createLoginHandler, logoutAdmin, requireCapability } from '../middleware/adminAuth';
import { asyncHandler } from '../middleware/errors';
import { rateLimit } from '../middleware/rateLimit';

export function createBlogRouter(services: BlogServices, config: Pick<AppConfig, 'admin' | 'env'>): Router {
  const router: Router = express.Router();
  const publicController = new PublicController(services);
  const dashboardController = new DashboardController(services);

  // Public routes
  router.get('/posts', asyncHandler((req, res) => publicController.listPosts(req, res)));
  router.get('/posts/:slug', asyncHandler((req, res) => publicController.getPost(req, res)));
  router.get('/categories', asyncHandler((req, res) => publicController.listCategories(req, res)));
  router.get('/categories/nav', asyncHandler((req, res) => publicController.listNavigation(req, res)));
  router.get('/categories/:slug/posts', asyncHandler((req, res) => publicController.listCategoryPosts(req, res)));

  // Admin login (public)
  router.post('/admin/login', rateLimit(10, 15 * 60 * 1000), createLoginHandler(config));
  router.post('/admin/logout', logoutAdmin);

  // Admin routes (protected)
  const admin: Router = express.Router();
  admin.use(requireCapability(Capability.Admin));

  admin.get('/stats', asyncHandler((req, res) => dashboardController.getStats(req, res)));
  admin.get('/stats/categories', asyncHandler((req, res) => dashboardController.getCategoryStats(req, res)));

  // Post admin routes
  admin.get('/posts', asyncHandler((req, res) => dashboardController.listPosts(req, res)));
  admin.post('/posts', asyncHandler((req, res) => dashboardController.createPost(req, res)));
  admin.get('/posts/:id', asyncHandler((req, res) => dashboardController.getPost(req, res)));
  admin.put('/posts/:id', asyncHandler((req, res) => dashboardController.updatePost(req, res)));
  admin.delete('/posts/:id', asyncHandler((req, res) => dashboardController.deletePost(req, res)));
  admin.post('/posts/:id/publish', asyncHandler((req, res) => dashboardController.publishPost(req, res)));
  admin.post('/posts/:id/unpublish', asyncHandler((req, res) => dashboardController.unpublishPost(req, res)));

  // Category admin routes
  admin.get('/categories', asyncHandler((req, res) => dashboardController.listCategories(req, res)));
  admin.post('/categories', asyncHandler((req, res) => dashboardController.createCategory(req, res)));
  admin.get('/categories/:id', asyncHandler((req, res) => dashboardController.getCategory(req, res)));
  admin.put('/categories/:id', asyncHandler((req, res) => dashboardController.updateCategory(req, res)));
  admin.delete('/categories/:id', asyncHandler((req, res) => dashboardController.deleteCategory(req, res)));
  admin.post(
    '/categories/:id/reassign',
    asyncHandler((req, res) => dashboardController.reassignCategoryPosts(req, res)),
  );

  router.use('/admin', admin);

  return router;
}
