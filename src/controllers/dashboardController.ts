import type { Request, Response } from 'express';
import type { BlogServices } from '../services';
import { parseInput } from '../lib/validation';
import {
  createCategorySchema,
  createPostSchema,
  dashboardPostsQuerySchema,
  idParamSchema,
  reassignCategorySchema,
  updateCategorySchema,
  updatePostSchema,
} from './schemas';

/**
 * Admin API. Mounted behind `requireCapability(Capability.Admin)`; reads
 * here see drafts as well as published posts.
 */
export class DashboardController {
  constructor(private readonly services: BlogServices) {}

  // GET /admin/stats
  async getStats(_req: Request, res: Response) {
    const stats = await this.services.statistics.getDashboardStats();
    res.json(stats);
  }

  // GET /admin/stats/categories
  async getCategoryStats(_req: Request, res: Response) {
    const counts = await this.services.statistics.getCategoryPublishedCounts();
    res.json(counts);
  }

  // GET /admin/posts
  async listPosts(req: Request, res: Response) {
    const { page, pageSize, status, q } = parseInput(dashboardPostsQuerySchema, req.query);
    const result = await this.services.posts.listAll({ page, pageSize, status, q });
    res.json(result);
  }

  // GET /admin/posts/:id
  async getPost(req: Request, res: Response) {
    const { id } = parseInput(idParamSchema, req.params);
    const post = await this.services.posts.getById(id);
    res.json(post);
  }

  // POST /admin/posts
  async createPost(req: Request, res: Response) {
    const input = parseInput(createPostSchema, req.body);
    const post = await this.services.posts.create(input);
    res.status(201).json(post);
  }

  // PUT /admin/posts/:id
  async updatePost(req: Request, res: Response) {
    const { id } = parseInput(idParamSchema, req.params);
    const input = parseInput(updatePostSchema, req.body);
    const post = await this.services.posts.update(id, input);
    res.json(post);
  }

  // POST /admin/posts/:id/publish
  async publishPost(req: Request, res: Response) {
    const { id } = parseInput(idParamSchema, req.params);
    const post = await this.services.posts.publish(id);
    res.json(post);
  }

  // POST /admin/posts/:id/unpublish
  async unpublishPost(req: Request, res: Response) {
    const { id } = parseInput(idParamSchema, req.params);
    const post = await this.services.posts.unpublish(id);
    res.json(post);
  }

  // DELETE /admin/posts/:id
  async deletePost(req: Request, res: Response) {
    const { id } = parseInput(idParamSchema, req.params);
    await this.services.posts.delete(id);
    res.status(204).send();
  }

  // GET /admin/categories
  async listCategories(_req: Request, res: Response) {
    const categories = await this.services.categories.list();
    res.json(categories);
  }

  // GET /admin/categories/:id
  async getCategory(req: Request, res: Response) {
    const { id } = parseInput(idParamSchema, req.params);
    const category = await this.services.categories.getById(id);
    const postCount = await this.services.categories.countPosts(id);
    res.json({ ...category, postCount });
  }

  // POST /admin/categories
  async createCategory(req: Request, res: Response) {
    const { name, description } = parseInput(createCategorySchema, req.body);
    const category = await this.services.categories.create(name, description);
    res.status(201).json(category);
  }

  // PUT /admin/categories/:id
  async updateCategory(req: Request, res: Response) {
    const { id } = parseInput(idParamSchema, req.params);
    const input = parseInput(updateCategorySchema, req.body);
    const category = await this.services.categories.update(id, input);
    res.json(category);
  }

  // DELETE /admin/categories/:id
  async deleteCategory(req: Request, res: Response) {
    const { id } = parseInput(idParamSchema, req.params);
    await this.services.categories.delete(id);
    res.status(204).send();
  }

  // POST /admin/categories/:id/reassign
  async reassignCategoryPosts(req: Request, res: Response) {
    const { id } = parseInput(idParamSchema, req.params);
    const { targetCategoryId } = parseInput(reassignCategorySchema, req.body ?? {});
    const moved = await this.services.categories.reassignPosts(id, targetCategoryId);
    res.json({ moved });
  }
}
