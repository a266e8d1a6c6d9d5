import type { Request, Response } from 'express';
import type { BlogServices } from '../services';
import { parseInput } from '../lib/validation';
import { pageQuerySchema, publishedQuerySchema } from './schemas';

/**
 * Read-only endpoints of the public site. Everything here goes through the
 * published-only service queries.
 */
export class PublicController {
  constructor(private readonly services: BlogServices) {}

  // GET /posts
  async listPosts(req: Request, res: Response) {
    const { page, pageSize, categoryId } = parseInput(publishedQuerySchema, req.query);
    const result = await this.services.posts.listPublished(page, pageSize, categoryId);
    res.json(result);
  }

  // GET /posts/:slug
  async getPost(req: Request, res: Response) {
    const post = await this.services.posts.getPublishedBySlug(req.params.slug);
    res.json(post);
  }

  // GET /categories
  async listCategories(_req: Request, res: Response) {
    const categories = await this.services.categories.list();
    res.json(categories);
  }

  // GET /categories/nav
  async listNavigation(_req: Request, res: Response) {
    const categories = await this.services.categories.listNavigation();
    res.json(categories);
  }

  // GET /categories/:slug/posts
  async listCategoryPosts(req: Request, res: Response) {
    const { slug } = req.params;

    // Canonical category URLs are lower-case
    if (slug !== slug.toLowerCase()) {
      const query = req.originalUrl.includes('?') ? req.originalUrl.slice(req.originalUrl.indexOf('?')) : '';
      res.redirect(301, `${req.baseUrl}/categories/${encodeURIComponent(slug.toLowerCase())}/posts${query}`);
      return;
    }

    const { page, pageSize } = parseInput(pageQuerySchema, req.query);
    const category = await this.services.categories.getBySlug(slug);
    const result = await this.services.posts.listPublished(page, pageSize, category.id);
    res.json({ category, ...result });
  }

  // GET /sitemap.xml
  async sitemap(_req: Request, res: Response) {
    const entries = await this.services.sitemap.getEntries();
    res.type('application/xml').send(this.services.sitemap.renderXml(entries));
  }

  // GET /robots.txt
  robots(_req: Request, res: Response) {
    res.type('text/plain').send(this.services.sitemap.renderRobots());
  }
}
