import { z } from 'zod';
import { POST_STATUSES } from '../db/blog-schema';
import { MAX_PAGE_SIZE } from '../services/postService';

export const idParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const pageQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).optional(),
});

export const publishedQuerySchema = pageQuerySchema.extend({
  categoryId: z.coerce.number().int().positive().optional(),
});

export const dashboardPostsQuerySchema = pageQuerySchema.extend({
  status: z.enum(POST_STATUSES).optional(),
  q: z.string().max(200).optional(),
});

const categoryIdField = z.number().int().positive().nullable();

export const createPostSchema = z.object({
  title: z.string(),
  body: z.string(),
  categoryId: categoryIdField.optional(),
  status: z.enum(POST_STATUSES).optional(),
  slug: z.string().optional(),
  description: z.string().nullable().optional(),
  thumbnail: z.string().nullable().optional(),
});

export const updatePostSchema = createPostSchema.partial();

export const createCategorySchema = z.object({
  name: z.string(),
  description: z.string().nullable().optional(),
});

export const updateCategorySchema = createCategorySchema.partial();

export const reassignCategorySchema = z.object({
  targetCategoryId: z.number().int().positive().optional(),
});
