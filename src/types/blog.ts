import type { categories, posts } from '../db/blog-schema';

export type PostStatus = 'draft' | 'published';

export type Category = typeof categories.$inferSelect;
export type Post = typeof posts.$inferSelect;

export interface Paginated<T> {
  items: T[];
  page: number;
  pageSize: number;
  total: number;
  totalPages: number;
}

export interface CreatePostInput {
  title: string;
  body: string;
  categoryId?: number | null;
  status?: PostStatus;
  slug?: string;
  description?: string | null;
  /** Image file name under the site's static images. */
  thumbnail?: string | null;
}

export interface UpdatePostInput {
  title?: string;
  body?: string;
  /** `null` moves the post to the default category. */
  categoryId?: number | null;
  status?: PostStatus;
  slug?: string;
  description?: string | null;
  thumbnail?: string | null;
}

export interface ListAllPostsInput {
  status?: PostStatus;
  /** Case-insensitive title search. */
  q?: string;
  page?: number;
  pageSize?: number;
}

export interface UpdateCategoryInput {
  name?: string;
  description?: string | null;
}

export interface DashboardStats {
  totalPosts: number;
  publishedPosts: number;
  draftPosts: number;
  totalCategories: number;
}

export interface CategoryPublishedCount {
  categoryId: number;
  name: string;
  slug: string;
  count: number;
}

export interface SitemapEntry {
  loc: string;
  lastmod: string;
  changefreq: 'always' | 'hourly' | 'daily' | 'weekly' | 'monthly' | 'yearly' | 'never';
  priority: string;
}

export interface CurrentUser {
  email: string;
  isAdmin: boolean;
}
