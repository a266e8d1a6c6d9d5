import { asc, count, eq } from 'drizzle-orm';
import type { BlogDatabase } from '../db/blog-db';
import { categories, posts } from '../db/blog-schema';
import type { CacheLayer } from '../cache/cacheLayer';
import { CacheKeys } from '../cache/keys';
import type { CategoryPublishedCount, DashboardStats } from '../types/blog';

/**
 * Dashboard counters. Always recomputed from COUNT aggregates on a cache
 * miss; nothing is stored as a running counter.
 */
export class StatisticsService {
  constructor(
    private readonly db: BlogDatabase,
    private readonly cache: CacheLayer,
  ) {}

  async getDashboardStats(): Promise<DashboardStats> {
    return this.cache.remember(CacheKeys.dashboardStats, async () => {
      const [totalPosts, publishedPosts, draftPosts, totalCategories] = await Promise.all([
        this.db.$count(posts),
        this.db.$count(posts, eq(posts.status, 'published')),
        this.db.$count(posts, eq(posts.status, 'draft')),
        this.db.$count(categories),
      ]);

      return { totalPosts, publishedPosts, draftPosts, totalCategories };
    });
  }

  // Published post count for every category that has any
  async getCategoryPublishedCounts(): Promise<CategoryPublishedCount[]> {
    return this.cache.remember(CacheKeys.categoryPublishedCounts, () =>
      this.db
        .select({
          categoryId: categories.id,
          name: categories.name,
          slug: categories.slug,
          count: count(posts.id),
        })
        .from(categories)
        .innerJoin(posts, eq(posts.categoryId, categories.id))
        .where(eq(posts.status, 'published'))
        .groupBy(categories.id)
        .orderBy(asc(categories.name)),
    );
  }
}
