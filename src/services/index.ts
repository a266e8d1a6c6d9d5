import type { BlogDatabase } from '../db/blog-db';
import { CacheLayer } from '../cache/cacheLayer';
import type { CacheBackend } from '../cache/types';
import { createSanitizer } from '../lib/sanitize';
import type { AppConfig } from '../config';
import { CategoryService } from './categoryService';
import { PostService } from './postService';
import { StatisticsService } from './statisticsService';
import { SitemapService } from './sitemapService';

export interface BlogServices {
  cache: CacheLayer;
  categories: CategoryService;
  posts: PostService;
  statistics: StatisticsService;
  sitemap: SitemapService;
}

export type ServicesConfig = Pick<
  AppConfig,
  'cache' | 'postsPerPage' | 'siteUrl' | 'sitemapStaticRoutes' | 'trustedImageSources'
>;

export interface CreateServicesOptions {
  db: BlogDatabase;
  cacheBackend: CacheBackend;
  config: ServicesConfig;
  now?: () => Date;
}

/** Wires the services around one database handle and one cache backend. */
export function createServices({ db, cacheBackend, config, now }: CreateServicesOptions): BlogServices {
  const cache = new CacheLayer(cacheBackend, { defaultTtlSeconds: config.cache.defaultTtlSeconds, keyPrefix: 'blog' });
  const categories = new CategoryService({ db, cache, now });
  const posts = new PostService({
    db,
    cache,
    categories,
    sanitize: createSanitizer(config.trustedImageSources),
    listTtlSeconds: config.cache.postListTtlSeconds,
    defaultPageSize: config.postsPerPage,
    now,
  });
  const statistics = new StatisticsService(db, cache);
  const sitemap = new SitemapService({
    posts,
    cache,
    siteUrl: config.siteUrl,
    staticRoutes: config.sitemapStaticRoutes,
    now,
  });

  return { cache, categories, posts, statistics, sitemap };
}

export { CategoryService, PostService, StatisticsService, SitemapService };
