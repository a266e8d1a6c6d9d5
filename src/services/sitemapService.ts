import type { CacheLayer } from '../cache/cacheLayer';
import { CacheKeys } from '../cache/keys';
import type { SitemapEntry } from '../types/blog';
import type { PostService } from './postService';

const SITEMAP_BATCH_SIZE = 50;

interface PostSitemapSource {
  slug: string;
  updatedAt: string;
}

export interface SitemapServiceDeps {
  posts: PostService;
  cache: CacheLayer;
  siteUrl: string;
  staticRoutes: string[];
  now?: () => Date;
}

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export class SitemapService {
  private readonly posts: PostService;
  private readonly cache: CacheLayer;
  private readonly siteUrl: string;
  private readonly staticRoutes: string[];
  private readonly now: () => Date;

  constructor(deps: SitemapServiceDeps) {
    this.posts = deps.posts;
    this.cache = deps.cache;
    this.siteUrl = deps.siteUrl.replace(/\/+$/, '');
    this.staticRoutes = deps.staticRoutes;
    this.now = deps.now ?? (() => new Date());
  }

  /** Static routes first, then every published post. */
  async getEntries(): Promise<SitemapEntry[]> {
    const today = isoDate(this.now());
    const staticEntries: SitemapEntry[] = this.staticRoutes.map((route) => ({
      loc: this.absolute(route),
      lastmod: today,
      changefreq: 'daily',
      priority: '1.0',
    }));

    const sources = await this.cache.remember(CacheKeys.sitemapEntries, () => this.collectPublishedPosts());
    const postEntries: SitemapEntry[] = sources.map((source) => ({
      loc: this.absolute(`/posts/${source.slug}`),
      lastmod: source.updatedAt,
      changefreq: 'monthly',
      priority: '0.8',
    }));

    return [...staticEntries, ...postEntries];
  }

  renderXml(entries: SitemapEntry[]): string {
    const urls = entries.map((entry) => [
      '  <url>',
      `    <loc>${escapeXml(entry.loc)}</loc>`,
      `    <lastmod>${entry.lastmod}</lastmod>`,
      `    <changefreq>${entry.changefreq}</changefreq>`,
      `    <priority>${entry.priority}</priority>`,
      '  </url>',
    ].join('\n'));

    return [
      '<?xml version="1.0" encoding="UTF-8"?>',
      '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">',
      ...urls,
      '</urlset>',
      '',
    ].join('\n');
  }

  renderRobots(): string {
    return [
      'User-agent: *',
      'Allow: /',
      'Disallow: /api/blog/admin/',
      '',
      `Sitemap: ${this.absolute('/sitemap.xml')}`,
      '',
    ].join('\n');
  }

  private async collectPublishedPosts(): Promise<PostSitemapSource[]> {
    const sources: PostSitemapSource[] = [];
    for (let page = 1; ; page++) {
      const result = await this.posts.listPublished(page, SITEMAP_BATCH_SIZE, undefined, { fresh: true });
      for (const post of result.items) {
        sources.push({ slug: post.slug, updatedAt: isoDate(post.updatedAt) });
      }
      if (page >= result.totalPages) break;
    }
    return sources;
  }

  private absolute(path: string): string {
    return `${this.siteUrl}${path.startsWith('/') ? path : `/${path}`}`;
  }
}
