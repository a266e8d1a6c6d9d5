import { describe, it, expect } from 'vitest';
import { CacheKeys, categoryChangeKeys, postChangeKeys, reassignmentKeys } from './keys';

const published = { status: 'published' as const, categoryId: 1, slug: 'hello' };

describe('postChangeKeys', () => {
  it('clears every listing on create', () => {
    expect(postChangeKeys(undefined, published)).toEqual([
      'posts:published:*',
      'categories:nav',
      'stats:category-counts',
      'sitemap:entries',
      'stats:dashboard',
      'posts:slug:hello',
    ]);
  });

  it('clears listings and both slugs when the status changes', () => {
    const keys = postChangeKeys(published, { ...published, status: 'draft' });
    expect(keys).toContain(CacheKeys.publishedPages);
    expect(keys).toContain(CacheKeys.dashboardStats);
    expect(keys).toContain('posts:slug:hello');
  });

  it('treats a category move or slug change as a listing change', () => {
    expect(postChangeKeys(published, { ...published, categoryId: 2 })).toContain(CacheKeys.categoryPublishedCounts);

    const renamed = postChangeKeys(published, { ...published, slug: 'hello-again' });
    expect(renamed).toContain(CacheKeys.publishedPages);
    expect(renamed).toContain('posts:slug:hello');
    expect(renamed).toContain('posts:slug:hello-again');
  });

  it('only clears the post and sitemap for content edits', () => {
    expect(postChangeKeys(published, { ...published })).toEqual(['posts:slug:hello', 'sitemap:entries']);
  });

  it('clears listings on delete', () => {
    expect(postChangeKeys(published, undefined)).toContain(CacheKeys.sitemapEntries);
  });
});

describe('categoryChangeKeys', () => {
  it('covers the category list, nav menu and stats', () => {
    expect(categoryChangeKeys()).toEqual([
      'categories:list',
      'categories:nav',
      'stats:dashboard',
      'stats:category-counts',
    ]);
  });
});

describe('reassignmentKeys', () => {
  it('covers listings and every cached post', () => {
    expect(reassignmentKeys()).toContain(CacheKeys.publishedPages);
    expect(reassignmentKeys()).toContain(CacheKeys.postsBySlug);
  });
});
