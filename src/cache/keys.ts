/**
 * Cache keys for derived read results and the invalidation sets each kind of
 * mutation must clear.
 */
export const CacheKeys = {
  categoryList: 'categories:list',
  navCategories: 'categories:nav',
  publishedPage: (categoryId: number | undefined, page: number, pageSize: number) =>
    `posts:published:${categoryId ?? 'all'}:${page}:${pageSize}`,
  publishedPages: 'posts:published:*',
  postBySlug: (slug: string) => `posts:slug:${slug}`,
  postsBySlug: 'posts:slug:*',
  sitemapEntries: 'sitemap:entries',
  dashboardStats: 'stats:dashboard',
  categoryPublishedCounts: 'stats:category-counts',
} as const;

/** The post fields that decide which cached views a post appears in. */
export interface PostVisibility {
  status: 'draft' | 'published';
  categoryId: number;
  slug: string;
}

export function categoryChangeKeys(): string[] {
  return [
    CacheKeys.categoryList,
    CacheKeys.navCategories,
    CacheKeys.dashboardStats,
    CacheKeys.categoryPublishedCounts,
  ];
}

function listingKeys(): string[] {
  return [
    CacheKeys.publishedPages,
    CacheKeys.navCategories,
    CacheKeys.categoryPublishedCounts,
    CacheKeys.sitemapEntries,
    CacheKeys.dashboardStats,
  ];
}

/**
 * Keys to clear after a post mutation. `before` is absent for a create,
 * `after` for a delete. Edits that leave status, category and slug alone only
 * touch the single-post entry and the sitemap; list pages then age out by TTL.
 */
export function postChangeKeys(before: PostVisibility | undefined, after: PostVisibility | undefined): string[] {
  const slugKeys = new Set<string>();
  if (before) slugKeys.add(CacheKeys.postBySlug(before.slug));
  if (after) slugKeys.add(CacheKeys.postBySlug(after.slug));

  const listingChanged =
    !before ||
    !after ||
    before.status !== after.status ||
    before.categoryId !== after.categoryId ||
    before.slug !== after.slug;

  if (listingChanged) {
    return [...listingKeys(), ...slugKeys];
  }
  return [...slugKeys, CacheKeys.sitemapEntries];
}

/** Moving posts between categories changes every per-category view and every moved post. */
export function reassignmentKeys(): string[] {
  return [...listingKeys(), CacheKeys.postsBySlug];
}
