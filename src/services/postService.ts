import { and, desc, eq, ilike, like, ne, or } from 'drizzle-orm';
import debug from 'debug';
import type { BlogDatabase } from '../db/blog-db';
import { categories, posts } from '../db/blog-schema';
import type { CacheLayer } from '../cache/cacheLayer';
import { CacheKeys, postChangeKeys, type PostVisibility } from '../cache/keys';
import { NotFoundError, ValidationError, isUniqueViolation } from '../errors';
import type { HtmlSanitizer } from '../lib/sanitize';
import { isValidSlug, nextAvailableSlug, slugFamilyPattern, slugify } from '../lib/slug';
import type {
  CreatePostInput,
  ListAllPostsInput,
  Paginated,
  Post,
  PostStatus,
  UpdatePostInput,
} from '../types/blog';
import type { CategoryService } from './categoryService';

const log = debug('blog:posts');

export const TITLE_MAX_LENGTH = 200;
export const BODY_MAX_LENGTH = 100_000;
export const DESCRIPTION_MAX_LENGTH = 160;
export const THUMBNAIL_MAX_LENGTH = 500;
const THUMBNAIL_PATTERN = /^[A-Za-z0-9_.-]+$/;
export const MAX_PAGE_SIZE = 50;

export interface PostServiceDeps {
  db: BlogDatabase;
  cache: CacheLayer;
  categories: CategoryService;
  sanitize: HtmlSanitizer;
  /** TTL for published list pages; shorter than the default. */
  listTtlSeconds: number;
  defaultPageSize?: number;
  now?: () => Date;
}

function visibilityOf(post: Post): PostVisibility {
  return { status: post.status, categoryId: post.categoryId, slug: post.slug };
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export class PostService {
  private readonly db: BlogDatabase;
  private readonly cache: CacheLayer;
  private readonly categories: CategoryService;
  private readonly sanitize: HtmlSanitizer;
  private readonly listTtlSeconds: number;
  private readonly defaultPageSize: number;
  private readonly now: () => Date;

  constructor(deps: PostServiceDeps) {
    this.db = deps.db;
    this.cache = deps.cache;
    this.categories = deps.categories;
    this.sanitize = deps.sanitize;
    this.listTtlSeconds = deps.listTtlSeconds;
    this.defaultPageSize = deps.defaultPageSize ?? 10;
    this.now = deps.now ?? (() => new Date());
  }

  async create(input: CreatePostInput): Promise<Post> {
    const title = this.validateTitle(input.title);
    const body = this.cleanBody(input.body);
    const description = this.validateDescription(input.description) ?? null;
    const thumbnail = this.validateThumbnail(input.thumbnail) ?? null;
    const status: PostStatus = input.status ?? 'draft';
    const categoryId = await this.resolveCategoryId(input.categoryId);
    const explicitSlug = input.slug === undefined ? undefined : this.validateSlug(input.slug);

    const insert = async (slug: string): Promise<Post> => {
      const now = this.now();
      const [post] = await this.db
        .insert(posts)
        .values({
          title,
          slug,
          description,
          thumbnail,
          body,
          status,
          categoryId,
          createdAt: now,
          updatedAt: now,
          publishedAt: status === 'published' ? now : null,
        })
        .returning();
      return post;
    };

    let post: Post;
    if (explicitSlug !== undefined) {
      await this.assertSlugAvailable(explicitSlug);
      try {
        post = await insert(explicitSlug);
      } catch (error) {
        throw this.translateInsertError(error);
      }
    } else {
      const base = slugify(title);
      try {
        post = await insert(await this.uniqueSlug(base));
      } catch (error) {
        if (!isUniqueViolation(error)) throw this.translateInsertError(error);
        // Another request took the slug between our lookup and insert
        log('slug collision for "%s", retrying once', base);
        try {
          post = await insert(await this.uniqueSlug(base));
        } catch (retryError) {
          throw this.translateInsertError(retryError);
        }
      }
    }

    log('created post %d (%s, %s)', post.id, post.slug, post.status);
    await this.cache.invalidate(postChangeKeys(undefined, visibilityOf(post)));
    return post;
  }

  async update(id: number, input: UpdatePostInput): Promise<Post> {
    const changes: Partial<typeof posts.$inferInsert> = {};
    if (input.title !== undefined) changes.title = this.validateTitle(input.title);
    if (input.body !== undefined) changes.body = this.cleanBody(input.body);
    if (input.description !== undefined) changes.description = this.validateDescription(input.description);
    if (input.thumbnail !== undefined) changes.thumbnail = this.validateThumbnail(input.thumbnail);
    if (input.categoryId !== undefined) changes.categoryId = await this.resolveCategoryId(input.categoryId);
    const explicitSlug = input.slug === undefined ? undefined : this.validateSlug(input.slug);

    const { before, after } = await this.db.transaction(async (tx) => {
      const [current] = await tx.select().from(posts).where(eq(posts.id, id)).for('update');
      if (!current) {
        throw new NotFoundError('Post not found');
      }

      if (explicitSlug !== undefined && explicitSlug !== current.slug) {
        const [clash] = await tx
          .select({ id: posts.id })
          .from(posts)
          .where(and(eq(posts.slug, explicitSlug), ne(posts.id, id)))
          .limit(1);
        if (clash) {
          throw ValidationError.forField('slug', 'This slug is already in use');
        }
        changes.slug = explicitSlug;
      }

      const now = this.now();
      if (input.status !== undefined) {
        changes.status = input.status;
        // First publication stamps the post; later transitions keep the timestamp
        if (input.status === 'published' && current.publishedAt === null) {
          changes.publishedAt = now;
        }
      }
      changes.updatedAt = now;

      const [updated] = await tx.update(posts).set(changes).where(eq(posts.id, id)).returning();
      return { before: current, after: updated };
    }).catch((error: unknown) => {
      throw this.translateInsertError(error);
    });

    if (before.status !== after.status) {
      log('post %d moved %s -> %s', id, before.status, after.status);
    } else {
      log('updated post %d', id);
    }
    await this.cache.invalidate(postChangeKeys(visibilityOf(before), visibilityOf(after)));
    return after;
  }

  async publish(id: number): Promise<Post> {
    return this.update(id, { status: 'published' });
  }

  async unpublish(id: number): Promise<Post> {
    return this.update(id, { status: 'draft' });
  }

  async delete(id: number): Promise<void> {
    const [deleted] = await this.db.delete(posts).where(eq(posts.id, id)).returning();
    if (!deleted) {
      throw new NotFoundError('Post not found');
    }

    log('deleted post %d (%s)', id, deleted.slug);
    await this.cache.invalidate(postChangeKeys(visibilityOf(deleted), undefined));
  }

  /** Any status; used by the dashboard preview. */
  async getById(id: number): Promise<Post> {
    const [post] = await this.db.select().from(posts).where(eq(posts.id, id)).limit(1);
    if (!post) {
      throw new NotFoundError('Post not found');
    }
    return post;
  }

  /**
   * Newest publication first. Only `published` posts are ever returned.
   * `fresh` skips the page cache for callers that need the committed state.
   */
  async listPublished(
    page = 1,
    pageSize = this.defaultPageSize,
    categoryId?: number,
    options: { fresh?: boolean } = {},
  ): Promise<Paginated<Post>> {
    const safePage = this.normalizePage(page);
    const safeSize = this.normalizePageSize(pageSize);
    const query = () => this.queryPublished(safePage, safeSize, categoryId);

    if (options.fresh) {
      return query();
    }
    // Empty pages (past the end, unknown category) are never stored
    return this.cache.remember(CacheKeys.publishedPage(categoryId, safePage, safeSize), query, {
      ttlSeconds: this.listTtlSeconds,
      cacheIf: (result) => result.items.length > 0,
    });
  }

  /**
   * The public single-post lookup. A draft is reported as not found even when
   * its slug matches.
   */
  async getPublishedBySlug(slug: string): Promise<Post> {
    const normalized = slug.trim().toLowerCase();

    return this.cache.remember(CacheKeys.postBySlug(normalized), async () => {
      const [post] = await this.db
        .select()
        .from(posts)
        .where(and(eq(posts.slug, normalized), eq(posts.status, 'published')))
        .limit(1);
      if (!post) {
        throw new NotFoundError('Post not found');
      }
      return post;
    });
  }

  /** Dashboard listing across all statuses, newest first. Never cached. */
  async listAll(input: ListAllPostsInput = {}): Promise<Paginated<Post>> {
    const page = this.normalizePage(input.page ?? 1);
    const pageSize = this.normalizePageSize(input.pageSize ?? this.defaultPageSize);
    const search = input.q?.trim();

    const where = and(
      input.status === undefined ? undefined : eq(posts.status, input.status),
      search ? ilike(posts.title, `%${escapeLike(search)}%`) : undefined,
    );

    const [items, total] = await Promise.all([
      this.db
        .select()
        .from(posts)
        .where(where)
        .orderBy(desc(posts.createdAt), desc(posts.id))
        .limit(pageSize)
        .offset((page - 1) * pageSize),
      this.db.$count(posts, where),
    ]);

    return { items, page, pageSize, total, totalPages: Math.ceil(total / pageSize) };
  }

  private async queryPublished(page: number, pageSize: number, categoryId?: number): Promise<Paginated<Post>> {
    const where = and(
      eq(posts.status, 'published'),
      categoryId === undefined ? undefined : eq(posts.categoryId, categoryId),
    );

    const [items, total] = await Promise.all([
      this.db
        .select()
        .from(posts)
        .where(where)
        .orderBy(desc(posts.publishedAt), desc(posts.id))
        .limit(pageSize)
        .offset((page - 1) * pageSize),
      this.db.$count(posts, where),
    ]);

    return { items, page, pageSize, total, totalPages: Math.ceil(total / pageSize) };
  }

  private async resolveCategoryId(categoryId: number | null | undefined): Promise<number> {
    if (categoryId === undefined || categoryId === null) {
      return (await this.categories.ensureDefaultCategory()).id;
    }

    const [category] = await this.db
      .select({ id: categories.id })
      .from(categories)
      .where(eq(categories.id, categoryId))
      .limit(1);
    if (!category) {
      throw ValidationError.forField('categoryId', 'Unknown category');
    }
    return category.id;
  }

  private async uniqueSlug(base: string): Promise<string> {
    const rows = await this.db
      .select({ slug: posts.slug })
      .from(posts)
      .where(or(eq(posts.slug, base), like(posts.slug, slugFamilyPattern(base))));
    return nextAvailableSlug(base, rows.map((row) => row.slug));
  }

  private async assertSlugAvailable(slug: string): Promise<void> {
    const [clash] = await this.db.select({ id: posts.id }).from(posts).where(eq(posts.slug, slug)).limit(1);
    if (clash) {
      throw ValidationError.forField('slug', 'This slug is already in use');
    }
  }

  private translateInsertError(error: unknown): unknown {
    if (isUniqueViolation(error)) {
      return ValidationError.forField('slug', 'This slug is already in use');
    }
    // foreign_key_violation: the category vanished after it was resolved
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === '23503') {
      return ValidationError.forField('categoryId', 'Unknown category');
    }
    return error;
  }

  private validateTitle(title: string): string {
    const clean = title.replace(/\s+/g, ' ').trim();
    if (clean.length === 0) {
      throw ValidationError.forField('title', 'Title is required');
    }
    if (clean.length > TITLE_MAX_LENGTH) {
      throw ValidationError.forField('title', `Title must be at most ${TITLE_MAX_LENGTH} characters`);
    }
    return clean;
  }

  private cleanBody(body: string): string {
    if (body.trim().length === 0) {
      throw ValidationError.forField('body', 'Body is required');
    }
    if (body.length > BODY_MAX_LENGTH) {
      throw ValidationError.forField('body', 'Body is too long');
    }
    return this.sanitize(body);
  }

  private validateDescription(description: string | null | undefined): string | null | undefined {
    if (description === undefined || description === null) return description;
    const clean = description.trim();
    if (clean.length > DESCRIPTION_MAX_LENGTH) {
      throw ValidationError.forField(
        'description',
        `Description must be at most ${DESCRIPTION_MAX_LENGTH} characters`,
      );
    }
    return clean || null;
  }

  /** A bare file name; paths and URLs are refused. */
  private validateThumbnail(thumbnail: string | null | undefined): string | null | undefined {
    if (thumbnail === undefined || thumbnail === null) return thumbnail;
    const clean = thumbnail.trim();
    if (clean.length === 0) return null;
    if (clean.length > THUMBNAIL_MAX_LENGTH) {
      throw ValidationError.forField('thumbnail', `Thumbnail must be at most ${THUMBNAIL_MAX_LENGTH} characters`);
    }
    if (!THUMBNAIL_PATTERN.test(clean)) {
      throw ValidationError.forField(
        'thumbnail',
        'Thumbnail may only contain letters, numbers, underscores, hyphens and dots',
      );
    }
    return clean;
  }

  private validateSlug(slug: string): string {
    const clean = slug.trim().toLowerCase();
    if (!isValidSlug(clean)) {
      throw ValidationError.forField('slug', 'Slug may only contain lowercase letters, numbers and single hyphens');
    }
    return clean;
  }

  private normalizePage(page: number): number {
    return Number.isInteger(page) && page >= 1 ? page : 1;
  }

  private normalizePageSize(pageSize: number): number {
    if (!Number.isInteger(pageSize) || pageSize < 1) return this.defaultPageSize;
    return Math.min(pageSize, MAX_PAGE_SIZE);
  }
}
