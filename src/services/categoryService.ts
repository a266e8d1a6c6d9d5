import { and, asc, count, eq, getTableColumns, like, ne, or, sql } from 'drizzle-orm';
import debug from 'debug';
import type { BlogDatabase } from '../db/blog-db';
import { categories, posts } from '../db/blog-schema';
import type { CacheLayer } from '../cache/cacheLayer';
import { CacheKeys, categoryChangeKeys, reassignmentKeys } from '../cache/keys';
import { ConflictError, NotFoundError, ValidationError, isUniqueViolation } from '../errors';
import { nextAvailableSlug, slugFamilyPattern, slugify } from '../lib/slug';
import type { Category, UpdateCategoryInput } from '../types/blog';

const log = debug('blog:categories');

export const DEFAULT_CATEGORY = {
  name: 'Uncategorized',
  slug: 'uncategorized',
  description: 'Default category for posts without a specific category.',
} as const;

export const CATEGORY_NAME_MAX_LENGTH = 50;
export const CATEGORY_DESCRIPTION_MAX_LENGTH = 200;

export interface CategoryServiceDeps {
  db: BlogDatabase;
  cache: CacheLayer;
  now?: () => Date;
}

export class CategoryService {
  private readonly db: BlogDatabase;
  private readonly cache: CacheLayer;
  private readonly now: () => Date;

  constructor(deps: CategoryServiceDeps) {
    this.db = deps.db;
    this.cache = deps.cache;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Returns the default category, creating it on first use. Safe to call
   * concurrently: a lost insert race falls back to the winner's row.
   */
  async ensureDefaultCategory(): Promise<Category> {
    const existing = await this.findDefault();
    if (existing) return existing;

    const [created] = await this.db
      .insert(categories)
      .values({ ...DEFAULT_CATEGORY, isDefault: true })
      .onConflictDoNothing()
      .returning();

    if (created) {
      log('created default category %d', created.id);
      await this.cache.invalidate(categoryChangeKeys());
      return created;
    }

    const winner = await this.findDefault();
    if (winner) return winner;

    // A regular category already uses the default name or slug: give it the role
    const [candidate] = await this.db
      .select()
      .from(categories)
      .where(or(
        eq(categories.slug, DEFAULT_CATEGORY.slug),
        sql`lower(${categories.name}) = ${DEFAULT_CATEGORY.name.toLowerCase()}`,
      ))
      .limit(1);
    if (!candidate) {
      throw new Error('Default category could not be created');
    }

    const [promoted] = await this.db
      .update(categories)
      .set({ isDefault: true, updatedAt: this.now() })
      .where(eq(categories.id, candidate.id))
      .returning();
    log('promoted category %d to default', promoted.id);
    await this.cache.invalidate(categoryChangeKeys());
    return promoted;
  }

  async create(name: string, description?: string | null): Promise<Category> {
    const cleanName = this.validateName(name);
    const cleanDescription = this.validateDescription(description);
    await this.assertNameAvailable(cleanName);

    const slug = await this.uniqueSlug(slugify(cleanName));

    let category: Category;
    try {
      [category] = await this.db
        .insert(categories)
        .values({ name: cleanName, slug, description: cleanDescription ?? null })
        .returning();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw ValidationError.forField('name', 'A category with this name already exists');
      }
      throw error;
    }

    log('created category %d (%s)', category.id, category.slug);
    await this.cache.invalidate(categoryChangeKeys());
    return category;
  }

  async rename(id: number, name: string): Promise<Category> {
    return this.update(id, { name });
  }

  async update(id: number, input: UpdateCategoryInput): Promise<Category> {
    const category = await this.getById(id);
    if (category.isDefault) {
      throw new ConflictError('The default category cannot be edited');
    }

    const changes: Partial<typeof categories.$inferInsert> = { updatedAt: this.now() };

    if (input.name !== undefined) {
      const cleanName = this.validateName(input.name);
      await this.assertNameAvailable(cleanName, id);
      changes.name = cleanName;
      if (cleanName !== category.name) {
        changes.slug = await this.uniqueSlug(slugify(cleanName), id);
      }
    }
    if (input.description !== undefined) {
      changes.description = this.validateDescription(input.description);
    }

    let updated: Category;
    try {
      [updated] = await this.db.update(categories).set(changes).where(eq(categories.id, id)).returning();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw ValidationError.forField('name', 'A category with this name already exists');
      }
      throw error;
    }

    log('updated category %d', id);
    await this.cache.invalidate(categoryChangeKeys());
    return updated;
  }

  /** Refuses the default category and any category that still has posts. */
  async delete(id: number): Promise<void> {
    await this.db.transaction(async (tx) => {
      const [category] = await tx.select().from(categories).where(eq(categories.id, id)).for('update');
      if (!category) {
        throw new NotFoundError('Category not found');
      }
      if (category.isDefault) {
        throw new ConflictError('The default category cannot be deleted');
      }

      const postCount = await tx.$count(posts, eq(posts.categoryId, id));
      if (postCount > 0) {
        throw new ConflictError(
          `Category still has ${postCount} post${postCount === 1 ? '' : 's'}; reassign them before deleting`,
        );
      }

      await tx.delete(categories).where(eq(categories.id, id));
    });

    log('deleted category %d', id);
    await this.cache.invalidate(categoryChangeKeys());
  }

  /**
   * Moves every post of `fromId` into `toId` (the default category when
   * omitted). Resolves with the number of posts moved.
   */
  async reassignPosts(fromId: number, toId?: number): Promise<number> {
    const targetId = toId ?? (await this.ensureDefaultCategory()).id;
    if (targetId === fromId) {
      throw ValidationError.forField('targetCategoryId', 'Posts must move to a different category');
    }

    const moved = await this.db.transaction(async (tx) => {
      const found = await tx
        .select({ id: categories.id })
        .from(categories)
        .where(or(eq(categories.id, fromId), eq(categories.id, targetId)));
      const ids = new Set(found.map((row) => row.id));
      if (!ids.has(fromId)) throw new NotFoundError('Category not found');
      if (!ids.has(targetId)) throw new NotFoundError('Target category not found');

      const rows = await tx
        .update(posts)
        .set({ categoryId: targetId, updatedAt: this.now() })
        .where(eq(posts.categoryId, fromId))
        .returning({ id: posts.id });
      return rows.length;
    });

    log('moved %d posts from category %d to %d', moved, fromId, targetId);
    if (moved > 0) {
      await this.cache.invalidate(reassignmentKeys());
    }
    return moved;
  }

  async list(): Promise<Category[]> {
    return this.cache.remember(CacheKeys.categoryList, () =>
      this.db.select().from(categories).orderBy(asc(categories.name)),
    );
  }

  /** Categories with at least one published post, for the public menu. */
  async listNavigation(): Promise<Category[]> {
    return this.cache.remember(CacheKeys.navCategories, () =>
      this.db
        .selectDistinct(getTableColumns(categories))
        .from(categories)
        .innerJoin(posts, eq(posts.categoryId, categories.id))
        .where(eq(posts.status, 'published'))
        .orderBy(asc(categories.name)),
    );
  }

  async getById(id: number): Promise<Category> {
    const [category] = await this.db.select().from(categories).where(eq(categories.id, id)).limit(1);
    if (!category) {
      throw new NotFoundError('Category not found');
    }
    return category;
  }

  async getBySlug(slug: string): Promise<Category> {
    const [category] = await this.db
      .select()
      .from(categories)
      .where(eq(categories.slug, slug.trim().toLowerCase()))
      .limit(1);
    if (!category) {
      throw new NotFoundError('Category not found');
    }
    return category;
  }

  /** Number of posts in any status filed under the category. */
  async countPosts(id: number): Promise<number> {
    const [row] = await this.db.select({ total: count() }).from(posts).where(eq(posts.categoryId, id));
    return row?.total ?? 0;
  }

  private async findDefault(): Promise<Category | undefined> {
    const [category] = await this.db.select().from(categories).where(eq(categories.isDefault, true)).limit(1);
    return category;
  }

  private validateName(name: string): string {
    const clean = name.trim();
    if (clean.length === 0) {
      throw ValidationError.forField('name', 'Name is required');
    }
    if (clean.length > CATEGORY_NAME_MAX_LENGTH) {
      throw ValidationError.forField('name', `Name must be at most ${CATEGORY_NAME_MAX_LENGTH} characters`);
    }
    return clean;
  }

  private validateDescription(description: string | null | undefined): string | null | undefined {
    if (description === undefined || description === null) return description;
    const clean = description.trim();
    if (clean.length > CATEGORY_DESCRIPTION_MAX_LENGTH) {
      throw ValidationError.forField(
        'description',
        `Description must be at most ${CATEGORY_DESCRIPTION_MAX_LENGTH} characters`,
      );
    }
    return clean || null;
  }

  private async assertNameAvailable(name: string, exceptId?: number): Promise<void> {
    const [clash] = await this.db
      .select({ id: categories.id })
      .from(categories)
      .where(and(
        sql`lower(${categories.name}) = ${name.toLowerCase()}`,
        exceptId === undefined ? undefined : ne(categories.id, exceptId),
      ))
      .limit(1);
    if (clash) {
      throw ValidationError.forField('name', 'A category with this name already exists');
    }
  }

  private async uniqueSlug(base: string, exceptId?: number): Promise<string> {
    const rows = await this.db
      .select({ slug: categories.slug })
      .from(categories)
      .where(and(
        or(eq(categories.slug, base), like(categories.slug, slugFamilyPattern(base))),
        exceptId === undefined ? undefined : ne(categories.id, exceptId),
      ));
    return nextAvailableSlug(base, rows.map((row) => row.slug));
  }
}
