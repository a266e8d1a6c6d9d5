import { afterAll, afterEach, beforeAll, beforeEach, describe, it, expect, vi } from 'vitest';
import { createTestDatabase, type TestDatabase } from '../test/database';
import { FailingCacheBackend, createClock, createTestServices } from '../test/fixtures';
import { MemoryCacheBackend } from '../cache/memoryCache';
import { NotFoundError, ValidationError } from '../errors';
import type { BlogServices } from './index';

describe('PostService', () => {
  let database: TestDatabase;
  let services: BlogServices;
  let clock: ReturnType<typeof createClock>;

  beforeAll(async () => {
    database = await createTestDatabase();
  });

  afterAll(async () => {
    await database.close();
  });

  beforeEach(async () => {
    await database.reset();
    clock = createClock();
    ({ services } = createTestServices(database.db, { now: clock.now }));
  });

  describe('create', () => {
    it('files a post without a category under the default category', async () => {
      const post = await services.posts.create({ title: 'Hello', body: '<p>Hi</p>' });
      const fallback = await services.categories.ensureDefaultCategory();

      expect(post.categoryId).toBe(fallback.id);
      expect(post.slug).toBe('hello');
      expect(post.status).toBe('draft');
      expect(post.publishedAt).toBeNull();
    });

    it('stamps a post created as published', async () => {
      const post = await services.posts.create({ title: 'Launch', body: 'text', status: 'published' });

      expect(post.publishedAt?.toISOString()).toBe('2026-01-01T10:00:00.000Z');
    });

    it('sanitizes the body before storing it', async () => {
      const post = await services.posts.create({
        title: 'Safe',
        body: '<p onclick="steal()">Hi</p><script>alert(1)</script>',
      });

      expect(post.body).toBe('<p>Hi</p>');
    });

    it('suffixes slugs for repeated titles', async () => {
      const first = await services.posts.create({ title: 'My Post', body: 'a' });
      const second = await services.posts.create({ title: 'My Post', body: 'b' });
      const third = await services.posts.create({ title: 'My Post!', body: 'c' });

      expect([first.slug, second.slug, third.slug]).toEqual(['my-post', 'my-post-2', 'my-post-3']);
    });

    it('keeps suffixing long titles that hit the length cap', async () => {
      const title = 'A remarkably long headline about caching and publication state machines';

      const slugs: string[] = [];
      for (const body of ['a', 'b', 'c']) {
        slugs.push((await services.posts.create({ title, body })).slug);
      }

      expect(slugs).toEqual([
        'a-remarkably-long-headline-about-caching-and-publication-sta',
        'a-remarkably-long-headline-about-caching-and-publication-s-2',
        'a-remarkably-long-headline-about-caching-and-publication-s-3',
      ]);
    });

    it('gives concurrent posts with the same title distinct slugs', async () => {
      const tech = await services.categories.create('Tech');

      const created = await Promise.all([
        services.posts.create({ title: 'My Post', body: 'a', categoryId: tech.id }),
        services.posts.create({ title: 'My Post', body: 'b', categoryId: tech.id }),
      ]);

      expect(created.map((post) => post.slug).sort()).toEqual(['my-post', 'my-post-2']);
    });

    it('accepts an explicit slug and rejects a taken one', async () => {
      const post = await services.posts.create({ title: 'Hello', body: 'a', slug: 'Custom-Slug' });
      expect(post.slug).toBe('custom-slug');

      const error = await services.posts
        .create({ title: 'Other', body: 'b', slug: 'custom-slug' })
        .catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ details: { slug: ['This slug is already in use'] } });
    });

    it('stores an optional thumbnail file name', async () => {
      const withImage = await services.posts.create({ title: 'Pic', body: 'a', thumbnail: ' cover_01.png ' });
      const blank = await services.posts.create({ title: 'Plain', body: 'a', thumbnail: '' });

      expect(withImage.thumbnail).toBe('cover_01.png');
      expect(blank.thumbnail).toBeNull();
      expect((await services.posts.update(withImage.id, { thumbnail: null })).thumbnail).toBeNull();

      const error = await services.posts
        .create({ title: 'Bad', body: 'a', thumbnail: '../etc/passwd' })
        .catch((e: unknown) => e);
      expect(error).toMatchObject({
        details: { thumbnail: ['Thumbnail may only contain letters, numbers, underscores, hyphens and dots'] },
      });
    });

    it('rejects malformed input', async () => {
      await expect(services.posts.create({ title: '  ', body: 'a' })).rejects.toThrow('Title is required');
      await expect(services.posts.create({ title: 'T', body: ' ' })).rejects.toThrow('Body is required');
      await expect(services.posts.create({ title: 'T', body: 'a', slug: 'bad slug' })).rejects.toBeInstanceOf(
        ValidationError,
      );
      await expect(services.posts.create({ title: 'T', body: 'a', categoryId: 999 })).rejects.toThrow(
        'Unknown category',
      );
    });
  });

  describe('publication state machine', () => {
    it('publishes a draft into the public views', async () => {
      const tech = await services.categories.create('Tech');
      const draft = await services.posts.create({ title: 'Hello', body: '<p>Hi</p>', categoryId: tech.id });

      // Warm the caches while the post is still a draft
      await expect(services.posts.getPublishedBySlug('hello')).rejects.toBeInstanceOf(NotFoundError);
      expect((await services.posts.listPublished(1, 10, tech.id)).total).toBe(0);
      expect(await services.categories.listNavigation()).toEqual([]);

      clock.advance(60_000);
      const published = await services.posts.publish(draft.id);

      expect(published.status).toBe('published');
      expect(published.publishedAt?.toISOString()).toBe('2026-01-01T10:01:00.000Z');
      expect((await services.posts.getPublishedBySlug('hello')).id).toBe(draft.id);
      expect((await services.posts.listPublished(1, 10, tech.id)).items.map((p) => p.slug)).toEqual(['hello']);
      expect((await services.categories.listNavigation()).map((c) => c.slug)).toEqual(['tech']);
    });

    it('keeps the first publication time when published again', async () => {
      const post = await services.posts.create({ title: 'Hello', body: 'a', status: 'published' });

      clock.advance(60_000);
      const again = await services.posts.publish(post.id);

      expect(again.publishedAt?.toISOString()).toBe('2026-01-01T10:00:00.000Z');
      expect(again.updatedAt.toISOString()).toBe('2026-01-01T10:01:00.000Z');
    });

    it('hides an unpublished post but keeps its publication time', async () => {
      const post = await services.posts.create({ title: 'Hello', body: 'a', status: 'published' });
      expect((await services.posts.getPublishedBySlug('hello')).id).toBe(post.id);
      expect((await services.posts.listPublished()).total).toBe(1);

      const draft = await services.posts.unpublish(post.id);

      expect(draft.status).toBe('draft');
      expect(draft.publishedAt?.toISOString()).toBe('2026-01-01T10:00:00.000Z');
      await expect(services.posts.getPublishedBySlug('hello')).rejects.toBeInstanceOf(NotFoundError);
      expect((await services.posts.listPublished()).total).toBe(0);
    });

    it('does not reset the timestamp when republished', async () => {
      const post = await services.posts.create({ title: 'Hello', body: 'a', status: 'published' });
      await services.posts.unpublish(post.id);

      clock.advance(3_600_000);
      const republished = await services.posts.publish(post.id);

      expect(republished.publishedAt?.toISOString()).toBe('2026-01-01T10:00:00.000Z');
    });
  });

  describe('update', () => {
    it('serves the edited content after a title edit without changing the slug', async () => {
      const post = await services.posts.create({ title: 'Hello', body: 'a', status: 'published' });
      await services.posts.getPublishedBySlug('hello');

      await services.posts.update(post.id, { title: 'Hello again', body: '<p>New</p>' });

      const fetched = await services.posts.getPublishedBySlug('hello');
      expect(fetched.title).toBe('Hello again');
      expect(fetched.body).toBe('<p>New</p>');
    });

    it('moves the public address on an explicit slug change', async () => {
      const post = await services.posts.create({ title: 'Hello', body: 'a', status: 'published' });
      await services.posts.getPublishedBySlug('hello');

      await services.posts.update(post.id, { slug: 'greetings' });

      await expect(services.posts.getPublishedBySlug('hello')).rejects.toBeInstanceOf(NotFoundError);
      expect((await services.posts.getPublishedBySlug('greetings')).id).toBe(post.id);
    });

    it('rejects a slug owned by another post', async () => {
      await services.posts.create({ title: 'Taken', body: 'a' });
      const post = await services.posts.create({ title: 'Mine', body: 'b' });

      await expect(services.posts.update(post.id, { slug: 'taken' })).rejects.toThrow('This slug is already in use');
    });

    it('moves a post to the default category when given a null category', async () => {
      const tech = await services.categories.create('Tech');
      const post = await services.posts.create({ title: 'Hello', body: 'a', categoryId: tech.id });

      const moved = await services.posts.update(post.id, { categoryId: null });

      expect(moved.categoryId).toBe((await services.categories.getBySlug('uncategorized')).id);
    });

    it('reports an unknown post', async () => {
      await expect(services.posts.update(999, { title: 'x' })).rejects.toBeInstanceOf(NotFoundError);
      await expect(services.posts.delete(999)).rejects.toBeInstanceOf(NotFoundError);
      await expect(services.posts.getById(999)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('delete', () => {
    it('removes the post from every public view', async () => {
      const post = await services.posts.create({ title: 'Hello', body: 'a', status: 'published' });
      await services.posts.getPublishedBySlug('hello');
      await services.posts.listPublished();

      await services.posts.delete(post.id);

      await expect(services.posts.getPublishedBySlug('hello')).rejects.toBeInstanceOf(NotFoundError);
      expect((await services.posts.listPublished()).items).toEqual([]);
    });
  });

  describe('listPublished', () => {
    it('orders by publication time, newest first, and paginates', async () => {
      for (const title of ['First', 'Second', 'Third']) {
        await services.posts.create({ title, body: 'a', status: 'published' });
        clock.advance(1_000);
      }
      await services.posts.create({ title: 'Hidden', body: 'a' });

      const page1 = await services.posts.listPublished(1, 2);
      const page2 = await services.posts.listPublished(2, 2);

      expect(page1.items.map((p) => p.slug)).toEqual(['third', 'second']);
      expect(page1).toMatchObject({ page: 1, pageSize: 2, total: 3, totalPages: 2 });
      expect(page2.items.map((p) => p.slug)).toEqual(['first']);
    });

    it('breaks publication time ties by id', async () => {
      await services.posts.create({ title: 'Older', body: 'a', status: 'published' });
      await services.posts.create({ title: 'Newer', body: 'a', status: 'published' });

      expect((await services.posts.listPublished()).items.map((p) => p.slug)).toEqual(['newer', 'older']);
    });

    it('does not store empty pages', async () => {
      const backend = new MemoryCacheBackend();
      ({ services } = createTestServices(database.db, { cacheBackend: backend, now: clock.now }));
      await services.posts.create({ title: 'Hello', body: 'a', status: 'published' });

      await services.posts.listPublished(1, 10);
      await services.posts.listPublished(99, 10);
      await services.posts.listPublished(1, 10, 12345);

      expect(await backend.get('blog:posts:published:all:1:10')).toMatchObject({ total: 1 });
      expect(await backend.get('blog:posts:published:all:99:10')).toBeUndefined();
      expect(await backend.get('blog:posts:published:12345:1:10')).toBeUndefined();
    });

    it('clamps out-of-range paging', async () => {
      const result = await services.posts.listPublished(0, 500);

      expect(result).toMatchObject({ page: 1, pageSize: 50, total: 0, totalPages: 0 });
    });
  });

  describe('listAll', () => {
    it('lists every status and filters by status and title', async () => {
      await services.posts.create({ title: 'Draft notes', body: 'a' });
      clock.advance(1_000);
      await services.posts.create({ title: 'Release notes', body: 'a', status: 'published' });
      clock.advance(1_000);
      await services.posts.create({ title: '100% done', body: 'a' });

      expect((await services.posts.listAll()).items.map((p) => p.title)).toEqual([
        '100% done',
        'Release notes',
        'Draft notes',
      ]);
      expect((await services.posts.listAll({ status: 'draft' })).total).toBe(2);
      expect((await services.posts.listAll({ q: 'NOTES' })).items.map((p) => p.title)).toEqual([
        'Release notes',
        'Draft notes',
      ]);
      expect((await services.posts.listAll({ q: '%' })).items.map((p) => p.title)).toEqual(['100% done']);
    });
  });

  it('looks up slugs case-insensitively', async () => {
    const post = await services.posts.create({ title: 'Hello', body: 'a', status: 'published' });

    expect((await services.posts.getPublishedBySlug(' HELLO ')).id).toBe(post.id);
    expect((await services.posts.getById(post.id)).slug).toBe('hello');
  });

  describe('with an unreachable cache', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('serves reads and commits mutations', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      ({ services } = createTestServices(database.db, { cacheBackend: new FailingCacheBackend(), now: clock.now }));

      const tech = await services.categories.create('Tech');
      const post = await services.posts.create({ title: 'Hello', body: 'a', categoryId: tech.id });
      await services.posts.update(post.id, { title: 'Hello there', status: 'published' });

      expect((await services.posts.getPublishedBySlug('hello')).title).toBe('Hello there');
      expect((await services.posts.listPublished()).total).toBe(1);

      await services.posts.delete(post.id);

      await expect(services.posts.getPublishedBySlug('hello')).rejects.toBeInstanceOf(NotFoundError);
      expect((await services.categories.list()).map((c) => c.name)).toEqual(['Tech']);
      expect(warn).toHaveBeenCalled();
    });
  });
});
