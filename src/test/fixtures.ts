import { MemoryCacheBackend } from '../cache/memoryCache';
import type { CacheBackend } from '../cache/types';
import type { AppConfig } from '../config';
import { createServices, type BlogServices } from '../services';
import type { BlogDatabase } from '../db/blog-db';

export const testConfig: AppConfig = {
  env: 'test',
  port: '0',
  databaseUrl: 'postgres://unused',
  sessionSecret: 'test-secret',
  admin: {
    email: 'admin@example.com',
    password: 'test-password',
  },
  siteUrl: 'https://blog.example.com',
  corsOrigins: ['http://localhost:3000'],
  cache: {
    defaultTtlSeconds: 300,
    postListTtlSeconds: 60,
  },
  postsPerPage: 10,
  sitemapStaticRoutes: ['/'],
  trustedImageSources: ['/static/images/', 'data:image/'],
};

/**
 * A clock that only moves when told to; every call returns a fresh Date.
 */
export function createClock(start = '2026-01-01T10:00:00.000Z') {
  let current = new Date(start).getTime();
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
  };
}

/** Backend whose every call rejects, as an unreachable cache server would. */
export class FailingCacheBackend implements CacheBackend {
  async get<T>(_key: string): Promise<T | undefined> {
    throw new Error('connection refused');
  }
  async set<T>(_key: string, _value: T, _ttlSeconds: number): Promise<void> {
    throw new Error('connection refused');
  }
  async delete(_key: string): Promise<void> {
    throw new Error('connection refused');
  }
  async invalidate(_pattern: string): Promise<number> {
    throw new Error('connection refused');
  }
  async clear(): Promise<void> {
    throw new Error('connection refused');
  }
}

export function createTestServices(
  db: BlogDatabase,
  options: { cacheBackend?: CacheBackend; now?: () => Date } = {},
): { services: BlogServices; backend: CacheBackend } {
  const backend = options.cacheBackend ?? new MemoryCacheBackend();
  const services = createServices({ db, cacheBackend: backend, config: testConfig, now: options.now });
  return { services, backend };
}
