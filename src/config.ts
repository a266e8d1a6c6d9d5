import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config({ path: '.env.local' });
dotenv.config();

const csv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) => value.split(',').map((part) => part.trim()).filter(Boolean));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3002'),
  BLOG_DATABASE_URL: z.string().min(1, 'BLOG_DATABASE_URL is required'),
  SESSION_SECRET: z.string().min(1, 'SESSION_SECRET is required'),
  ADMIN_EMAIL: z.string().email(),
  ADMIN_PASSWORD: z.string().min(1, 'ADMIN_PASSWORD is required'),
  SITE_URL: z.string().url().default('http://localhost:3002'),
  FRONTEND_URL: z.string().url().default('http://localhost:3000'),
  CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  POST_LIST_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(60),
  POSTS_PER_PAGE: z.coerce.number().int().min(1).max(50).default(10),
  SITEMAP_STATIC_ROUTES: csv('/'),
  TRUSTED_IMAGE_SOURCES: csv('/static/images/,data:image/'),
});

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: string;
  databaseUrl: string;
  sessionSecret: string;
  admin: {
    email: string;
    password: string;
  };
  siteUrl: string;
  corsOrigins: string[];
  cache: {
    defaultTtlSeconds: number;
    postListTtlSeconds: number;
  };
  postsPerPage: number;
  sitemapStaticRoutes: string[];
  trustedImageSources: string[];
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const vars = parsed.data;
  return {
    env: vars.NODE_ENV,
    port: vars.PORT,
    databaseUrl: vars.BLOG_DATABASE_URL,
    sessionSecret: vars.SESSION_SECRET,
    admin: {
      email: vars.ADMIN_EMAIL,
      password: vars.ADMIN_PASSWORD,
    },
    siteUrl: vars.SITE_URL.replace(/\/+$/, ''),
    corsOrigins: Array.from(new Set(['http://localhost:3000', 'http://localhost:3001', vars.FRONTEND_URL])),
    cache: {
      defaultTtlSeconds: vars.CACHE_TTL_SECONDS,
      postListTtlSeconds: vars.POST_LIST_CACHE_TTL_SECONDS,
    },
    postsPerPage: vars.POSTS_PER_PAGE,
    sitemapStaticRoutes: vars.SITEMAP_STATIC_ROUTES,
    trustedImageSources: vars.TRUSTED_IMAGE_SOURCES,
  };
}
