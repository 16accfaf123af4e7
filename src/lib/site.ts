import { z } from 'zod';
import { ConfigError } from '@/lib/errors';

const optionalUrl = z.preprocess(v => (v === '' ? undefined : v), z.string().url().optional());

const siteSchema = z.object({
  SITE_URL: z.string().url().default('https://example.github.io'),
  SITE_TITLE: z.string().min(1).default('Expression Notes'),
  SITE_DESCRIPTION: z.string().default('Notes on expression trees and object construction in .NET.'),
  SITE_AUTHOR: z.string().default('Site Author'),
  SITE_LOCALE: z.string().default('en-US'),
  SITE_TIME_ZONE: z.string().default('UTC'),
  SITE_DISCUSSION_URL: optionalUrl,
  CONTENT_DIR: z.string().default('content/posts'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),
  NODE_ENV: z.string().default('development'),
});

export type SiteConfig = {
  url: string;
  title: string;
  description: string;
  author: string;
  locale: string;
  timeZone: string;
  discussionUrl?: string;
  contentDir: string;
  logLevel: 'error' | 'warn' | 'info' | 'debug';
};

export function loadSiteConfig(env: Record<string, string | undefined> = process.env): SiteConfig {
  const parsed = siteSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => ({ key: i.path.join('.'), message: i.message })));
  }
  const e = parsed.data;
  return {
    url: e.SITE_URL.replace(/\/+$/, ''),
    title: e.SITE_TITLE,
    description: e.SITE_DESCRIPTION,
    author: e.SITE_AUTHOR,
    locale: e.SITE_LOCALE,
    timeZone: e.SITE_TIME_ZONE,
    discussionUrl: e.SITE_DISCUSSION_URL,
    contentDir: e.CONTENT_DIR,
    logLevel: e.LOG_LEVEL ?? (e.NODE_ENV === 'production' ? 'info' : 'debug'),
  };
}

export const site: SiteConfig = loadSiteConfig();
