import fs from 'node:fs';
import path from 'node:path';
import { marked } from 'marked';
import { splitDatedName } from '@/lib/dates';
import { DuplicatePermalinkError, PostParseError } from '@/lib/errors';
import { parseFrontMatter } from '@/lib/front-matter';
import { log } from '@/lib/logger';
import { getMdxOptions } from '@/lib/mdx';
import { site } from '@/lib/site';
import type { Post } from '@/types/post';

export const POSTS_DIR = path.resolve(process.cwd(), site.contentDir);

const CONTENT_FILE = /\.mdx?$/;
// Paths served by the app's own routes.
const RESERVED_PERMALINKS = ['/', '/blog/', '/tags/', '/feed.xml/'];

export function normalisePermalink(permalink: string): string {
  const segments = permalink.split('/').map(s => s.trim()).filter(Boolean);
  return segments.length ? `/${segments.join('/')}/` : '/';
}

export function parsePost(fileName: string, raw: string): Post {
  const { data, content } = parseFrontMatter(raw, fileName);
  const { date: fileDate, rest } = splitDatedName(fileName.replace(CONTENT_FILE, ''));
  const date = data.date ?? fileDate;
  if (!date) {
    throw new PostParseError(fileName, [{ key: 'date', message: 'Required (front matter or YYYY-MM-DD- file name prefix)' }]);
  }
  const isMdx = fileName.endsWith('.mdx');
  return {
    slug: rest,
    title: data.title,
    date: date.toISOString(),
    permalink: normalisePermalink(data.permalink ?? rest),
    description: data.description,
    tags: data.tags,
    layout: data.layout,
    comments: data.comments,
    content, // original markdown
    html: isMdx ? undefined : marked.parse(content, { async: false }),
  };
}

// Newest first; equal dates keep file-name order.
const byDateDesc = (a: Post, b: Post) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0);

export async function loadPosts(dir: string = POSTS_DIR): Promise<Post[]> {
  const files = (await fs.promises.readdir(dir)).filter(f => CONTENT_FILE.test(f)).sort();
  const posts = await Promise.all(
    files.map(async f => parsePost(f, await fs.promises.readFile(path.join(dir, f), 'utf8'))),
  );

  const owners = new Map<string, string>(RESERVED_PERMALINKS.map(p => [p, 'a site route']));
  posts.forEach((p, i) => {
    const owner = owners.get(p.permalink);
    if (owner) throw new DuplicatePermalinkError(p.permalink, [owner, files[i]]);
    owners.set(p.permalink, files[i]);
  });

  log.debug('Loaded content files', { dir, count: posts.length });
  return posts.sort(byDateDesc);
}

export async function getAllPosts(dir?: string): Promise<Post[]> {
  return (await loadPosts(dir)).filter(p => p.layout === 'post');
}

export async function getAllPages(dir?: string): Promise<Post[]> {
  return (await loadPosts(dir)).filter(p => p.layout === 'page');
}

/** Looks a post up without compiling its MDX body; enough for metadata. */
export async function findPostByPermalink(segments: string[], dir?: string): Promise<Post | undefined> {
  const permalink = normalisePermalink(segments.join('/'));
  return (await loadPosts(dir)).find(p => p.permalink === permalink);
}

export async function getPostByPermalink(segments: string[], dir?: string): Promise<Post | undefined> {
  const post = await findPostByPermalink(segments, dir);
  if (!post || post.html !== undefined) return post;
  const { serialize } = await import('next-mdx-remote/serialize');
  const mdxOptions = await getMdxOptions();
  return { ...post, mdx: await serialize(post.content, { mdxOptions }) };
}
