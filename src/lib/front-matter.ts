import matter from 'gray-matter';
import { z } from 'zod';
import { PostParseError } from '@/lib/errors';
import type { FrontMatter } from '@/types/post';

const emptyToUndefined = (v: unknown) => (v === null || v === '' ? undefined : v);

// Jekyll-style front matter allows `tags: a b c` as well as a YAML list.
const tagsSchema = z
  .preprocess(
    v => (v == null ? [] : typeof v === 'string' ? v.split(/\s+/) : v),
    z.array(z.union([z.string(), z.number()]).transform(String)),
  )
  .transform(tags => [...new Set(tags.map(t => t.trim()).filter(Boolean))]);

// Date strings without an offset are read as UTC so builds agree across machines.
const LOCAL_DATE_TIME = /^(\d{4}-\d{2}-\d{2})(?:[ T](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?))?$/;

export function parseDateString(value: string): Date {
  const m = LOCAL_DATE_TIME.exec(value.trim());
  return m ? new Date(`${m[1]}T${m[2] ?? '00:00'}Z`) : new Date(value);
}

const dateSchema = z.preprocess(
  v => {
    const value = emptyToUndefined(v);
    return typeof value === 'string' ? parseDateString(value) : value;
  },
  z.date().optional(),
);

export const frontMatterSchema = z.object({
  layout: z.enum(['post', 'page']).default('post'),
  title: z.string().trim().min(1),
  description: z.preprocess(emptyToUndefined, z.string().trim().optional()),
  permalink: z.preprocess(emptyToUndefined, z.string().trim().optional()),
  comments: z.boolean().default(false),
  tags: tagsSchema,
  date: dateSchema,
});

export function parseFrontMatter(raw: string, source: string): { data: FrontMatter; content: string } {
  let file: matter.GrayMatterFile<string>;
  try {
    file = matter(raw);
  } catch (e) {
    throw new PostParseError(source, [{ key: 'front-matter', message: e instanceof Error ? e.message : String(e) }]);
  }
  const parsed = frontMatterSchema.safeParse(file.data);
  if (!parsed.success) {
    throw new PostParseError(
      source,
      parsed.error.issues.map(i => ({ key: i.path.join('.') || 'front-matter', message: i.message })),
    );
  }
  return { data: parsed.data, content: file.content };
}
