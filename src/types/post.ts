import type { MDXRemoteSerializeResult } from 'next-mdx-remote';

export type PostLayout = 'post' | 'page';

export type FrontMatter = {
  layout: PostLayout;
  title: string;
  description?: string;
  permalink?: string;
  comments: boolean;
  tags: string[];
  date?: Date;
};

export type Post = {
  slug: string;
  title: string;
  date: string; // ISO string
  permalink: string; // always /with/slashes/
  description?: string;
  tags: string[];
  layout: PostLayout;
  comments: boolean;
  content: string; // markdown
  html?: string; // rendered HTML for .md files
  mdx?: MDXRemoteSerializeResult; // serialized MDX (for rich content)
};

/** The part of a post the tag index and feed care about. */
export type PostSummary = Pick<Post, 'title' | 'permalink' | 'date' | 'tags'> & { description?: string };

export type TagGroup = {
  tag: string;
  anchor: string;
  posts: PostSummary[];
};
