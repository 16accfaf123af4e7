import type { PostSummary, TagGroup } from '@/types/post';

// Plain code-unit order, the same order Liquid's `sort` gives: 'Zeta' sorts before 'alpha'.
const byCodeUnit = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export function tagAnchor(tag: string): string {
  const slug = tag
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_-]+/gu, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'tag';
}

export function tagHref(group: Pick<TagGroup, 'anchor'>): string {
  return `/tags/#${group.anchor}`;
}

/**
 * Groups posts under each of their tags. Tags come out sorted and unique; posts
 * under a tag keep the order they had in `posts`. The input is left untouched.
 */
export function groupPostsByTag<P extends PostSummary>(posts: readonly P[]): Array<TagGroup & { posts: P[] }> {
  const byTag = new Map<string, P[]>();
  for (const post of posts) {
    for (const tag of new Set(post.tags)) {
      const list = byTag.get(tag);
      if (list) list.push(post);
      else byTag.set(tag, [post]);
    }
  }

  const used = new Set<string>();
  return [...byTag.keys()].sort(byCodeUnit).map(tag => {
    const base = tagAnchor(tag);
    let anchor = base;
    for (let n = 2; used.has(anchor); n++) anchor = `${base}-${n}`;
    used.add(anchor);
    return { tag, anchor, posts: byTag.get(tag) ?? [] };
  });
}

/** Anchor lookup for tag links rendered outside the index (post headers, lists). */
export function tagAnchors(posts: readonly PostSummary[]): Map<string, string> {
  return new Map<string, string>(groupPostsByTag(posts).map(g => [g.tag, g.anchor]));
}
